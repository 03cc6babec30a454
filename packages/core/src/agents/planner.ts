/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { AgentContext, AgentResult, ReasoningAgent } from './agent.js';
import { AgentEventBus } from '../event-bus/bus.js';
import { AgentType } from '../event-bus/types.js';
import type { LlmGateway } from '../core/llmGateway.js';
import { isGatewayError } from '../core/llmGateway.js';
import { buildPlannerPrompt, PLANNER_SYSTEM_PROMPT } from '../mind/planner.prompt.js';
import { silentPhaseLogger, type PhaseLogger } from '../utils/phaseLogger.js';

export interface PlannerInput {
  question: string;
}

export interface PlannerOutput {
  plan: string;
}

/**
 * Asks the model for a numbered plan. The text is not parsed; it is handed to
 * the executor as-is, gateway error markers included.
 */
export class PlannerAgent implements ReasoningAgent<PlannerInput, PlannerOutput> {
  readonly id = AgentType.PLANNER;

  constructor(
    private bus: AgentEventBus,
    private gateway: LlmGateway,
    private log: PhaseLogger = silentPhaseLogger,
  ) {}

  async run(ctx: AgentContext<PlannerInput>): Promise<AgentResult<PlannerOutput>> {
    this.bus.emit('agent-start', { id: this.id });

    try {
      this.bus.emit('progress', { agent: this.id, attempt: ctx.attempt, percent: 25 });

      const plan = await this.gateway.call(
        buildPlannerPrompt(ctx.input.question),
        PLANNER_SYSTEM_PROMPT,
      );

      if (isGatewayError(plan)) {
        this.bus.emit('log', `Planner received an error instead of a plan: ${plan}`);
      }
      this.log('PLANNER', `plan ready (${plan.length} chars)`);

      this.bus.emit('progress', { agent: this.id, attempt: ctx.attempt, percent: 100 });
      this.bus.emit('agent-end', { id: this.id });
      return { ok: true, output: { plan } };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.bus.emit('error', {
        agent: this.id,
        message,
        details: error instanceof Error ? error.stack : undefined,
      });
      this.bus.emit('agent-end', { id: this.id });
      return { ok: false, error: `Planning failed: ${message}` };
    }
  }
}
