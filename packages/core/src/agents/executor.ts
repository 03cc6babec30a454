/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { AgentContext, AgentResult, ReasoningAgent } from './agent.js';
import { AgentEventBus } from '../event-bus/bus.js';
import { AgentType } from '../event-bus/types.js';
import type { LlmGateway } from '../core/llmGateway.js';
import type { Solution } from '../interfaces/reasoning.js';
import { buildExecutorPrompt, EXECUTOR_SYSTEM_PROMPT } from '../mind/executor.prompt.js';
import { extractJsonObject } from '../utils/jsonExtractor.js';
import { formatValidationErrors, lazySchema } from '../utils/jsonValidator.js';
import { silentPhaseLogger, type PhaseLogger } from '../utils/phaseLogger.js';

export interface ExecutorInput {
  question: string;
  plan: string;
}

export interface ExecutorOutput {
  solution: Solution;
  /** false when the fallback solution was used */
  parsed: boolean;
}

type Scalar = string | number | boolean;
type TextLike = Scalar | Scalar[];

interface RawSolution {
  answer: TextLike;
  reasoning: TextLike;
  intermediate_work: TextLike;
}

export const PARSE_ERROR_ANSWER = 'Error parsing response';

const solutionValidator = lazySchema<RawSolution>('solution.schema.json');

function toText(value: TextLike): string {
  return Array.isArray(value) ? value.map(String).join('\n') : String(value);
}

/** Degraded solution used when the model's reply cannot be read. */
export function fallbackSolution(raw: string): Solution {
  return {
    answer: PARSE_ERROR_ANSWER,
    reasoning: raw.slice(0, 200),
    intermediate_work: raw,
  };
}

/**
 * Reads a Solution out of model text: extract the JSON object, then validate
 * the three required fields. Any failure yields the error reason instead.
 */
export function parseSolution(raw: string): { ok: true; solution: Solution } | { ok: false; error: string } {
  const extracted = extractJsonObject(raw);
  if (!extracted.ok) {
    return { ok: false, error: extracted.error };
  }

  const validate = solutionValidator();
  if (!validate(extracted.value)) {
    return { ok: false, error: formatValidationErrors(validate.errors).join('; ') };
  }

  return {
    ok: true,
    solution: {
      answer: toText(extracted.value.answer),
      reasoning: toText(extracted.value.reasoning),
      intermediate_work: toText(extracted.value.intermediate_work),
    },
  };
}

export class ExecutorAgent implements ReasoningAgent<ExecutorInput, ExecutorOutput> {
  readonly id = AgentType.EXECUTOR;

  constructor(
    private bus: AgentEventBus,
    private gateway: LlmGateway,
    private log: PhaseLogger = silentPhaseLogger,
  ) {}

  async run(ctx: AgentContext<ExecutorInput>): Promise<AgentResult<ExecutorOutput>> {
    this.bus.emit('agent-start', { id: this.id });

    try {
      this.bus.emit('progress', { agent: this.id, attempt: ctx.attempt, percent: 25 });

      const raw = await this.gateway.call(
        buildExecutorPrompt(ctx.input.question, ctx.input.plan),
        EXECUTOR_SYSTEM_PROMPT,
      );

      // Progress: 60% - response received, parsing
      this.bus.emit('progress', { agent: this.id, attempt: ctx.attempt, percent: 60 });

      const parsed = parseSolution(raw);
      let output: ExecutorOutput;
      if (parsed.ok) {
        output = { solution: parsed.solution, parsed: true };
        this.log('EXECUTOR', `answer: ${parsed.solution.answer}`);
      } else {
        output = { solution: fallbackSolution(raw), parsed: false };
        this.bus.emit('log', `Could not parse execution JSON (${parsed.error})`);
        this.log('EXECUTOR', `parse failed: ${parsed.error}`);
      }

      this.bus.emit('progress', { agent: this.id, attempt: ctx.attempt, percent: 100 });
      this.bus.emit('agent-end', { id: this.id });
      return { ok: true, output };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.bus.emit('error', {
        agent: this.id,
        message,
        details: error instanceof Error ? error.stack : undefined,
      });
      this.bus.emit('agent-end', { id: this.id });
      return { ok: false, error: `Execution failed: ${message}` };
    }
  }
}
