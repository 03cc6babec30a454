/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { AgentEventBus } from '../event-bus/bus.js';
import { AgentType } from '../event-bus/types.js';
import { Config, type ConfigParameters } from '../config/config.js';
import { createContentGenerator, type ContentGenerator } from '../core/contentGenerator.js';
import { LlmGateway } from '../core/llmGateway.js';
import { AgentResponse } from '../core/agentResponse.js';
import type { Check, Solution, Solver } from '../interfaces/reasoning.js';
import type { AgentResult } from '../agents/agent.js';
import { PlannerAgent } from '../agents/planner.js';
import { ExecutorAgent, fallbackSolution } from '../agents/executor.js';
import { VerifierAgent, fallbackChecks } from '../agents/verifier.js';
import { PROMPT_VERSION } from '../mind/version.js';
import { createPhaseLogger, type PhaseLogger } from '../utils/phaseLogger.js';

export const UNVERIFIED_ANSWER = 'Unable to verify solution';

/** How many of the most recent failing checks the failure summary quotes. */
const FAILURE_SUMMARY_LIMIT = 3;

export interface ReasoningEngineDeps {
  bus?: AgentEventBus;
  /** Defaults to the Gemini models client for `config`. */
  contentGenerator?: ContentGenerator;
}

interface Attempt {
  plan: string;
  solution: Solution;
  checks: Check[];
}

/** An attempt passes only with at least one check and no failures. */
export function allChecksPassed(checks: readonly Check[]): boolean {
  return checks.length > 0 && checks.every((check) => check.passed);
}

/** "name: details" for the last few failing checks, joined with "; ". */
export function summarizeFailures(
  checks: readonly Check[],
  limit = FAILURE_SUMMARY_LIMIT,
): string {
  return checks
    .filter((check) => !check.passed)
    .slice(-limit)
    .map((check) => `${check.check_name}: ${check.details}`)
    .join('; ');
}

/**
 * Runs plan → execute → verify until one attempt's checks all pass, or until
 * `maxRetries + 1` attempts have been made. Failed checks are not fed back
 * into the next attempt; each attempt starts from a fresh plan.
 */
export class ReasoningEngine implements Solver {
  private readonly planner: PlannerAgent;
  private readonly executor: ExecutorAgent;
  private readonly verifier: VerifierAgent;
  private readonly maxRetries: number;
  private readonly log: PhaseLogger;
  readonly bus: AgentEventBus;

  constructor(config: Config, deps: ReasoningEngineDeps = {}) {
    this.bus = deps.bus ?? new AgentEventBus();
    this.maxRetries = config.getMaxRetries();
    this.log = createPhaseLogger(config.getDebugMode());

    const gateway = new LlmGateway(
      deps.contentGenerator ?? createContentGenerator(config),
      config,
      this.bus,
    );
    this.planner = new PlannerAgent(this.bus, gateway, this.log);
    this.executor = new ExecutorAgent(this.bus, gateway, this.log);
    this.verifier = new VerifierAgent(this.bus, gateway, config.getVerifyFallback(), this.log);
  }

  async solve(question: string): Promise<AgentResponse> {
    const maxAttempts = this.maxRetries + 1;
    const history: Check[] = [];
    let lastPlan = 'N/A';

    this.log('ENGINE', `solving with up to ${maxAttempts} attempt(s), prompts v${PROMPT_VERSION}`);

    for (let attempt = 0; attempt <= this.maxRetries; attempt++) {
      this.bus.emit('attempt-start', { attempt, maxAttempts });

      const { plan, solution, checks } = await this.runAttempt(question, attempt);
      lastPlan = plan;
      history.push(...checks);

      const passed = allChecksPassed(checks);
      this.bus.emit('attempt-end', { attempt, plan, solution, checks, passed });

      if (passed) {
        this.log('ENGINE', `attempt ${attempt + 1} verified`);
        return new AgentResponse({
          answer: solution.answer,
          status: 'success',
          reasoning_visible_to_user: solution.reasoning,
          metadata: { plan, checks, retries: attempt },
        });
      }

      this.log('ENGINE', `attempt ${attempt + 1} of ${maxAttempts} failed verification`);
    }

    const summary = summarizeFailures(history) || 'no failing checks were reported';
    return new AgentResponse({
      answer: UNVERIFIED_ANSWER,
      status: 'failed',
      reasoning_visible_to_user: `Verification failed after ${this.maxRetries} retries. Issues: ${summary}`,
      metadata: { plan: lastPlan, checks: history, retries: this.maxRetries },
    });
  }

  private async runAttempt(question: string, attempt: number): Promise<Attempt> {
    const planned = await this.planner.run({ input: { question }, attempt });
    const plan = planned.output?.plan ?? this.stageFailure(AgentType.PLANNER, planned);

    const executed = await this.executor.run({ input: { question, plan }, attempt });
    const solution =
      executed.output?.solution ??
      fallbackSolution(this.stageFailure(AgentType.EXECUTOR, executed));

    const verified = await this.verifier.run({ input: { question, solution }, attempt });
    const checks =
      verified.output?.checks ??
      fallbackChecks(this.stageFailure(AgentType.VERIFIER, verified), 'strict');

    return { plan, solution, checks };
  }

  /** A faulted stage degrades like a parse failure, with its error text as the model output. */
  private stageFailure(agent: AgentType, result: AgentResult<unknown>): string {
    const error = result.error ?? `Agent ${agent} execution failed`;
    this.log('ENGINE', `${agent} faulted: ${error}`);
    return error;
  }
}

/**
 * Builds the configuration and the engine in one step. Throws ConfigError
 * when the credential is missing or a setting is invalid.
 */
export function createReasoningEngine(
  params: ConfigParameters,
  deps: ReasoningEngineDeps = {},
): ReasoningEngine {
  return new ReasoningEngine(new Config(params), deps);
}
