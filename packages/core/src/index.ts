/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export * from './config/config.js';
export * from './config/models.js';

export * from './interfaces/reasoning.js';
export { AgentResponse, type AgentResponseInit } from './core/agentResponse.js';
export { createContentGenerator, type ContentGenerator } from './core/contentGenerator.js';
export {
  LlmGateway,
  GENERATION_CONFIG,
  CONTENT_BLOCKED_MARKER,
  RATE_LIMIT_MARKER,
  LLM_ERROR_PREFIX,
  isGatewayError,
} from './core/llmGateway.js';

export * from './agents/agent.js';
export * from './agents/planner.js';
export * from './agents/executor.js';
export * from './agents/verifier.js';

export * from './coordination/reasoningEngine.js';

export * from './event-bus/index.js';

export { PROMPT_VERSION } from './mind/version.js';
export { PLANNER_SYSTEM_PROMPT, buildPlannerPrompt } from './mind/planner.prompt.js';
export { EXECUTOR_SYSTEM_PROMPT, buildExecutorPrompt } from './mind/executor.prompt.js';
export {
  VERIFIER_SYSTEM_PROMPT,
  VERIFICATION_CHECKS,
  buildVerifierPrompt,
} from './mind/verifier.prompt.js';

export * from './utils/jsonExtractor.js';
export * from './utils/jsonValidator.js';
export {
  createPhaseLogger,
  formatPhaseLine,
  silentPhaseLogger,
  type PhaseLogger,
  type ReasoningPhase,
} from './utils/phaseLogger.js';
export { isRateLimitError, describeError, delay } from './utils/recovery.js';
