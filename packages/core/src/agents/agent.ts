/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { AgentType } from '../event-bus/types.js';

/**
 * Agent execution context
 */
export interface AgentContext<TInput = unknown> {
  input: TInput;
  attempt: number;      // zero-based attempt within one solve
}

/**
 * Agent execution result
 */
export interface AgentResult<TOutput = unknown> {
  ok: boolean;          // success flag
  output?: TOutput;     // present when ok === true
  error?: string;       // present when ok === false
}

/**
 * Base interface for the plan / execute / verify stages
 */
export interface ReasoningAgent<TInput, TOutput> {
  /** Agent type identifier */
  readonly id: AgentType;

  run(ctx: AgentContext<TInput>): Promise<AgentResult<TOutput>>;
}
