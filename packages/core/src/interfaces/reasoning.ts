/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { AgentResponse } from '../core/agentResponse.js';

// Field names follow the JSON the model is asked to emit.

export interface Solution {
  answer: string;
  reasoning: string;
  intermediate_work: string;
}

export interface Check {
  check_name: string;
  passed: boolean;
  details: string;
}

export type SolveStatus = 'success' | 'failed';

export interface ResponseMetadata {
  plan: string;
  checks: readonly Check[];
  retries: number;             // attempts needed beyond the first
}

/** Plain-object form of an AgentResponse, ready for JSON.stringify. */
export interface AgentResponseRecord {
  answer: string;
  status: SolveStatus;
  reasoning_visible_to_user: string;
  metadata: {
    plan: string;
    checks: Check[];
    retries: number;
  };
}

/** Anything that can answer a question with a verified response. */
export interface Solver {
  solve(question: string): Promise<AgentResponse>;
}
