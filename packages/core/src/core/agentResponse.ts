/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type {
  AgentResponseRecord,
  Check,
  ResponseMetadata,
  SolveStatus,
} from '../interfaces/reasoning.js';

export interface AgentResponseInit {
  answer: string;
  status: SolveStatus;
  reasoning_visible_to_user: string;
  metadata: ResponseMetadata;
}

/** The only externally observable result of a solve. Frozen on construction. */
export class AgentResponse {
  readonly answer: string;
  readonly status: SolveStatus;
  readonly reasoning_visible_to_user: string;
  readonly metadata: Readonly<ResponseMetadata>;

  constructor(init: AgentResponseInit) {
    this.answer = init.answer;
    this.status = init.status;
    this.reasoning_visible_to_user = init.reasoning_visible_to_user;
    this.metadata = Object.freeze({
      plan: init.metadata.plan,
      checks: Object.freeze(init.metadata.checks.map((check) => Object.freeze({ ...check }))),
      retries: init.metadata.retries,
    });
    Object.freeze(this);
  }

  toRecord(): AgentResponseRecord {
    return {
      answer: this.answer,
      status: this.status,
      reasoning_visible_to_user: this.reasoning_visible_to_user,
      metadata: {
        plan: this.metadata.plan,
        checks: this.metadata.checks.map((check) => ({ ...check })),
        retries: this.metadata.retries,
      },
    };
  }
}
