/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { AgentResponse, Check } from '@stepcheck/core';

export const RULE = '='.repeat(50);

const DETAILS_PREVIEW = 100;

export function formatCheck(check: Check): string {
  const mark = check.passed ? '✓' : '✗';
  return `${mark} ${check.check_name}: ${check.details.slice(0, DETAILS_PREVIEW)}`;
}

/** The answer block shown after each interactive question. */
export function formatResponse(response: AgentResponse): string {
  const { retries, checks } = response.metadata;
  return [
    RULE,
    `ANSWER: ${response.answer}`,
    `STATUS: ${response.status}`,
    '',
    `REASONING: ${response.reasoning_visible_to_user}`,
    RULE,
    '',
    `[Metadata: ${retries} retries, ${checks.length} checks performed]`,
  ].join('\n');
}

export function formatRecord(response: AgentResponse): string {
  return JSON.stringify(response.toRecord(), null, 2);
}
