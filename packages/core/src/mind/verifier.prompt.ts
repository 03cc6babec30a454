/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { Solution } from '../interfaces/reasoning.js';

export const VERIFIER_SYSTEM_PROMPT = `You are a rigorous verifier. You solve each problem again on your own and compare, then check the arithmetic, the logic and the constraints. You reply only with valid JSON in the requested format and you report every error or inconsistency you find.`;

/** Checks the verifier is asked to run, in the order it should report them. */
export const VERIFICATION_CHECKS = [
  'Correctness Check',
  'Arithmetic Check',
  'Logic Check',
  'Constraint Check',
  'Units Check',
] as const;

export function buildVerifierPrompt(question: string, solution: Solution): string {
  return `Verify the proposed solution to the question below.

Question: ${question}

Proposed Solution:
Answer: ${solution.answer}
Reasoning: ${solution.reasoning}
Work: ${solution.intermediate_work}

Run these checks:
1. **${VERIFICATION_CHECKS[0]}**: solve the problem yourself. Does your answer match?
2. **${VERIFICATION_CHECKS[1]}**: recompute every calculation in the work.
3. **${VERIFICATION_CHECKS[2]}**: is the reasoning sound, and does each step follow from the last?
4. **${VERIFICATION_CHECKS[3]}**: is every constraint in the question satisfied?
5. **${VERIFICATION_CHECKS[4]}**: are the units consistent and correct?

IMPORTANT: reply with ONE JSON array and nothing before or after it. Each element has exactly these keys:
[
  {
    "check_name": "${VERIFICATION_CHECKS[0]}",
    "passed": true,
    "details": "what was checked and what was found"
  }
]

Be strict but fair: when a check fails, say what is wrong and why.
OUTPUT ONLY THE JSON ARRAY

JSON Array:`;
}
