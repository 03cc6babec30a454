/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export const PLANNER_SYSTEM_PROMPT = `You are a problem-solving planner. You write clear, logical plans for word problems about arithmetic, time, logic and constraints.

For every question:
1. Parse the question and work out exactly what is being asked
2. List the information that is given
3. Decide which operations are required
4. Lay out how the answer will be derived
5. Note edge cases and anything that must be validated

Plans are usually 5-8 steps: short, but complete.`;

export function buildPlannerPrompt(question: string): string {
  return `Write a step-by-step plan for solving the question below.

The plan must:
- Split the problem into clear, ordered steps
- Say which facts have to be pulled out of the question
- Name every calculation or logical deduction needed
- Finish with a step that verifies the result

Answer with a numbered list of 5-8 steps and nothing else.

Question: ${question}

Plan:`;
}
