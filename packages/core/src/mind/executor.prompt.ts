/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export const EXECUTOR_SYSTEM_PROMPT = `You are a precise problem solver. You carry out plans step by step and show every piece of intermediate work. You always reply with valid JSON in exactly the format requested, and you double-check each calculation.`;

export function buildExecutorPrompt(question: string, plan: string): string {
  return `Solve the question below by following the plan.

Question: ${question}

Plan to follow:
${plan}

Carry out each step of the plan and show the intermediate work and calculations.

IMPORTANT: reply with ONE JSON object and nothing before or after it, in exactly this shape:
{
  "answer": "<final short answer>",
  "reasoning": "<brief explanation of how the answer was reached>",
  "intermediate_work": "<step-by-step work including every calculation>"
}

Rules:
- Follow the plan exactly
- Show every intermediate calculation
- Re-check the arithmetic before answering
- Keep the final answer short and unambiguous
- OUTPUT ONLY THE JSON OBJECT

JSON:`;
}
