/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { vi, type Mock } from 'vitest';
import {
  BlockedReason,
  GenerateContentResponse,
  type GenerateContentParameters,
} from '@google/genai';
import { Config, type ConfigParameters } from '../config/config.js';
import type { ContentGenerator } from '../core/contentGenerator.js';
import type { Check } from '../interfaces/reasoning.js';

type GenerateFn = (request: GenerateContentParameters) => Promise<GenerateContentResponse>;

/** A reply the fake model gives: text, a prepared response, or a thrown error. */
export type ScriptedReply = string | GenerateContentResponse | Error;

/**
 * Config with a placeholder key and no rate-limit wait
 */
export function createTestConfig(overrides: ConfigParameters = {}): Config {
  return new Config({ apiKey: 'test-key', rateLimitBackoffMs: 0, ...overrides });
}

/**
 * Response carrying a single text part, as the Gemini API returns it
 */
export function textResponse(text: string): GenerateContentResponse {
  const response = new GenerateContentResponse();
  response.candidates = [{ content: { role: 'model', parts: [{ text }] } }];
  return response;
}

/**
 * Response whose prompt was rejected by the safety filters
 */
export function blockedResponse(): GenerateContentResponse {
  const response = new GenerateContentResponse();
  response.promptFeedback = { blockReason: BlockedReason.SAFETY };
  return response;
}

/**
 * Response with no candidates at all
 */
export function emptyResponse(): GenerateContentResponse {
  return new GenerateContentResponse();
}

/**
 * Fake content generator that answers from `replies` in order and fails once
 * the script runs out.
 */
export function createScriptedGenerator(replies: ScriptedReply[]): {
  generator: ContentGenerator;
  generateContent: Mock<GenerateFn>;
} {
  const queue = [...replies];
  const generateContent = vi.fn<GenerateFn>(async () => {
    const next = queue.shift();
    if (next === undefined) {
      throw new Error('No scripted reply left');
    }
    if (next instanceof Error) {
      throw next;
    }
    return typeof next === 'string' ? textResponse(next) : next;
  });
  return { generator: { generateContent }, generateContent };
}

/** Prompt text sent on the n-th call to a mocked generator. */
export function promptOfCall(generateContent: Mock<GenerateFn>, n: number): string {
  const request = generateContent.mock.calls[n]?.[0];
  return typeof request?.contents === 'string' ? request.contents : '';
}

export const SOLUTION_JSON = JSON.stringify({
  answer: '62',
  reasoning: '25 plus 37 is 62',
  intermediate_work: '25 + 37 = 62',
});

export function checksJson(checks: Check[]): string {
  return JSON.stringify(checks);
}

export const PASSING_CHECKS: Check[] = [
  { check_name: 'Correctness Check', passed: true, details: 'Independent result is 62' },
  { check_name: 'Arithmetic Check', passed: true, details: '25 + 37 = 62' },
];

export const FAILING_CHECKS: Check[] = [
  { check_name: 'Correctness Check', passed: true, details: 'Matches' },
  { check_name: 'Arithmetic Check', passed: false, details: 'Sum is off by one' },
];
