/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { readFile } from 'node:fs/promises';
import { formatValidationErrors, lazySchema } from '@stepcheck/core';

export interface TestCase {
  question: string;
  /** Any one of these, case-insensitive, inside the answer counts as correct. */
  expected_answer_contains: string[];
  description: string;
}

export interface TestSuite {
  easy: TestCase[];
  tricky: TestCase[];
}

export const DEFAULT_SUITE_URL = new URL('./questions.json', import.meta.url);

const suiteValidator = lazySchema<TestSuite>('testSuite.schema.json');

export async function loadTestSuite(source: URL | string = DEFAULT_SUITE_URL): Promise<TestSuite> {
  const data: unknown = JSON.parse(await readFile(source, 'utf8'));
  const validate = suiteValidator();
  if (!validate(data)) {
    throw new Error(
      `Invalid test suite ${String(source)}: ${formatValidationErrors(validate.errors).join('; ')}`,
    );
  }
  return data;
}

/** True when some expected string occurs in the answer, ignoring case. */
export function checkAnswer(answer: string, expected: readonly string[]): boolean {
  const haystack = answer.toLowerCase();
  return expected.some((candidate) => haystack.includes(candidate.toLowerCase()));
}
