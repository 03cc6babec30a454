/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { writeFile } from 'node:fs/promises';
import {
  allChecksPassed,
  describeError,
  type AgentResponseRecord,
  type SolveStatus,
  type Solver,
} from '@stepcheck/core';
import type { BatchCategory } from '../args.js';
import { formatCheck } from '../ui/display.js';
import { checkAnswer, type TestCase, type TestSuite } from './testCases.js';

export type TestCategory = 'EASY' | 'TRICKY';

interface TestIdentity {
  test_num: number;
  category: TestCategory;
  description: string;
  question: string;
}

export interface CompletedTestResult extends TestIdentity {
  answer: string;
  status: SolveStatus;
  answer_correct: boolean;
  retries: number;
  checks_passed: boolean;
  full_result: AgentResponseRecord;
}

/** The solver rejected; the suite records the message and moves on. */
export interface ErroredTestResult extends TestIdentity {
  status: 'error';
  error: string;
}

export type TestResult = CompletedTestResult | ErroredTestResult;

export interface SuiteSummary {
  total: number;
  successfulStatus: number;
  correctAnswers: number;
  errors: number;
  easy: { correct: number; total: number };
  tricky: { correct: number; total: number };
}

export type Printer = (line: string) => void;

const WIDE_RULE = '='.repeat(70);
const SECTION_RULE = '#'.repeat(70);

export async function runTest(
  solver: Solver,
  test: TestCase,
  testNum: number,
  category: TestCategory,
  print: Printer = console.log,
): Promise<TestResult> {
  const identity: TestIdentity = {
    test_num: testNum,
    category,
    description: test.description,
    question: test.question,
  };

  print(`\n${WIDE_RULE}`);
  print(`Test #${testNum} [${category}]: ${test.description}`);
  print(WIDE_RULE);
  print(`Question: ${test.question}`);

  let record: AgentResponseRecord;
  try {
    record = (await solver.solve(test.question)).toRecord();
  } catch (error) {
    const message = describeError(error);
    print(`\n✗ ERROR: ${message}`);
    return { ...identity, status: 'error', error: message };
  }

  const { checks, retries } = record.metadata;
  print(`\nAnswer: ${record.answer}`);
  print(`Status: ${record.status}`);
  print(`Reasoning: ${record.reasoning_visible_to_user}`);
  print('\nMetadata:');
  print(`  - Retries: ${retries}`);
  print(`  - Checks performed: ${checks.length}`);
  print('  - Check results:');
  for (const check of checks) {
    print(`    ${formatCheck(check)}`);
  }

  const answerCorrect = checkAnswer(record.answer, test.expected_answer_contains);
  print(`\n${answerCorrect ? '✓' : '✗'} Expected answer validation: ${answerCorrect ? 'PASS' : 'FAIL'}`);
  if (!answerCorrect) {
    print(`  Expected one of: ${test.expected_answer_contains.join(', ')}`);
  }

  return {
    ...identity,
    answer: record.answer,
    status: record.status,
    answer_correct: answerCorrect,
    retries,
    checks_passed: allChecksPassed(checks),
    full_result: record,
  };
}

/**
 * Runs the selected categories one test at a time. Tricky tests are numbered
 * after the easy ones even when only the tricky set runs, so a test keeps its
 * number across runs.
 */
export async function runTestSuite(
  solver: Solver,
  suite: TestSuite,
  selection: BatchCategory = 'all',
  print: Printer = console.log,
): Promise<TestResult[]> {
  const sections: Array<{ category: TestCategory; tests: TestCase[]; firstNum: number }> = [];
  if (selection !== 'tricky') {
    sections.push({ category: 'EASY', tests: suite.easy, firstNum: 1 });
  }
  if (selection !== 'easy') {
    sections.push({ category: 'TRICKY', tests: suite.tricky, firstNum: suite.easy.length + 1 });
  }

  const results: TestResult[] = [];
  for (const { category, tests, firstNum } of sections) {
    print(`\n\n${SECTION_RULE}`);
    print(`# ${category} TESTS`);
    print(SECTION_RULE);
    for (const [index, test] of tests.entries()) {
      results.push(await runTest(solver, test, firstNum + index, category, print));
    }
  }
  return results;
}

function isCorrect(result: TestResult): boolean {
  return result.status !== 'error' && result.answer_correct;
}

export function summarizeResults(results: readonly TestResult[]): SuiteSummary {
  const inCategory = (category: TestCategory) => results.filter((r) => r.category === category);
  const tally = (subset: readonly TestResult[]) => ({
    correct: subset.filter(isCorrect).length,
    total: subset.length,
  });

  return {
    total: results.length,
    successfulStatus: results.filter((r) => r.status === 'success').length,
    correctAnswers: results.filter(isCorrect).length,
    errors: results.filter((r) => r.status === 'error').length,
    easy: tally(inCategory('EASY')),
    tricky: tally(inCategory('TRICKY')),
  };
}

function percent(part: number, total: number): string {
  return total === 0 ? '0.0' : ((part / total) * 100).toFixed(1);
}

export function formatSummary(summary: SuiteSummary): string[] {
  const { total } = summary;
  return [
    `\n\n${WIDE_RULE}`,
    'TEST SUMMARY',
    WIDE_RULE,
    `\nTotal Tests: ${total}`,
    `Successful Status: ${summary.successfulStatus}/${total} (${percent(summary.successfulStatus, total)}%)`,
    `Correct Answers: ${summary.correctAnswers}/${total} (${percent(summary.correctAnswers, total)}%)`,
    `Errors: ${summary.errors}/${total}`,
    `\nEasy Tests: ${summary.easy.correct}/${summary.easy.total} correct`,
    `Tricky Tests: ${summary.tricky.correct}/${summary.tricky.total} correct`,
  ];
}

/** Writes the results as a JSON array, replacing any existing file. */
export async function saveResults(results: readonly TestResult[], file: string): Promise<void> {
  await writeFile(file, `${JSON.stringify(results, null, 2)}\n`, 'utf8');
}
