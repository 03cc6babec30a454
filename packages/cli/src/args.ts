/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { parseArgs } from 'node:util';
import {
  VERIFY_FALLBACK_POLICIES,
  type ConfigParameters,
} from '@stepcheck/core';

export type BatchCategory = 'easy' | 'tricky' | 'all';

const BATCH_CATEGORIES: readonly BatchCategory[] = ['easy', 'tricky', 'all'];

export const DEFAULT_RESULTS_FILE = 'test_results.json';

export interface CliOptions {
  help: boolean;
  /** Positional words joined into one question; absent means interactive. */
  question?: string;
  batch: boolean;
  category: BatchCategory;
  out: string;
  eventsPort?: number;
  /** Settings that override the environment. */
  config: ConfigParameters;
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export const USAGE = `Usage: stepcheck [options] [question...]

With no question, starts an interactive session.

Options:
  --batch                    Run the bundled test suite
  --category <easy|tricky|all>
                             Which test cases --batch runs (default: all)
  --out <file>               Where --batch writes results (default: ${DEFAULT_RESULTS_FILE})
  --max-retries <n>          Extra attempts after the first (default: 2)
  --model <name>             Gemini model to call
  --verify-fallback <strict|lenient>
                             How an unreadable verifier reply is scored
  --events-port <port>       Stream engine events over WebSocket (0 picks a port)
  --debug                    Print phase logs to stderr
  -h, --help                 Show this help`;

function parseInteger(flag: string, raw: string | undefined, min: number, max: number): number | undefined {
  if (raw === undefined) return undefined;
  const value = Number(raw.trim());
  if (raw.trim() === '' || !Number.isInteger(value) || value < min || value > max) {
    const range = max === Number.MAX_SAFE_INTEGER ? `an integer of at least ${min}` : `an integer from ${min} to ${max}`;
    throw new UsageError(`--${flag} must be ${range} (got ${raw}).`);
  }
  return value;
}

function pickOne<T extends string>(flag: string, raw: string, allowed: readonly T[]): T {
  const match = allowed.find((candidate) => candidate === raw);
  if (match === undefined) {
    throw new UsageError(`--${flag} must be one of ${allowed.join(', ')} (got ${raw}).`);
  }
  return match;
}

function readArgs(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      allowPositionals: true,
      strict: true,
      options: {
        help: { type: 'boolean', short: 'h' },
        batch: { type: 'boolean' },
        category: { type: 'string' },
        out: { type: 'string' },
        'max-retries': { type: 'string' },
        model: { type: 'string' },
        'verify-fallback': { type: 'string' },
        'events-port': { type: 'string' },
        debug: { type: 'boolean' },
      },
    });
  } catch (error) {
    // node:util reports unknown flags and missing values as TypeErrors
    throw new UsageError(error instanceof Error ? error.message : String(error));
  }
}

/** Parses command line arguments (without the node and script paths). */
export function parseCliArgs(argv: string[]): CliOptions {
  const { values, positionals } = readArgs(argv);
  const question = positionals.join(' ').trim() || undefined;
  const batch = values.batch ?? false;

  if (batch && question !== undefined) {
    throw new UsageError('--batch runs the bundled test suite and takes no question.');
  }
  if (!batch && (values.category !== undefined || values.out !== undefined)) {
    throw new UsageError('--category and --out only apply with --batch.');
  }

  const config: ConfigParameters = {};
  const maxRetries = parseInteger('max-retries', values['max-retries'], 0, Number.MAX_SAFE_INTEGER);
  if (maxRetries !== undefined) config.maxRetries = maxRetries;
  if (values.model !== undefined) config.model = values.model;
  if (values['verify-fallback'] !== undefined) {
    config.verifyFallback = pickOne('verify-fallback', values['verify-fallback'], VERIFY_FALLBACK_POLICIES);
  }
  // Without --debug the environment still decides.
  if (values.debug) config.debugMode = true;

  return {
    help: values.help ?? false,
    question,
    batch,
    category: values.category === undefined ? 'all' : pickOne('category', values.category, BATCH_CATEGORIES),
    out: values.out ?? DEFAULT_RESULTS_FILE,
    eventsPort: parseInteger('events-port', values['events-port'], 0, 65_535),
    config,
  };
}
