/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import fs from 'fs/promises';
import type { Config } from '@stepcheck/core';
import type { CliOptions } from '../args.js';

type WarningCheck = {
  id: string;
  check: (options: CliOptions, config: Config) => Promise<string | null>;
};

// Individual warning checks
const lenientVerificationCheck: WarningCheck = {
  id: 'lenient-verification',
  check: async (_options, config) =>
    config.getVerifyFallback() === 'lenient'
      ? 'Warning: lenient verification is on. An unreadable verifier reply that mentions "correct" counts as a pass.'
      : null,
};

const singleAttemptCheck: WarningCheck = {
  id: 'single-attempt',
  check: async (_options, config) =>
    config.getMaxRetries() === 0
      ? 'Note: retries are disabled, so each question gets exactly one attempt.'
      : null,
};

const resultsOverwriteCheck: WarningCheck = {
  id: 'results-overwrite',
  check: async (options) => {
    if (!options.batch) {
      return null;
    }
    try {
      await fs.access(options.out);
      return `Warning: ${options.out} already exists and will be overwritten.`;
    } catch (_err: unknown) {
      return null;
    }
  },
};

// All warning checks
const WARNING_CHECKS: readonly WarningCheck[] = [
  lenientVerificationCheck,
  singleAttemptCheck,
  resultsOverwriteCheck,
];

export async function getStartupWarnings(
  options: CliOptions,
  config: Config,
): Promise<string[]> {
  const results = await Promise.all(
    WARNING_CHECKS.map((check) => check.check(options, config)),
  );
  return results.filter((msg): msg is string => msg !== null);
}
