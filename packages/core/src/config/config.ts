/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { DEFAULT_GEMINI_MODEL } from './models.js';

/**
 * What the verifier does when the model's answer cannot be parsed into checks.
 *
 * - `strict`: record a single failing "Verification Error" check.
 * - `lenient`: pass when the raw text says "correct", otherwise fail as above.
 */
export type VerifyFallbackPolicy = 'strict' | 'lenient';

export const VERIFY_FALLBACK_POLICIES: readonly VerifyFallbackPolicy[] = [
  'strict',
  'lenient',
];

export const DEFAULT_MAX_RETRIES = 2;
export const DEFAULT_RATE_LIMIT_BACKOFF_MS = 2_000;

export const API_KEY_ENV = 'GEMINI_API_KEY';

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export interface ConfigParameters {
  apiKey?: string;
  model?: string;
  maxRetries?: number;
  rateLimitBackoffMs?: number;
  verifyFallback?: VerifyFallbackPolicy;
  debugMode?: boolean;
}

export class Config {
  private readonly apiKey: string;
  private readonly model: string;
  private readonly maxRetries: number;
  private readonly rateLimitBackoffMs: number;
  private readonly verifyFallback: VerifyFallbackPolicy;
  private readonly debugMode: boolean;

  constructor(params: ConfigParameters) {
    const apiKey = params.apiKey?.trim();
    if (!apiKey) {
      throw new ConfigError(
        `${API_KEY_ENV} not found. Please set it as an environment variable or pass apiKey explicitly.`,
      );
    }

    const maxRetries = params.maxRetries ?? DEFAULT_MAX_RETRIES;
    if (!Number.isInteger(maxRetries) || maxRetries < 0) {
      throw new ConfigError(
        `maxRetries must be a non-negative integer (got ${maxRetries}).`,
      );
    }

    const backoff = params.rateLimitBackoffMs ?? DEFAULT_RATE_LIMIT_BACKOFF_MS;
    if (!Number.isFinite(backoff) || backoff < 0) {
      throw new ConfigError(
        `rateLimitBackoffMs must be a non-negative number (got ${backoff}).`,
      );
    }

    const verifyFallback = params.verifyFallback ?? 'strict';
    if (!VERIFY_FALLBACK_POLICIES.includes(verifyFallback)) {
      throw new ConfigError(
        `verifyFallback must be one of ${VERIFY_FALLBACK_POLICIES.join(', ')} (got ${verifyFallback}).`,
      );
    }

    this.apiKey = apiKey;
    this.model = params.model?.trim() || DEFAULT_GEMINI_MODEL;
    this.maxRetries = maxRetries;
    this.rateLimitBackoffMs = backoff;
    this.verifyFallback = verifyFallback;
    this.debugMode = params.debugMode ?? false;
  }

  getApiKey(): string {
    return this.apiKey;
  }

  getModel(): string {
    return this.model;
  }

  getMaxRetries(): number {
    return this.maxRetries;
  }

  getRateLimitBackoffMs(): number {
    return this.rateLimitBackoffMs;
  }

  getVerifyFallback(): VerifyFallbackPolicy {
    return this.verifyFallback;
  }

  getDebugMode(): boolean {
    return this.debugMode;
  }
}

function isVerifyFallbackPolicy(value: string): value is VerifyFallbackPolicy {
  return VERIFY_FALLBACK_POLICIES.some((policy) => policy === value);
}

function readInteger(
  env: NodeJS.ProcessEnv,
  name: string,
): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return undefined;
  const parsed = Number(raw.trim());
  if (!Number.isInteger(parsed)) {
    throw new ConfigError(`${name}=${raw} is not an integer.`);
  }
  return parsed;
}

/**
 * Builds a {@link Config} from environment variables. Explicit overrides win
 * over the environment; the result is validated by the `Config` constructor.
 */
export function loadConfigFromEnv(
  env: NodeJS.ProcessEnv = process.env,
  overrides: ConfigParameters = {},
): Config {
  const fallback = env['STEPCHECK_VERIFY_FALLBACK']?.trim();
  if (fallback && !isVerifyFallbackPolicy(fallback)) {
    throw new ConfigError(
      `STEPCHECK_VERIFY_FALLBACK must be one of ${VERIFY_FALLBACK_POLICIES.join(', ')} (got ${fallback}).`,
    );
  }

  return new Config({
    apiKey: overrides.apiKey ?? env[API_KEY_ENV],
    model: overrides.model ?? env['STEPCHECK_MODEL'],
    maxRetries: overrides.maxRetries ?? readInteger(env, 'STEPCHECK_MAX_RETRIES'),
    rateLimitBackoffMs: overrides.rateLimitBackoffMs,
    verifyFallback:
      overrides.verifyFallback ??
      (fallback && isVerifyFallbackPolicy(fallback) ? fallback : undefined),
    debugMode: overrides.debugMode ?? env['STEPCHECK_DEBUG'] === '1',
  });
}
