/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { ApiError } from '@google/genai';

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * True when the failure looks like a rate limit or exhausted quota.
 * The SDK reports these as an ApiError with status 429; other transports only
 * leave the status in the message text.
 */
export function isRateLimitError(error: unknown): boolean {
  if (error instanceof ApiError && error.status === 429) {
    return true;
  }
  const message = describeError(error);
  const lower = message.toLowerCase();
  return (
    message.includes('429') ||
    lower.includes('quota') ||
    lower.includes('rate limit')
  );
}
