/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/** Bump when any prompt text changes; recorded with each solve in debug logs. */
export const PROMPT_VERSION = '1.0.0';
