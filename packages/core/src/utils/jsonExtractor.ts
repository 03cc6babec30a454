/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/* ------------------------------------------------------------------ */
/* Recovering one JSON value from free-form model text                */
/* ------------------------------------------------------------------ */

export type JsonExtraction<T> =
  | { ok: true; value: T }
  | { ok: false; error: string };

type JsonKind = 'object' | 'array';

const JSON_FENCE = /```json\s*([\s\S]*?)\s*```/;
const ANY_FENCE = /```\s*([\s\S]*?)\s*```/;

// Greedy on purpose: first opening bracket to last closing bracket.
const OBJECT_BLOCK = /\{[\s\S]*\}/;
const ARRAY_BLOCK = /\[[\s\S]*\]/;

/** Strips surrounding whitespace and, when present, a markdown code fence. */
export function narrowToFence(text: string): string {
  const trimmed = text.trim();
  if (trimmed.includes('```json')) {
    const match = trimmed.match(JSON_FENCE);
    if (match) return match[1];
  } else if (trimmed.includes('```')) {
    const match = trimmed.match(ANY_FENCE);
    if (match) return match[1];
  }
  return trimmed;
}

function parseKind(text: string, kind: JsonKind): JsonExtraction<unknown> {
  const narrowed = narrowToFence(text);
  const block = narrowed.match(kind === 'object' ? OBJECT_BLOCK : ARRAY_BLOCK);
  const candidate = block ? block[0] : narrowed;

  let value: unknown;
  try {
    value = JSON.parse(candidate);
  } catch (error) {
    return {
      ok: false,
      error: `Invalid JSON: ${error instanceof Error ? error.message : String(error)}`,
    };
  }
  return { ok: true, value };
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Extracts a single JSON object from `text`. Never throws. */
export function extractJsonObject(
  text: string,
): JsonExtraction<Record<string, unknown>> {
  const parsed = parseKind(text, 'object');
  if (!parsed.ok) return parsed;
  if (!isPlainObject(parsed.value)) {
    return { ok: false, error: 'Expected a JSON object' };
  }
  return { ok: true, value: parsed.value };
}

/** Extracts a single JSON array from `text`. Never throws. */
export function extractJsonArray(text: string): JsonExtraction<unknown[]> {
  const parsed = parseKind(text, 'array');
  if (!parsed.ok) return parsed;
  if (!Array.isArray(parsed.value)) {
    return { ok: false, error: 'Expected a JSON array' };
  }
  return { ok: true, value: parsed.value };
}
