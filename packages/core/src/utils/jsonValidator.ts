/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import AjvModule from 'ajv';
import type { ErrorObject, ValidateFunction } from 'ajv';
import { existsSync, readFileSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

// ajv is CommonJS; under NodeNext the default import is the module object.
const Ajv = AjvModule.default;
const ajv = new Ajv({ allErrors: true, strict: false });

/**
 * Finds a schema file in <package>/src/schemas (source runs) or beside the
 * compiled output (dist runs).
 */
function findSchema(schemaFile: string): string | undefined {
  const here = dirname(fileURLToPath(import.meta.url));          // …/core/src/utils
  const candidatePaths = [
    resolve(here, '..', 'schemas', schemaFile),
    resolve(here, '..', '..', 'schemas', schemaFile),
  ];
  return candidatePaths.find(existsSync);
}

export function formatValidationErrors(
  errors: ErrorObject[] | null | undefined,
): string[] {
  return (errors ?? []).map((e) => `${e.instancePath || '(root)'} ${e.message ?? 'is invalid'}`);
}

/**
 * Compiles the validator for a schema in `src/schemas`. The returned function
 * is a type guard for `T`; callers keep it rather than compiling per call.
 *
 * @param schemaFile File name, e.g. `"check.schema.json"`
 */
export function compileSchema<T>(schemaFile: string): ValidateFunction<T> {
  const schemaPath = findSchema(schemaFile);
  if (!schemaPath) {
    throw new Error(`Schema "${schemaFile}" not found`);
  }
  return ajv.compile<T>(JSON.parse(readFileSync(schemaPath, 'utf8')));
}

/** Lazily compiles a schema the first time the validator is needed. */
export function lazySchema<T>(schemaFile: string): () => ValidateFunction<T> {
  let validate: ValidateFunction<T> | undefined;
  return () => (validate ??= compileSchema<T>(schemaFile));
}
