/**
 * Conformance fixtures
 *
 * A fixture pairs an input document (and, for compaction, a context) with
 * either the expected output or the error code processing must fail with.
 * Outputs are compared with JSON-LD equality: arrays are unordered except
 * the contents of `@list`.
 */

import { z } from 'zod';
import { isJsonLdError } from './errors.js';
import type { ErrorCode } from './errors.js';
import { noDocumentLoader } from './loader.js';
import { JsonLdProcessor } from './processor.js';
import { ConformanceFixtureSchema, JsonValueSchema, parseJson, validate } from './schemas.js';
import type { DocumentLoader } from './types.js';
import { JsonValue, getEntry, isArray, isObject } from './value.js';

export type ConformanceFixture = z.infer<typeof ConformanceFixtureSchema>;

export interface FixtureResult {
  id: string;
  passed: boolean;
  /** Output produced, when processing succeeded */
  actual?: JsonValue;
  /** Code of the error processing failed with */
  error?: ErrorCode;
  message: string;
}

export function parseFixture(data: unknown): ConformanceFixture {
  return validate(ConformanceFixtureSchema, data);
}

/** Parses a JSON array of fixtures. */
export function parseFixtures(text: string): ConformanceFixture[] {
  return validate(z.array(JsonValueSchema), parseJson(text)).map(parseFixture);
}

/**
 * Structural equality where array order is ignored, except inside `@list`.
 */
export function jsonLdEqual(a: JsonValue | undefined, b: JsonValue | undefined, ordered: boolean = false): boolean {
  if (isArray(a) && isArray(b)) {
    if (a.length !== b.length) return false;
    if (ordered) return a.every((item, i) => jsonLdEqual(item, b[i]));
    const used = new Set<number>();
    return a.every((item) => {
      const match = b.findIndex((candidate, i) => !used.has(i) && jsonLdEqual(item, candidate));
      if (match === -1) return false;
      used.add(match);
      return true;
    });
  }
  if (isObject(a) && isObject(b)) {
    const keys = Object.keys(a);
    if (keys.length !== Object.keys(b).length) return false;
    return keys.every((key) => key in b && jsonLdEqual(getEntry(a, key), getEntry(b, key), key === '@list'));
  }
  return a === b;
}

/** Runs one fixture. Errors other than `JsonLdError`s propagate. */
export async function runFixture(
  fixture: ConformanceFixture,
  documentLoader: DocumentLoader = noDocumentLoader,
  processor: JsonLdProcessor = new JsonLdProcessor(),
): Promise<FixtureResult> {
  const options = { ...fixture.options, documentLoader };
  let actual: JsonValue;
  try {
    actual =
      fixture.kind === 'expand'
        ? await processor.expand(fixture.input, options)
        : await processor.compact(fixture.input, fixture.context ?? {}, options);
  } catch (error) {
    if (!isJsonLdError(error)) throw error;
    const passed = fixture.expectedError === error.code;
    return { id: fixture.id, passed, error: error.code, message: error.message };
  }

  if (fixture.expectedError !== undefined) {
    return { id: fixture.id, passed: false, actual, message: `Expected error "${fixture.expectedError}"` };
  }
  const passed = jsonLdEqual(actual, fixture.expected);
  return { id: fixture.id, passed, actual, message: passed ? 'ok' : 'Output differs from the expected document' };
}
