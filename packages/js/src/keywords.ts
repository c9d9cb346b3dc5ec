/**
 * JSON-LD Keywords
 *
 * The reserved keys of JSON-LD 1.1 and the placement rules the context,
 * expansion and compaction algorithms check against them. Keywords are
 * never valid term names.
 */

// ── Node / value keywords ─────────────────────────────────────────
export const KEYWORD_CONTEXT = '@context';
export const KEYWORD_ID = '@id';
export const KEYWORD_TYPE = '@type';
export const KEYWORD_VALUE = '@value';
export const KEYWORD_LANGUAGE = '@language';
export const KEYWORD_DIRECTION = '@direction';
export const KEYWORD_INDEX = '@index';
export const KEYWORD_REVERSE = '@reverse';
export const KEYWORD_GRAPH = '@graph';
export const KEYWORD_INCLUDED = '@included';
export const KEYWORD_NEST = '@nest';
export const KEYWORD_JSON = '@json';
export const KEYWORD_NONE = '@none';

// ── Containers ────────────────────────────────────────────────────
export const KEYWORD_LIST = '@list';
export const KEYWORD_SET = '@set';

// ── Context-only keywords ─────────────────────────────────────────
export const KEYWORD_BASE = '@base';
export const KEYWORD_VOCAB = '@vocab';
export const KEYWORD_VERSION = '@version';
export const KEYWORD_IMPORT = '@import';
export const KEYWORD_PROPAGATE = '@propagate';
export const KEYWORD_PROTECTED = '@protected';
export const KEYWORD_CONTAINER = '@container';
export const KEYWORD_PREFIX = '@prefix';

/** Every keyword defined by JSON-LD 1.1 */
export const KEYWORDS: ReadonlySet<string> = new Set([
  KEYWORD_BASE, KEYWORD_CONTAINER, KEYWORD_CONTEXT, KEYWORD_DIRECTION,
  KEYWORD_GRAPH, KEYWORD_ID, KEYWORD_IMPORT, KEYWORD_INCLUDED,
  KEYWORD_INDEX, KEYWORD_JSON, KEYWORD_LANGUAGE, KEYWORD_LIST,
  KEYWORD_NEST, KEYWORD_NONE, KEYWORD_PREFIX, KEYWORD_PROPAGATE,
  KEYWORD_PROTECTED, KEYWORD_REVERSE, KEYWORD_SET, KEYWORD_TYPE,
  KEYWORD_VALUE, KEYWORD_VERSION, KEYWORD_VOCAB,
]);

/** Entries a local context map may carry besides term definitions */
export const CONTEXT_ENTRY_KEYWORDS: ReadonlySet<string> = new Set([
  KEYWORD_BASE, KEYWORD_DIRECTION, KEYWORD_IMPORT, KEYWORD_LANGUAGE,
  KEYWORD_PROPAGATE, KEYWORD_PROTECTED, KEYWORD_VERSION, KEYWORD_VOCAB,
]);

/** Entries an expanded term definition may carry */
export const TERM_DEFINITION_KEYWORDS: ReadonlySet<string> = new Set([
  KEYWORD_ID, KEYWORD_REVERSE, KEYWORD_CONTAINER, KEYWORD_CONTEXT,
  KEYWORD_DIRECTION, KEYWORD_INDEX, KEYWORD_LANGUAGE, KEYWORD_NEST,
  KEYWORD_PREFIX, KEYWORD_PROTECTED, KEYWORD_TYPE,
]);

/** Entries allowed in an expanded value object */
export const VALUE_OBJECT_KEYWORDS: ReadonlySet<string> = new Set([
  KEYWORD_DIRECTION, KEYWORD_INDEX, KEYWORD_LANGUAGE, KEYWORD_TYPE, KEYWORD_VALUE,
]);

/** Keywords a `@container` mapping may name */
export const CONTAINER_KEYWORDS: ReadonlySet<string> = new Set([
  KEYWORD_GRAPH, KEYWORD_ID, KEYWORD_INDEX, KEYWORD_LANGUAGE,
  KEYWORD_LIST, KEYWORD_SET, KEYWORD_TYPE,
]);

export type Direction = 'ltr' | 'rtl';

export function isKeyword(value: string): boolean {
  return KEYWORDS.has(value);
}

/** `@` followed only by ASCII letters: reserved for future keywords */
export function hasKeywordForm(value: string): boolean {
  return /^@[a-zA-Z]+$/.test(value);
}

export function isDirection(value: unknown): value is Direction {
  return value === 'ltr' || value === 'rtl';
}
