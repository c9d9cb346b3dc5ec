/**
 * Error taxonomy.
 *
 * Every failure the engine reports is a `JsonLdError` carrying one code from
 * the closed `ErrorCode` union. Codes are the JSON-LD 1.1 error codes, plus
 * `key expansion failed` for the strict key policies and `resource limit
 * exceeded` for the depth, size and time guards.
 */

export const ERROR_CODES = [
  'colliding keywords',
  'compaction to list of lists',
  'conflicting indexes',
  'context overflow',
  'cyclic IRI mapping',
  'invalid @id value',
  'invalid @import value',
  'invalid @included value',
  'invalid @index value',
  'invalid @nest value',
  'invalid @prefix value',
  'invalid @propagate value',
  'invalid @protected value',
  'invalid @reverse value',
  'invalid @version value',
  'invalid base direction',
  'invalid base IRI',
  'invalid container mapping',
  'invalid context entry',
  'invalid context IRI',
  'invalid context nullification',
  'invalid default language',
  'invalid IRI mapping',
  'invalid JSON literal',
  'invalid keyword alias',
  'invalid language map value',
  'invalid language mapping',
  'invalid language-tagged string',
  'invalid language-tagged value',
  'invalid local context',
  'invalid remote context',
  'invalid reverse property',
  'invalid reverse property map',
  'invalid reverse property value',
  'invalid scoped context',
  'invalid set or list object',
  'invalid term definition',
  'invalid type mapping',
  'invalid type value',
  'invalid typed value',
  'invalid value object',
  'invalid value object value',
  'invalid vocab mapping',
  'IRI confused with prefix',
  'keyword redefinition',
  'list of lists',
  'loading document failed',
  'loading remote context failed',
  'processing mode conflict',
  'protected term redefinition',
  'recursive context inclusion',
  'key expansion failed',
  'resource limit exceeded',
] as const;

export type ErrorCode = (typeof ERROR_CODES)[number];

export class JsonLdError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'JsonLdError';
    this.code = code;
  }
}

export function isJsonLdError(error: unknown): error is JsonLdError {
  return error instanceof JsonLdError;
}

// ── Document loading ──────────────────────────────────────────────

export type DocumentLoaderErrorKind = 'not found' | 'loading failed';

/** Raised by document loaders; context processing wraps it in a `JsonLdError`. */
export class DocumentLoaderError extends Error {
  readonly kind: DocumentLoaderErrorKind;
  readonly url: string;

  constructor(kind: DocumentLoaderErrorKind, url: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DocumentLoaderError';
    this.kind = kind;
    this.url = url;
  }
}

// ── Warnings ──────────────────────────────────────────────────────

export type WarningCode =
  | 'keyword-like term'
  | 'keyword-like value'
  | 'malformed language tag'
  | 'ignored entry';

/** A condition the algorithms tolerate but report through the logger. */
export interface ProcessingWarning {
  code: WarningCode;
  message: string;
}
