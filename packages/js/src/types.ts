/**
 * Core type definitions: processing options, document loading and limits.
 */

import type { BlankNodeGenerator } from './blank-node.js';
import type { Logger } from './logger.js';
import type { JsonValue } from './value.js';

// ── Document Loading ──────────────────────────────────────────────

/** A document retrieved by a {@link DocumentLoader} */
export interface RemoteDocument {
  /** Parsed content */
  document: JsonValue;
  /** Final IRI after redirects; used as the base of a loaded context */
  documentUrl: string;
  /** Context linked from the response, when the transport carries one */
  contextUrl?: string | null;
}

/**
 * Retrieves a document by IRI. Rejections are expected to be
 * `DocumentLoaderError`s; any other error is treated as a loading failure.
 */
export type DocumentLoader = (url: string) => Promise<RemoteDocument>;

// ── Security ──────────────────────────────────────────────────────

/** Resource limits for processor configuration */
export interface ResourceLimits {
  /** Maximum chain of nested remote contexts (default: 10) */
  maxContextDepth?: number;
  /** Maximum nesting depth of the document tree (default: 100) */
  maxGraphDepth?: number;
  /** Maximum input document size in bytes of its JSON text (default: 10MB) */
  maxDocumentSize?: number;
  /** Processing timeout in milliseconds (default: 30000) */
  maxExpansionTime?: number;
}

/** Context allowlist configuration */
export interface ContextAllowlist {
  /** Exact context IRIs that are allowed */
  allowed?: string[];
  /** Glob/regex patterns for allowed contexts */
  patterns?: (string | RegExp)[];
  /** Block all remote context loading */
  blockRemoteContexts?: boolean;
}

// ── Processing Options ────────────────────────────────────────────

export type ProcessingMode = 'json-ld-1.0' | 'json-ld-1.1';

/**
 * What expansion does with a key that maps to no IRI.
 *
 * - `relaxed`: keep the key as written
 * - `standard`: drop it
 * - `strict`: fail unless the key contains a colon
 * - `strictest`: fail unless the key expands to an absolute IRI or blank node
 */
export type KeyPolicy = 'relaxed' | 'standard' | 'strict' | 'strictest';

/** Options shared by every entry point */
export interface JsonLdOptions {
  /** Base IRI of the input document */
  base?: string | null;
  /** Context applied before the document's own contexts */
  expandContext?: JsonValue;
  /** Default: json-ld-1.1 */
  processingMode?: ProcessingMode;
  /** Process map entries in code-point order */
  ordered?: boolean;
  documentLoader?: DocumentLoader;
  logger?: Logger;
  resourceLimits?: ResourceLimits;
}

export interface ExpandOptions extends JsonLdOptions {
  /** Default: standard */
  policy?: KeyPolicy;
  /** Relabels blank nodes and names anonymous nodes when set */
  generator?: BlankNodeGenerator;
}

export interface CompactOptions extends ExpandOptions {
  /** Collapse single-element arrays (default: true) */
  compactArrays?: boolean;
  /** Make identifiers relative to the base IRI (default: true) */
  compactToRelative?: boolean;
  /** The input is already expanded */
  skipExpansion?: boolean;
}

/** Defaults held by a {@link JsonLdProcessor} and merged into every call */
export interface ProcessorOptions {
  /** Security: resource limits */
  resourceLimits?: ResourceLimits;
  /** Security: context allowlist */
  contextAllowlist?: ContextAllowlist;
  base?: string | null;
  processingMode?: ProcessingMode;
  documentLoader?: DocumentLoader;
  logger?: Logger;
}
