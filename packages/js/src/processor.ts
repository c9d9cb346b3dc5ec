/**
 * JsonLdProcessor: JSON-LD 1.1 expansion and compaction
 *
 * Holds processor-wide defaults (resource limits, context allowlist,
 * document loader, base IRI) and merges them into every call. Each call
 * validates its options, checks the input against the resource limits and
 * runs under the processing timeout.
 */

import { Compactor } from './compaction/compact.js';
import { ActiveContext } from './context/active-context.js';
import { processContext } from './context/processing.js';
import { Expander } from './expansion/expand.js';
import { noDocumentLoader, secureDocumentLoader } from './loader.js';
import {
  compactionRun,
  contextProcessingOptions,
  expansionRun,
  validateCompactOptions,
  validateExpandOptions,
} from './options.js';
import { JsonLdOptionsSchema, ProcessorOptionsSchema, validate } from './schemas.js';
import { enforceResourceLimits, resolveResourceLimits, withTimeout } from './security.js';
import type {
  CompactOptions,
  ContextAllowlist,
  DocumentLoader,
  ExpandOptions,
  JsonLdOptions,
  ProcessorOptions,
  ResourceLimits,
} from './types.js';
import { JsonObject, JsonValue, getEntry, isArray, isObject } from './value.js';

/** A context argument may be the context itself or a document carrying `@context`. */
function unwrapContext(context: JsonValue): JsonValue {
  if (isObject(context)) {
    const inner = getEntry(context, '@context');
    if (inner !== undefined) return inner;
  }
  return context;
}

function isEmptyContext(context: JsonValue): boolean {
  if (context === null) return true;
  if (isArray(context)) return context.length === 0;
  return isObject(context) && Object.keys(context).length === 0;
}

export class JsonLdProcessor {
  private readonly options: ProcessorOptions;
  private readonly resourceLimits: Required<ResourceLimits>;

  constructor(options: ProcessorOptions = {}) {
    validate(ProcessorOptionsSchema, options);
    this.options = options;
    this.resourceLimits = resolveResourceLimits(options.resourceLimits);
  }

  // ── Core Operations ───────────────────────────────────────────

  /**
   * Expand a JSON-LD document. The result is always an array; a document
   * that expands to nothing gives `[]`.
   */
  async expand(input: JsonValue, opts: ExpandOptions = {}): Promise<JsonValue[]> {
    const options = this.merge(validateExpandOptions(opts));
    const limits = resolveResourceLimits(options.resourceLimits);
    enforceResourceLimits(input, limits);
    return withTimeout(this.runExpansion(input, options), limits.maxExpansionTime, 'expansion');
  }

  /**
   * Expand `input` against an already processed context. Embedded contexts
   * in the document still apply on top of it.
   */
  async expandWithContext(
    input: JsonValue,
    activeContext: ActiveContext,
    opts: ExpandOptions = {},
  ): Promise<JsonValue[]> {
    const options = this.merge(validateExpandOptions(opts));
    const limits = resolveResourceLimits(options.resourceLimits);
    enforceResourceLimits(input, limits);
    const expander = new Expander(expansionRun(options));
    return withTimeout(
      expander.expandDocument(activeContext, input, options.base ?? activeContext.originalBaseUrl),
      limits.maxExpansionTime,
      'expansion',
    );
  }

  /**
   * Compact a JSON-LD document with `context`. The context is emitted as the
   * result's `@context` unless it is empty.
   */
  async compact(input: JsonValue, context: JsonValue, opts: CompactOptions = {}): Promise<JsonObject> {
    const options = this.merge(validateCompactOptions(opts));
    const limits = resolveResourceLimits(options.resourceLimits);
    enforceResourceLimits(input, limits);
    return withTimeout(this.runCompaction(input, unwrapContext(context), options), limits.maxExpansionTime, 'compaction');
  }

  /**
   * Compact an expanded document against an already processed context. No
   * `@context` entry is added to the result.
   */
  async compactWithContext(
    expanded: JsonValue,
    activeContext: ActiveContext,
    opts: CompactOptions = {},
  ): Promise<JsonObject> {
    const options = this.merge(validateCompactOptions(opts));
    const limits = resolveResourceLimits(options.resourceLimits);
    enforceResourceLimits(expanded, limits);
    const compactor = new Compactor(compactionRun(options));
    return withTimeout(compactor.compactDocument(activeContext, expanded), limits.maxExpansionTime, 'compaction');
  }

  /**
   * Process a local context against `activeContext`. Pass
   * `ActiveContext.initial(base)` to start from an empty context.
   */
  async processContext(
    activeContext: ActiveContext,
    localContext: JsonValue,
    opts: JsonLdOptions = {},
  ): Promise<ActiveContext> {
    validate(JsonLdOptionsSchema, opts);
    const options = this.merge(opts);
    const limits = resolveResourceLimits(options.resourceLimits);
    return withTimeout(
      processContext(
        activeContext,
        unwrapContext(localContext),
        options.base ?? activeContext.originalBaseUrl,
        contextProcessingOptions(options),
      ),
      limits.maxExpansionTime,
      'context processing',
    );
  }

  // ── Configuration ─────────────────────────────────────────────

  /** Resource limits in effect when a call sets none of its own */
  get limits(): Required<ResourceLimits> {
    return { ...this.resourceLimits };
  }

  get contextAllowlist(): ContextAllowlist | undefined {
    return this.options.contextAllowlist;
  }

  // ── Internal ──────────────────────────────────────────────────

  private async runExpansion(
    input: JsonValue,
    options: ExpandOptions,
    processing = contextProcessingOptions(options),
  ): Promise<JsonValue[]> {
    const base = options.base ?? null;
    let context = ActiveContext.initial(base);
    if (options.expandContext !== undefined) {
      context = await processContext(context, unwrapContext(options.expandContext), base, processing);
    }
    return new Expander(expansionRun(options, processing)).expandDocument(context, input, base);
  }

  private async runCompaction(input: JsonValue, localContext: JsonValue, options: CompactOptions): Promise<JsonObject> {
    const processing = contextProcessingOptions(options);
    const base = options.base ?? null;

    const expanded = options.skipExpansion ? input : await this.runExpansion(input, options, processing);

    const context = await processContext(ActiveContext.initial(base), localContext, base, processing);
    const compacted = await new Compactor(compactionRun(options, processing)).compactDocument(context, expanded);
    if (isEmptyContext(localContext)) return compacted;
    return { '@context': localContext, ...compacted };
  }

  /** Per-call options over processor defaults; the allowlist wraps whichever loader wins. */
  private merge<T extends JsonLdOptions>(opts: T): T {
    const loader: DocumentLoader = opts.documentLoader ?? this.options.documentLoader ?? noDocumentLoader;
    const allowlist = this.options.contextAllowlist;
    return {
      ...opts,
      base: opts.base !== undefined ? opts.base : this.options.base,
      processingMode: opts.processingMode ?? this.options.processingMode,
      logger: opts.logger ?? this.options.logger,
      documentLoader: allowlist ? secureDocumentLoader(loader, allowlist) : loader,
      resourceLimits: resolveResourceLimits(this.resourceLimits, opts.resourceLimits),
    };
  }
}

// ── Convenience Functions ─────────────────────────────────────────

const defaultProcessor = new JsonLdProcessor();

/** Expand with a processor that has default settings. */
export function expand(input: JsonValue, options?: ExpandOptions): Promise<JsonValue[]> {
  return defaultProcessor.expand(input, options);
}

/** Compact with a processor that has default settings. */
export function compact(input: JsonValue, context: JsonValue, options?: CompactOptions): Promise<JsonObject> {
  return defaultProcessor.compact(input, context, options);
}

/** Process a local context with a processor that has default settings. */
export function processLocalContext(
  activeContext: ActiveContext,
  localContext: JsonValue,
  options?: JsonLdOptions,
): Promise<ActiveContext> {
  return defaultProcessor.processContext(activeContext, localContext, options);
}
