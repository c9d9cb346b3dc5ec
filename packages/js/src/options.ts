/**
 * Resolves caller options into the settings each engine runs with.
 */

import { BlankNodeIssuer } from './blank-node.js';
import type { CompactionRun } from './compaction/compact.js';
import type { ContextProcessingOptions } from './context/processing.js';
import type { ExpansionRun } from './expansion/expand.js';
import { noDocumentLoader } from './loader.js';
import { silentLogger } from './logger.js';
import { CompactOptionsSchema, ExpandOptionsSchema, validate } from './schemas.js';
import { resolveResourceLimits } from './security.js';
import type { CompactOptions, ExpandOptions, JsonLdOptions, ResourceLimits } from './types.js';

/** Checks an expansion option object; throws a ZodError when malformed. */
export function validateExpandOptions(options: ExpandOptions): ExpandOptions {
  validate(ExpandOptionsSchema, options);
  return options;
}

/** Checks a compaction option object; throws a ZodError when malformed. */
export function validateCompactOptions(options: CompactOptions): CompactOptions {
  validate(CompactOptionsSchema, options);
  return options;
}

/** Settings for context processing; every call gets a fresh remote-context cache. */
export function contextProcessingOptions(options: JsonLdOptions): ContextProcessingOptions {
  const limits = resolveResourceLimits(options.resourceLimits);
  return {
    documentLoader: options.documentLoader ?? noDocumentLoader,
    processingMode: options.processingMode ?? 'json-ld-1.1',
    logger: options.logger ?? silentLogger,
    maxContextDepth: limits.maxContextDepth,
    remoteCache: new Map(),
  };
}

export function expansionRun(options: ExpandOptions, processing = contextProcessingOptions(options)): ExpansionRun {
  const limits: Required<ResourceLimits> = resolveResourceLimits(options.resourceLimits);
  return {
    options: processing,
    ordered: options.ordered ?? false,
    policy: options.policy ?? 'standard',
    issuer: options.generator ? new BlankNodeIssuer(options.generator) : undefined,
    maxDepth: limits.maxGraphDepth,
  };
}

export function compactionRun(options: CompactOptions, processing = contextProcessingOptions(options)): CompactionRun {
  return {
    options: processing,
    compactArrays: options.compactArrays ?? true,
    compactToRelative: options.compactToRelative ?? true,
    ordered: options.ordered ?? false,
  };
}
