/**
 * @ldform/core: JSON-LD 1.1 expansion and compaction
 *
 * Context processing, expansion and compaction over parsed JSON values,
 * with pluggable document loaders for remote contexts.
 */

// Main processor
export { JsonLdProcessor, expand, compact, processLocalContext } from './processor.js';

// Types
export * from './types.js';
export * from './value.js';
export * from './keywords.js';
export * from './errors.js';
export * from './logger.js';

// Context model
export { ActiveContext, hasContainer } from './context/active-context.js';
export type { TermDefinition, ContextReader } from './context/active-context.js';
export { expandIri } from './context/iri-expansion.js';
export { createInverseContext, selectTerm } from './context/inverse.js';

// Collaborators
export * from './iri.js';
export * from './language.js';
export * from './blank-node.js';
export * from './loader.js';
export * from './security.js';
export * from './schemas.js';
export * from './fixtures.js';
