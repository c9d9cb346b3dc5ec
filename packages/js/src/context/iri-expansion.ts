import { hasKeywordForm, isKeyword } from '../keywords.js';
import { isAbsoluteIri, resolveIri, splitCompactIri } from '../iri.js';
import { Logger, warn } from '../logger.js';
import { ContextReader } from './active-context.js';

export interface IriExpansionFlags {
  /** Resolve terms and the vocabulary mapping (property and type positions) */
  vocab?: boolean;
  /** Resolve against the base IRI (identifier positions) */
  documentRelative?: boolean;
}

/**
 * IRI expansion. Resolution rules apply in a fixed order: keyword, term,
 * compact IRI, absolute IRI, then vocabulary or base resolution.
 *
 * Returns null for values that only look like keywords and for terms
 * explicitly mapped to null.
 */
export function expandIri(
  context: ContextReader,
  value: string,
  flags: IriExpansionFlags = {},
  logger?: Logger,
): string | null {
  if (isKeyword(value)) return value;

  if (hasKeywordForm(value)) {
    if (logger) {
      warn(logger, { code: 'keyword-like value', message: `Ignoring keyword-like value "${value}"` });
    }
    return null;
  }

  const definition = context.getTerm(value);
  if (definition !== undefined && definition.iri !== null && isKeyword(definition.iri)) {
    return definition.iri;
  }
  if (flags.vocab && definition !== undefined) {
    return definition.iri;
  }

  const compact = splitCompactIri(value);
  if (compact !== undefined) {
    if (compact.prefix === '_' || compact.suffix.startsWith('//')) {
      return value;
    }
    const prefix = context.getTerm(compact.prefix);
    if (prefix !== undefined && prefix.iri !== null && prefix.prefix) {
      return prefix.iri + compact.suffix;
    }
    if (isAbsoluteIri(value)) return value;
  }

  if (flags.vocab && context.vocab !== null) {
    return context.vocab + value;
  }
  if (flags.documentRelative) {
    return resolveIri(context.baseIri, value);
  }
  return value;
}
