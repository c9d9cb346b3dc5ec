import { ContextReader } from '../context/active-context.js';
import { expandIri } from '../context/iri-expansion.js';
import { Logger } from '../logger.js';
import { JsonObject } from '../value.js';

/**
 * Expands a scalar found under `activeProperty` into a value object or, when
 * the term is typed `@id` or `@vocab`, a node reference.
 */
export function expandValue(
  context: ContextReader,
  activeProperty: string | null,
  value: string | number | boolean,
  logger?: Logger,
): JsonObject {
  const definition = activeProperty === null ? undefined : context.getTerm(activeProperty);
  const type = definition?.type;

  if (typeof value === 'string') {
    if (type === '@id') {
      return { '@id': expandIri(context, value, { documentRelative: true }, logger) };
    }
    if (type === '@vocab') {
      return { '@id': expandIri(context, value, { vocab: true, documentRelative: true }, logger) };
    }
  }

  const result: JsonObject = { '@value': value };
  if (type !== undefined && type !== '@id' && type !== '@vocab' && type !== '@none') {
    result['@type'] = type;
  } else if (typeof value === 'string') {
    const language = definition?.language !== undefined ? definition.language : context.defaultLanguage;
    const direction = definition?.direction !== undefined ? definition.direction : context.defaultDirection;
    if (language !== null) result['@language'] = language;
    if (direction !== null) result['@direction'] = direction;
  }
  return result;
}
