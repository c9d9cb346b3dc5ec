import { ActiveContext, hasContainer } from '../context/active-context.js';
import { JsonObject, JsonValue, getEntry, hasEntry, isString } from '../value.js';
import { IriCompactionSettings, compactIri } from './iri.js';

function sameLanguage(a: JsonValue | undefined, b: string | null): boolean {
  const left = isString(a) ? a.toLowerCase() : null;
  return left === (b === null ? null : b.toLowerCase());
}

/**
 * Reduces a value object or node reference found under `activeProperty` to
 * a scalar where the term's coercion rules make that lossless. Otherwise
 * returns the value with its keywords aliased.
 */
export function compactValue(
  context: ActiveContext,
  activeProperty: string | null,
  value: JsonObject,
  settings: IriCompactionSettings,
): JsonValue {
  const definition = activeProperty === null ? undefined : context.getTerm(activeProperty);
  const language = definition?.language !== undefined ? definition.language : context.defaultLanguage;
  const direction = definition?.direction !== undefined ? definition.direction : context.defaultDirection;
  const type = definition?.type;
  const indexAllowed = !hasEntry(value, '@index') || hasContainer(definition, '@index');

  const id = getEntry(value, '@id');
  const valueType = getEntry(value, '@type');
  const literal = getEntry(value, '@value');
  const result: JsonObject = { ...value };

  if (isString(id) && Object.keys(value).every((key) => key === '@id' || key === '@index')) {
    if (type === '@id') return compactIri(context, id, settings);
    if (type === '@vocab') return compactIri(context, id, settings, { vocab: true });
  } else if (valueType !== undefined && valueType === type) {
    return literal ?? null;
  } else if (type === '@none' || valueType !== undefined) {
    if (isString(valueType)) {
      result['@type'] = compactIri(context, valueType, settings, { vocab: true });
    }
  } else if (!isString(literal)) {
    if (indexAllowed) return literal ?? null;
  } else if (
    sameLanguage(getEntry(value, '@language'), language) &&
    (getEntry(value, '@direction') ?? null) === direction &&
    indexAllowed
  ) {
    return literal;
  }

  const aliased: JsonObject = {};
  for (const [key, entry] of Object.entries(result)) {
    aliased[compactIri(context, key, settings, { vocab: true })] = entry;
  }
  return aliased;
}
