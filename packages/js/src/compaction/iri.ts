import { ActiveContext } from '../context/active-context.js';
import { TypeLanguage, selectTerm } from '../context/inverse.js';
import { JsonLdError } from '../errors.js';
import { isAbsoluteIri, relativizeIri, splitCompactIri } from '../iri.js';
import type { ProcessingMode } from '../types.js';
import {
  JsonValue,
  asArray,
  compareShortestLeast,
  getEntry,
  hasEntry,
  isGraphObject,
  isListObject,
  isObject,
  isString,
  isValueObject,
} from '../value.js';

export interface IriCompactionSettings {
  processingMode: ProcessingMode;
  /** Express identifiers relative to the base IRI */
  compactToRelative: boolean;
}

export interface IriCompactionFlags {
  /** The value the IRI is a property of; steers term selection */
  value?: JsonValue;
  /** Property or type position: terms and the vocabulary mapping may be used */
  vocab?: boolean;
  reverse?: boolean;
}

function languageDirection(value: JsonValue): string {
  const language = isObject(value) ? getEntry(value, '@language') : undefined;
  const direction = isObject(value) ? getEntry(value, '@direction') : undefined;
  return `${isString(language) ? language : ''}_${isString(direction) ? direction : ''}`.toLowerCase();
}

/** Container keys and preferred type/language values for term selection. */
function selectionCriteria(
  context: ActiveContext,
  value: JsonValue | undefined,
  reverse: boolean,
  mode: ProcessingMode,
): { containers: string[]; typeLanguage: TypeLanguage; preferredValues: string[] } {
  const defaultLanguage =
    context.defaultDirection !== null
      ? `${context.defaultLanguage ?? ''}_${context.defaultDirection}`.toLowerCase()
      : (context.defaultLanguage ?? '@none').toLowerCase();

  const containers: string[] = [];
  let typeLanguage: TypeLanguage = '@language';
  let typeLanguageValue = '@null';
  const hasIndex = isObject(value) && hasEntry(value, '@index');

  if (hasIndex && !isGraphObject(value)) {
    containers.push('@index', '@index@set');
  }

  if (reverse) {
    typeLanguage = '@type';
    typeLanguageValue = '@reverse';
    containers.push('@set');
  } else if (isListObject(value)) {
    if (!hasIndex) containers.push('@list');
    const list = asArray(getEntry(value, '@list'));
    let commonType: string | null = null;
    let commonLanguage: string | null = list.length === 0 ? defaultLanguage : null;

    for (const item of list) {
      let itemLanguage = '@none';
      let itemType = '@none';
      if (isValueObject(item)) {
        const type = getEntry(item, '@type');
        const language = getEntry(item, '@language');
        if (hasEntry(item, '@direction')) {
          itemLanguage = languageDirection(item);
        } else if (isString(language)) {
          itemLanguage = language.toLowerCase();
        } else if (isString(type)) {
          itemType = type;
        } else {
          itemLanguage = '@null';
        }
      } else {
        itemType = '@id';
      }

      if (commonLanguage === null) {
        commonLanguage = itemLanguage;
      } else if (itemLanguage !== commonLanguage && isValueObject(item)) {
        commonLanguage = '@none';
      }
      if (commonType === null) {
        commonType = itemType;
      } else if (itemType !== commonType) {
        commonType = '@none';
      }
      if (commonLanguage === '@none' && commonType === '@none') break;
    }

    commonLanguage ??= '@none';
    commonType ??= '@none';
    if (commonType !== '@none') {
      typeLanguage = '@type';
      typeLanguageValue = commonType;
    } else {
      typeLanguageValue = commonLanguage;
    }
  } else if (isGraphObject(value)) {
    const graphHasIndex = hasEntry(value, '@index');
    const graphHasId = hasEntry(value, '@id');
    if (graphHasIndex) containers.push('@graph@index', '@graph@index@set');
    if (graphHasId) containers.push('@graph@id', '@graph@id@set');
    containers.push('@graph', '@graph@set', '@set');
    if (!graphHasIndex) containers.push('@graph@index', '@graph@index@set');
    if (!graphHasId) containers.push('@graph@id', '@graph@id@set');
    containers.push('@index', '@index@set');
    typeLanguage = '@type';
    typeLanguageValue = '@id';
  } else {
    if (isValueObject(value)) {
      const language = getEntry(value, '@language');
      const type = getEntry(value, '@type');
      if (hasEntry(value, '@direction') && !hasIndex) {
        typeLanguageValue = languageDirection(value);
        containers.push('@language', '@language@set');
      } else if (isString(language) && !hasIndex) {
        typeLanguageValue = language.toLowerCase();
        containers.push('@language', '@language@set');
      } else if (isString(type)) {
        typeLanguage = '@type';
        typeLanguageValue = type;
      }
    } else {
      typeLanguage = '@type';
      typeLanguageValue = '@id';
      containers.push('@id', '@id@set', '@type', '@set@type');
    }
    containers.push('@set');
  }

  containers.push('@none');
  if (mode !== 'json-ld-1.0') {
    if (!hasIndex) containers.push('@index', '@index@set');
    if (isValueObject(value) && Object.keys(value).length === 1) {
      containers.push('@language', '@language@set');
    }
  }

  const preferredValues: string[] = [];
  if (typeLanguageValue === '@reverse') preferredValues.push('@reverse');

  const id = isObject(value) ? getEntry(value, '@id') : undefined;
  if ((typeLanguageValue === '@id' || typeLanguageValue === '@reverse') && isString(id)) {
    const compactedId = compactIri(context, id, { processingMode: mode, compactToRelative: true }, { vocab: true });
    if (context.getTerm(compactedId)?.iri === id) {
      preferredValues.push('@vocab', '@id', '@none');
    } else {
      preferredValues.push('@id', '@vocab', '@none');
    }
  } else {
    preferredValues.push(typeLanguageValue, '@none');
    if (isListObject(value) && asArray(getEntry(value, '@list')).length === 0) {
      typeLanguage = '@any';
    }
  }
  preferredValues.push('@any');

  for (const preferred of [...preferredValues]) {
    const underscore = preferred.indexOf('_');
    if (underscore !== -1) preferredValues.push(preferred.slice(underscore));
  }

  return { containers, typeLanguage, preferredValues };
}

/**
 * Shortest form of `iri` under `context`: a term, a compact IRI, a suffix of
 * the vocabulary mapping, a relative IRI, or the IRI itself.
 */
export function compactIri(
  context: ActiveContext,
  iri: string,
  settings: IriCompactionSettings,
  flags: IriCompactionFlags = {},
): string {
  const vocab = flags.vocab ?? false;

  if (vocab) {
    const { containers, typeLanguage, preferredValues } = selectionCriteria(
      context,
      flags.value,
      flags.reverse ?? false,
      settings.processingMode,
    );
    const term = selectTerm(context, iri, containers, typeLanguage, preferredValues);
    if (term !== null) return term;

    if (context.vocab !== null && iri.startsWith(context.vocab) && iri.length > context.vocab.length) {
      const suffix = iri.slice(context.vocab.length);
      if (!context.hasTerm(suffix)) return suffix;
    }
  }

  let best: string | null = null;
  for (const [term, definition] of context.terms()) {
    if (definition.iri === null || definition.iri === iri || !definition.prefix || !iri.startsWith(definition.iri)) {
      continue;
    }
    const candidate = `${term}:${iri.slice(definition.iri.length)}`;
    const existing = context.getTerm(candidate);
    const usable =
      existing === undefined ||
      (existing.iri === iri && (flags.value === undefined || flags.value === null));
    if (usable && (best === null || compareShortestLeast(candidate, best) < 0)) {
      best = candidate;
    }
  }
  if (best !== null) return best;

  if (isAbsoluteIri(iri)) {
    const compact = splitCompactIri(iri);
    if (compact !== undefined && !compact.suffix.startsWith('//') && context.getTerm(compact.prefix)?.prefix === true) {
      throw new JsonLdError('IRI confused with prefix', `Absolute IRI ${iri} looks like a compact IRI`);
    }
  }

  if (!vocab && settings.compactToRelative) {
    return relativizeIri(context.baseIri, iri);
  }
  return iri;
}
