import { ActiveContext } from './active-context.js';

export type TypeLanguage = '@language' | '@type' | '@any';

/** Preferred term per language/direction key and per type key */
export type TypeLanguageEntry = Record<TypeLanguage, Map<string, string>>;

/**
 * IRI → container key → type/language entry. A container key is the
 * definition's sorted container keywords joined together, or `@none`.
 */
export type InverseContext = Map<string, Map<string, TypeLanguageEntry>>;

function setIfAbsent(map: Map<string, string>, key: string, term: string): void {
  if (!map.has(key)) map.set(key, term);
}

/** `language_direction`, `_direction`, or the language alone */
export function languageDirectionKey(language: string | null | undefined, direction: string | null | undefined): string {
  if (language && direction) return `${language}_${direction}`.toLowerCase();
  if (direction) return `_${direction}`;
  return language ? language.toLowerCase() : '@null';
}

/**
 * Builds the inverse of `context`. Terms are visited shortest first, so the
 * shorter of two competing terms wins each slot.
 */
export function createInverseContext(context: ActiveContext): InverseContext {
  const result: InverseContext = new Map();
  const defaultLanguage = context.defaultLanguage?.toLowerCase() ?? '@none';

  for (const term of context.sortedTerms()) {
    const definition = context.getTerm(term);
    if (definition === undefined || definition.iri === null) continue;

    const container = definition.container.length > 0 ? definition.container.join('') : '@none';

    let containerMap = result.get(definition.iri);
    if (containerMap === undefined) {
      containerMap = new Map();
      result.set(definition.iri, containerMap);
    }
    let entry = containerMap.get(container);
    if (entry === undefined) {
      entry = { '@language': new Map(), '@type': new Map(), '@any': new Map([['@none', term]]) };
      containerMap.set(container, entry);
    }
    const languageMap = entry['@language'];
    const typeMap = entry['@type'];

    if (definition.reverse) {
      setIfAbsent(typeMap, '@reverse', term);
    } else if (definition.type === '@none') {
      setIfAbsent(languageMap, '@any', term);
      setIfAbsent(typeMap, '@any', term);
    } else if (definition.type !== undefined) {
      setIfAbsent(typeMap, definition.type, term);
    } else if (definition.language !== undefined && definition.direction !== undefined) {
      setIfAbsent(languageMap, languageDirectionKey(definition.language, definition.direction), term);
    } else if (definition.language !== undefined) {
      setIfAbsent(languageMap, definition.language ?? '@null', term);
    } else if (definition.direction !== undefined) {
      setIfAbsent(languageMap, definition.direction ? `_${definition.direction}` : '@none', term);
    } else if (context.defaultDirection !== null) {
      setIfAbsent(languageMap, `${defaultLanguage}_${context.defaultDirection}`.toLowerCase(), term);
      setIfAbsent(languageMap, '@none', term);
      setIfAbsent(typeMap, '@none', term);
    } else {
      setIfAbsent(languageMap, defaultLanguage, term);
      setIfAbsent(languageMap, '@none', term);
      setIfAbsent(typeMap, '@none', term);
    }
  }

  return result;
}

/**
 * Picks the term for `iri` whose container is the first match in
 * `containers` and whose type or language is the first match in
 * `preferredValues`.
 */
export function selectTerm(
  context: ActiveContext,
  iri: string,
  containers: readonly string[],
  typeLanguage: TypeLanguage,
  preferredValues: readonly string[],
): string | null {
  const containerMap = context.inverse(createInverseContext).get(iri);
  if (containerMap === undefined) return null;
  for (const container of containers) {
    const entry = containerMap.get(container);
    if (entry === undefined) continue;
    const candidates = entry[typeLanguage];
    for (const preferred of preferredValues) {
      const term = candidates.get(preferred);
      if (term !== undefined) return term;
    }
  }
  return null;
}
