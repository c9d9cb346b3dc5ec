/**
 * Context processing: merges a local context into an active context and
 * creates the term definitions it declares.
 */

import { DocumentLoaderError, JsonLdError, isJsonLdError } from '../errors.js';
import { endsWithGenDelim, isAbsoluteIri, isBlankNodeIdentifier, isIdentifier, resolveIri, splitCompactIri } from '../iri.js';
import {
  CONTAINER_KEYWORDS,
  CONTEXT_ENTRY_KEYWORDS,
  TERM_DEFINITION_KEYWORDS,
  hasKeywordForm,
  isDirection,
  isKeyword,
} from '../keywords.js';
import { normalizeLanguage } from '../language.js';
import { Logger, warn } from '../logger.js';
import type { DocumentLoader, ProcessingMode, RemoteDocument } from '../types.js';
import { JsonObject, JsonValue, asArray, getEntry, hasEntry, isObject, isString } from '../value.js';
import { ActiveContext, ContextDraft, TermDefinition, sameDefinition } from './active-context.js';
import { IriExpansionFlags, expandIri } from './iri-expansion.js';

/** A remote context after dereferencing */
export interface LoadedContext {
  /** The `@context` entry of the retrieved document */
  context: JsonValue;
  /** Base URL for the loaded context */
  documentUrl: string;
}

/** Settings that stay fixed for one processing run. */
export interface ContextProcessingOptions {
  documentLoader: DocumentLoader;
  processingMode: ProcessingMode;
  logger: Logger;
  /** Longest chain of remote contexts loading one another */
  maxContextDepth: number;
  /** Remote contexts already requested during this run */
  remoteCache: Map<string, Promise<LoadedContext>>;
}

export interface ContextProcessingFlags {
  /** IRIs of the remote contexts currently being processed, outermost first */
  remoteContexts?: readonly string[];
  /** Allow protected terms to be replaced (property-scoped contexts) */
  overrideProtected?: boolean;
  /** Whether the result survives into nested node objects (default: true) */
  propagate?: boolean;
  /** Re-process remote contexts already seen in the chain (default: true) */
  validateScopedContext?: boolean;
}

type Writable<T> = { -readonly [K in keyof T]: T[K] };

const TYPE_MAPPING_KEYWORDS = new Set(['@id', '@json', '@none', '@vocab']);
const CONTAINERS_1_0 = new Set(['@list', '@set', '@index', '@language']);
const GRAPH_COMPANIONS = new Set(['@id', '@index', '@set']);
const REVERSE_CONTAINERS = new Set(['@index', '@set']);

/**
 * Processes `localContext` against `activeContext` and returns the resulting
 * snapshot. `baseUrl` resolves relative context references.
 */
export async function processContext(
  activeContext: ActiveContext,
  localContext: JsonValue,
  baseUrl: string | null,
  options: ContextProcessingOptions,
  flags: ContextProcessingFlags = {},
): Promise<ActiveContext> {
  const remoteContexts = flags.remoteContexts ?? [];
  const overrideProtected = flags.overrideProtected ?? false;
  const validateScopedContext = flags.validateScopedContext ?? true;
  let propagate = flags.propagate ?? true;

  let result = activeContext.edit();

  if (isObject(localContext)) {
    const value = getEntry(localContext, '@propagate');
    if (typeof value === 'boolean') propagate = value;
  }
  if (!propagate && result.previousContext === null) {
    result.previousContext = activeContext;
  }

  for (const context of asArray(localContext)) {
    if (context === null) {
      if (!overrideProtected && result.hasProtectedTerms()) {
        throw new JsonLdError(
          'invalid context nullification',
          'Cannot nullify a context that contains protected terms',
        );
      }
      const prior = result.freeze();
      result = ActiveContext.initial(activeContext.originalBaseUrl).edit();
      if (!propagate) result.previousContext = prior;
      continue;
    }

    if (isString(context)) {
      const url = resolveIri(baseUrl, context);
      if (!isAbsoluteIri(url)) {
        throw new JsonLdError('invalid context IRI', `Cannot resolve context reference "${context}" without a base IRI`);
      }
      if (!validateScopedContext && remoteContexts.includes(url)) continue;
      if (remoteContexts.includes(url)) {
        throw new JsonLdError('recursive context inclusion', `Context "${url}" includes itself`);
      }
      if (remoteContexts.length >= options.maxContextDepth) {
        throw new JsonLdError(
          'context overflow',
          `Remote contexts nest deeper than ${options.maxContextDepth} levels`,
        );
      }
      const loaded = await loadRemoteContext(url, options);
      const processed = await processContext(result.freeze(), loaded.context, loaded.documentUrl, options, {
        remoteContexts: [...remoteContexts, url],
        overrideProtected,
        validateScopedContext,
      });
      result = processed.edit();
      continue;
    }

    if (!isObject(context)) {
      throw new JsonLdError('invalid local context', 'A local context must be null, a string or a map');
    }

    const definitions = await applyImport(context, baseUrl, options);
    applyContextEntries(result, definitions, remoteContexts.length === 0, options);

    const definer = new TermDefiner(result, definitions, options, {
      baseUrl,
      protectedDefault: getEntry(definitions, '@protected') === true,
      overrideProtected,
      remoteContexts,
    });
    await definer.defineAll();
  }

  return result.freeze();
}

async function loadRemoteContext(url: string, options: ContextProcessingOptions): Promise<LoadedContext> {
  let pending = options.remoteCache.get(url);
  if (pending === undefined) {
    options.logger.debug(`Loading remote context ${url}`);
    pending = dereferenceContext(url, options.documentLoader);
    options.remoteCache.set(url, pending);
  }
  return pending;
}

async function dereferenceContext(url: string, loader: DocumentLoader): Promise<LoadedContext> {
  let remote: RemoteDocument;
  try {
    remote = await loader(url);
  } catch (error) {
    const reason = error instanceof DocumentLoaderError ? `${error.kind}: ${error.message}` : String(error);
    throw new JsonLdError('loading remote context failed', `Failed to load remote context ${url} (${reason})`, {
      cause: error,
    });
  }
  const { document } = remote;
  if (!isObject(document) || !hasEntry(document, '@context')) {
    throw new JsonLdError('invalid remote context', `Document at ${url} has no top-level @context`);
  }
  return { context: getEntry(document, '@context') ?? null, documentUrl: remote.documentUrl };
}

/** Merges the context named by `@import` under the entries of `context`. */
async function applyImport(
  context: JsonObject,
  baseUrl: string | null,
  options: ContextProcessingOptions,
): Promise<JsonObject> {
  const value = getEntry(context, '@import');
  if (value === undefined) return context;

  if (options.processingMode === 'json-ld-1.0') {
    throw new JsonLdError('invalid context entry', '@import is not available in json-ld-1.0 mode');
  }
  if (!isString(value)) {
    throw new JsonLdError('invalid @import value', '@import must be a string');
  }
  const url = resolveIri(baseUrl, value);
  const loaded = await loadRemoteContext(url, options);
  if (!isObject(loaded.context)) {
    throw new JsonLdError('invalid remote context', `Imported context ${url} is not a map`);
  }
  if (hasEntry(loaded.context, '@import')) {
    throw new JsonLdError('invalid context entry', `Imported context ${url} must not contain @import`);
  }
  return { ...loaded.context, ...context };
}

function applyContextEntries(
  result: ContextDraft,
  context: JsonObject,
  acceptBase: boolean,
  options: ContextProcessingOptions,
): void {
  const { processingMode: mode, logger } = options;

  const version = getEntry(context, '@version');
  if (version !== undefined) {
    if (version !== 1.1) {
      throw new JsonLdError('invalid @version value', `Unsupported @version ${JSON.stringify(version)}`);
    }
    if (mode === 'json-ld-1.0') {
      throw new JsonLdError('processing mode conflict', '@version 1.1 conflicts with json-ld-1.0 mode');
    }
  }

  const base = getEntry(context, '@base');
  if (base !== undefined && acceptBase) {
    if (base === null) {
      result.baseIri = null;
    } else if (!isString(base)) {
      throw new JsonLdError('invalid base IRI', '@base must be a string or null');
    } else if (isAbsoluteIri(base)) {
      result.baseIri = base;
    } else if (result.baseIri !== null) {
      result.baseIri = resolveIri(result.baseIri, base);
    } else {
      throw new JsonLdError('invalid base IRI', `Cannot resolve relative @base "${base}" without a base IRI`);
    }
  }

  const vocab = getEntry(context, '@vocab');
  if (vocab !== undefined) {
    if (vocab === null) {
      result.vocab = null;
    } else if (!isString(vocab)) {
      throw new JsonLdError('invalid vocab mapping', '@vocab must be a string or null');
    } else {
      const expanded = expandIri(result, vocab, { vocab: true, documentRelative: true }, logger);
      if (expanded === null || !isIdentifier(expanded)) {
        throw new JsonLdError('invalid vocab mapping', `@vocab "${vocab}" is not an IRI or blank node identifier`);
      }
      result.vocab = expanded;
    }
  }

  const language = getEntry(context, '@language');
  if (language !== undefined) {
    if (language === null) {
      result.defaultLanguage = null;
    } else if (isString(language)) {
      result.defaultLanguage = normalizeLanguage(language, logger);
    } else {
      throw new JsonLdError('invalid default language', '@language must be a string or null');
    }
  }

  const direction = getEntry(context, '@direction');
  if (direction !== undefined) {
    if (mode === 'json-ld-1.0') {
      throw new JsonLdError('invalid context entry', '@direction is not available in json-ld-1.0 mode');
    }
    if (direction === null) {
      result.defaultDirection = null;
    } else if (isDirection(direction)) {
      result.defaultDirection = direction;
    } else {
      throw new JsonLdError('invalid base direction', '@direction must be "ltr", "rtl" or null');
    }
  }

  const propagate = getEntry(context, '@propagate');
  if (propagate !== undefined) {
    if (mode === 'json-ld-1.0') {
      throw new JsonLdError('invalid context entry', '@propagate is not available in json-ld-1.0 mode');
    }
    if (typeof propagate !== 'boolean') {
      throw new JsonLdError('invalid @propagate value', '@propagate must be a boolean');
    }
  }

  const protectedValue = getEntry(context, '@protected');
  if (protectedValue !== undefined && typeof protectedValue !== 'boolean') {
    throw new JsonLdError('invalid @protected value', '@protected must be a boolean');
  }
}

function isTypeTermRedefinition(value: JsonValue | undefined): boolean {
  if (!isObject(value) || getEntry(value, '@container') !== '@set') return false;
  return Object.keys(value).every((key) => key === '@container' || key === '@protected');
}

function parseContainer(value: JsonValue, mode: ProcessingMode, reverse: boolean): string[] {
  const invalid = () =>
    new JsonLdError('invalid container mapping', `Invalid @container value ${JSON.stringify(value)}`);

  if (mode === 'json-ld-1.0' && !(isString(value) && CONTAINERS_1_0.has(value))) {
    throw invalid();
  }
  const entries = asArray(value);
  const containers = entries.filter(isString);
  if (containers.length !== entries.length || containers.some((c) => !CONTAINER_KEYWORDS.has(c))) {
    throw invalid();
  }

  if (reverse) {
    if (containers.some((c) => !REVERSE_CONTAINERS.has(c))) {
      throw new JsonLdError('invalid reverse property', 'Reverse properties only accept @index or @set containers');
    }
  } else if (containers.includes('@list')) {
    if (containers.length !== 1) throw invalid();
  } else if (containers.includes('@graph')) {
    const others = containers.filter((c) => c !== '@graph');
    if (others.some((c) => !GRAPH_COMPANIONS.has(c))) throw invalid();
    if (others.includes('@id') && others.includes('@index')) throw invalid();
  } else if (containers.length > 2 || (containers.length === 2 && !containers.includes('@set'))) {
    throw invalid();
  }

  return [...new Set(containers)].sort();
}

/** `:` somewhere other than the first or last character */
function hasInnerColon(term: string): boolean {
  return term.slice(1, -1).includes(':');
}

interface TermDefinerSettings {
  baseUrl: string | null;
  /** Value of the local context's own `@protected` entry */
  protectedDefault: boolean;
  overrideProtected: boolean;
  remoteContexts: readonly string[];
}

/**
 * Creates the term definitions of one local context map. Terms referenced
 * from other definitions in the same map are defined first; `defined`
 * tracks progress so cycles surface as errors.
 */
class TermDefiner {
  /** false while a term is being defined, true once done */
  private readonly defined = new Map<string, boolean>();

  constructor(
    private readonly draft: ContextDraft,
    private readonly local: JsonObject,
    private readonly options: ContextProcessingOptions,
    private readonly settings: TermDefinerSettings,
  ) {}

  async defineAll(): Promise<void> {
    for (const term of Object.keys(this.local)) {
      if (CONTEXT_ENTRY_KEYWORDS.has(term)) continue;
      await this.define(term);
    }
  }

  private async define(term: string): Promise<void> {
    const state = this.defined.get(term);
    if (state === true) return;
    if (state === false) {
      throw new JsonLdError('cyclic IRI mapping', `Cyclic IRI mapping detected for term "${term}"`);
    }
    if (term === '') {
      throw new JsonLdError('invalid term definition', 'The empty string cannot be defined as a term');
    }
    this.defined.set(term, false);

    const { processingMode: mode, logger } = this.options;
    const value = getEntry(this.local, term) ?? null;

    if (term === '@type') {
      if (mode === 'json-ld-1.0' || !isTypeTermRedefinition(value)) {
        throw new JsonLdError('keyword redefinition', '@type may only be given a @set container');
      }
    } else if (isKeyword(term)) {
      throw new JsonLdError('keyword redefinition', `Keyword ${term} cannot be redefined`);
    } else if (hasKeywordForm(term)) {
      warn(logger, { code: 'keyword-like term', message: `Ignoring keyword-like term "${term}"` });
      this.defined.set(term, true);
      return;
    }

    const previous = this.draft.getTerm(term);
    this.draft.removeTerm(term);

    let simpleTerm = false;
    let map: JsonObject;
    if (value === null) {
      map = { '@id': null };
    } else if (isString(value)) {
      map = { '@id': value };
      simpleTerm = true;
    } else if (isObject(value)) {
      map = value;
    } else {
      throw new JsonLdError('invalid term definition', `Definition of "${term}" must be a string, map or null`);
    }

    const definition: Writable<TermDefinition> = {
      iri: null,
      prefix: false,
      protected: this.settings.protectedDefault,
      reverse: false,
      container: [],
    };

    const protectedValue = getEntry(map, '@protected');
    if (protectedValue !== undefined) {
      if (mode === 'json-ld-1.0') {
        throw new JsonLdError('invalid term definition', '@protected is not available in json-ld-1.0 mode');
      }
      if (typeof protectedValue !== 'boolean') {
        throw new JsonLdError('invalid @protected value', `@protected of "${term}" must be a boolean`);
      }
      definition.protected = protectedValue;
    }

    const typeValue = getEntry(map, '@type');
    if (typeValue !== undefined) {
      if (!isString(typeValue)) {
        throw new JsonLdError('invalid type mapping', `@type of "${term}" must be a string`);
      }
      const type = await this.expand(typeValue, { vocab: true });
      if (type === null || ((type === '@json' || type === '@none') && mode === 'json-ld-1.0')) {
        throw new JsonLdError('invalid type mapping', `Invalid @type "${typeValue}" for "${term}"`);
      }
      if (!TYPE_MAPPING_KEYWORDS.has(type) && !isAbsoluteIri(type)) {
        throw new JsonLdError('invalid type mapping', `Invalid @type "${typeValue}" for "${term}"`);
      }
      definition.type = type;
    }

    const reverseValue = getEntry(map, '@reverse');
    const idValue = getEntry(map, '@id');
    if (reverseValue !== undefined) {
      if (idValue !== undefined || hasEntry(map, '@nest')) {
        throw new JsonLdError('invalid reverse property', `Reverse term "${term}" cannot have @id or @nest`);
      }
      if (!isString(reverseValue)) {
        throw new JsonLdError('invalid IRI mapping', `@reverse of "${term}" must be a string`);
      }
      if (hasKeywordForm(reverseValue)) {
        warn(logger, { code: 'keyword-like value', message: `Ignoring term "${term}" reversing "${reverseValue}"` });
        this.defined.set(term, true);
        return;
      }
      const iri = await this.expand(reverseValue, { vocab: true });
      if (iri === null || !isIdentifier(iri)) {
        throw new JsonLdError('invalid IRI mapping', `@reverse of "${term}" is not an IRI`);
      }
      definition.iri = iri;
      definition.reverse = true;
    } else if (idValue !== undefined && idValue !== term) {
      if (idValue !== null) {
        if (!isString(idValue)) {
          throw new JsonLdError('invalid IRI mapping', `@id of "${term}" must be a string or null`);
        }
        if (!isKeyword(idValue) && hasKeywordForm(idValue)) {
          warn(logger, { code: 'keyword-like value', message: `Ignoring term "${term}" mapped to "${idValue}"` });
          this.defined.set(term, true);
          return;
        }
        const iri = await this.expand(idValue, { vocab: true });
        if (iri === null || !(isKeyword(iri) || isIdentifier(iri))) {
          throw new JsonLdError('invalid IRI mapping', `"${idValue}" is not a keyword, IRI or blank node identifier`);
        }
        if (iri === '@context') {
          throw new JsonLdError('invalid keyword alias', '@context cannot be aliased');
        }
        definition.iri = iri;

        if (hasInnerColon(term) || term.includes('/')) {
          this.defined.set(term, true);
          const own = await this.expand(term, { vocab: true });
          if (own !== iri) {
            throw new JsonLdError('invalid IRI mapping', `Term "${term}" would expand to "${own}", not "${iri}"`);
          }
        }
        if (
          !term.includes(':') &&
          !term.includes('/') &&
          (simpleTerm || mode === 'json-ld-1.0') &&
          (endsWithGenDelim(iri) || isBlankNodeIdentifier(iri))
        ) {
          definition.prefix = true;
        }
      }
    } else if (term.indexOf(':', 1) !== -1) {
      const compact = splitCompactIri(term);
      if (
        compact !== undefined &&
        compact.prefix !== '_' &&
        !compact.suffix.startsWith('//') &&
        hasEntry(this.local, compact.prefix)
      ) {
        await this.define(compact.prefix);
      }
      const prefix = compact === undefined ? undefined : this.draft.getTerm(compact.prefix);
      definition.iri =
        compact !== undefined && prefix !== undefined && prefix.iri !== null ? prefix.iri + compact.suffix : term;
    } else if (term.includes('/')) {
      const iri = await this.expand(term, { vocab: true });
      if (iri === null || !isAbsoluteIri(iri)) {
        throw new JsonLdError('invalid IRI mapping', `Relative IRI term "${term}" does not expand to an IRI`);
      }
      definition.iri = iri;
    } else if (term === '@type') {
      definition.iri = '@type';
    } else if (this.draft.vocab !== null) {
      definition.iri = this.draft.vocab + term;
    } else {
      throw new JsonLdError('invalid IRI mapping', `Term "${term}" has no IRI mapping and there is no @vocab`);
    }

    const containerValue = getEntry(map, '@container');
    if (containerValue !== undefined && containerValue !== null) {
      definition.container = parseContainer(containerValue, mode, definition.reverse);
      if (definition.container.includes('@type')) {
        if (definition.type === undefined) {
          definition.type = '@id';
        } else if (definition.type !== '@id' && definition.type !== '@vocab') {
          throw new JsonLdError('invalid type mapping', `@type container of "${term}" needs @id or @vocab type`);
        }
      }
    }

    const indexValue = getEntry(map, '@index');
    if (indexValue !== undefined) {
      if (mode === 'json-ld-1.0' || !definition.container.includes('@index')) {
        throw new JsonLdError('invalid term definition', `@index of "${term}" needs an @index container`);
      }
      if (!isString(indexValue)) {
        throw new JsonLdError('invalid term definition', `@index of "${term}" must be a string`);
      }
      const expanded = await this.expand(indexValue, { vocab: true });
      if (expanded === null || !isAbsoluteIri(expanded)) {
        throw new JsonLdError('invalid term definition', `@index of "${term}" does not expand to an IRI`);
      }
      definition.index = indexValue;
    }

    if (hasEntry(map, '@context')) {
      if (mode === 'json-ld-1.0') {
        throw new JsonLdError('invalid term definition', 'Scoped contexts are not available in json-ld-1.0 mode');
      }
      const scoped = getEntry(map, '@context') ?? null;
      try {
        await processContext(this.draft.freeze(), scoped, this.settings.baseUrl, this.options, {
          overrideProtected: true,
          remoteContexts: this.settings.remoteContexts,
          validateScopedContext: false,
        });
      } catch (error) {
        if (!isJsonLdError(error)) throw error;
        throw new JsonLdError('invalid scoped context', `Scoped context of "${term}" is invalid: ${error.message}`, {
          cause: error,
        });
      }
      definition.context = scoped;
      definition.baseUrl = this.settings.baseUrl;
    }

    const languageValue = getEntry(map, '@language');
    if (languageValue !== undefined && typeValue === undefined) {
      if (languageValue === null) {
        definition.language = null;
      } else if (isString(languageValue)) {
        definition.language = normalizeLanguage(languageValue, logger);
      } else {
        throw new JsonLdError('invalid language mapping', `@language of "${term}" must be a string or null`);
      }
    }

    const directionValue = getEntry(map, '@direction');
    if (directionValue !== undefined && typeValue === undefined) {
      if (directionValue === null) {
        definition.direction = null;
      } else if (isDirection(directionValue)) {
        definition.direction = directionValue;
      } else {
        throw new JsonLdError('invalid base direction', `@direction of "${term}" must be "ltr", "rtl" or null`);
      }
    }

    const nestValue = getEntry(map, '@nest');
    if (nestValue !== undefined) {
      if (mode === 'json-ld-1.0') {
        throw new JsonLdError('invalid term definition', '@nest is not available in json-ld-1.0 mode');
      }
      if (!isString(nestValue) || (isKeyword(nestValue) && nestValue !== '@nest')) {
        throw new JsonLdError('invalid @nest value', `@nest of "${term}" must be a term or @nest`);
      }
      definition.nest = nestValue;
    }

    const prefixValue = getEntry(map, '@prefix');
    if (prefixValue !== undefined) {
      if (mode === 'json-ld-1.0' || term.includes(':') || term.includes('/')) {
        throw new JsonLdError('invalid term definition', `"${term}" cannot carry @prefix`);
      }
      if (typeof prefixValue !== 'boolean') {
        throw new JsonLdError('invalid @prefix value', `@prefix of "${term}" must be a boolean`);
      }
      if (prefixValue && definition.iri !== null && isKeyword(definition.iri)) {
        throw new JsonLdError('invalid term definition', `Keyword alias "${term}" cannot be a prefix`);
      }
      definition.prefix = prefixValue;
    }

    const unknown = Object.keys(map).find((key) => !TERM_DEFINITION_KEYWORDS.has(key));
    if (unknown !== undefined) {
      throw new JsonLdError('invalid term definition', `Unexpected entry "${unknown}" in definition of "${term}"`);
    }

    let final: TermDefinition = definition;
    if (!this.settings.overrideProtected && previous !== undefined && previous.protected) {
      if (!sameDefinition(previous, definition)) {
        throw new JsonLdError('protected term redefinition', `Protected term "${term}" cannot be redefined`);
      }
      final = previous;
    }

    this.draft.setTerm(term, final);
    this.defined.set(term, true);
  }

  /** IRI expansion that first defines terms of this map the value relies on. */
  private async expand(value: string, flags: IriExpansionFlags): Promise<string | null> {
    if (!isKeyword(value) && !hasKeywordForm(value)) {
      if (hasEntry(this.local, value) && this.defined.get(value) !== true) {
        await this.define(value);
      }
      const compact = splitCompactIri(value);
      if (
        compact !== undefined &&
        compact.prefix !== '_' &&
        !compact.suffix.startsWith('//') &&
        hasEntry(this.local, compact.prefix) &&
        this.defined.get(compact.prefix) !== true
      ) {
        await this.define(compact.prefix);
      }
    }
    return expandIri(this.draft, value, flags, this.options.logger);
  }
}
