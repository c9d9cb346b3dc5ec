/**
 * Compaction: renders an expanded document with the terms, aliases and
 * containers of a context.
 */

import { ActiveContext, hasContainer } from '../context/active-context.js';
import { expandIri } from '../context/iri-expansion.js';
import { ContextProcessingFlags, ContextProcessingOptions, processContext } from '../context/processing.js';
import { JsonLdError } from '../errors.js';
import {
  JsonObject,
  JsonValue,
  addValue,
  asArray,
  compareCodePoints,
  getEntry,
  hasEntry,
  isArray,
  isGraphObject,
  isListObject,
  isObject,
  isScalar,
  isSimpleGraphObject,
  isString,
} from '../value.js';
import { IriCompactionFlags, IriCompactionSettings, compactIri } from './iri.js';
import { compactValue } from './value.js';

/** Settings shared by every step of one compaction call. */
export interface CompactionRun {
  options: ContextProcessingOptions;
  compactArrays: boolean;
  compactToRelative: boolean;
  ordered: boolean;
}

const MAP_CONTAINERS = ['@language', '@index', '@id', '@type'] as const;

export class Compactor {
  private readonly iriSettings: IriCompactionSettings;

  constructor(private readonly run: CompactionRun) {
    this.iriSettings = {
      processingMode: run.options.processingMode,
      compactToRelative: run.compactToRelative,
    };
  }

  /**
   * Compacts an expanded document. A top-level array becomes the `@graph`
   * of a wrapper map; an empty result becomes an empty map.
   */
  async compactDocument(context: ActiveContext, expanded: JsonValue): Promise<JsonObject> {
    const compacted = await this.compactElement(context, null, expanded);
    if (isArray(compacted)) {
      if (compacted.length === 0) return {};
      return { [this.alias(context, '@graph')]: compacted };
    }
    return isObject(compacted) ? compacted : {};
  }

  private async compactElement(
    activeContext: ActiveContext,
    activeProperty: string | null,
    element: JsonValue,
  ): Promise<JsonValue> {
    if (element === null || isScalar(element)) return element;

    if (isArray(element)) {
      const result: JsonValue[] = [];
      for (const item of element) {
        const compacted = await this.compactElement(activeContext, activeProperty, item);
        if (compacted !== null) result.push(compacted);
      }
      const definition = activeProperty === null ? undefined : activeContext.getTerm(activeProperty);
      if (
        result.length !== 1 ||
        !this.run.compactArrays ||
        activeProperty === '@graph' ||
        activeProperty === '@set' ||
        hasContainer(definition, '@list') ||
        hasContainer(definition, '@set')
      ) {
        return result;
      }
      return result[0] ?? null;
    }

    const inputContext = activeContext;
    let context = activeContext;
    if (context.previousContext !== null && !hasEntry(element, '@value') && !this.isNodeReference(element)) {
      context = context.previousContext;
    }

    const propertyDefinition = activeProperty === null ? undefined : inputContext.getTerm(activeProperty);
    if (propertyDefinition !== undefined && propertyDefinition.context !== undefined) {
      context = await this.process(context, propertyDefinition.context, propertyDefinition.baseUrl ?? null, {
        overrideProtected: true,
      });
    }

    if (hasEntry(element, '@value') || this.isIndexedNodeReference(element)) {
      const compacted = compactValue(context, activeProperty, element, this.iriSettings);
      const definition = activeProperty === null ? undefined : context.getTerm(activeProperty);
      if (isScalar(compacted) || compacted === null || definition?.type === '@json') return compacted;
    }

    const activeDefinition = activeProperty === null ? undefined : context.getTerm(activeProperty);
    if (isListObject(element) && hasContainer(activeDefinition, '@list')) {
      return this.compactElement(context, activeProperty, getEntry(element, '@list') ?? []);
    }

    const insideReverse = activeProperty === '@reverse';
    const result: JsonObject = {};

    const typeContext = context;
    const types = asArray(getEntry(element, '@type')).filter(isString);
    if (types.length > 0) {
      const compactedTypes = types
        .map((type) => compactIri(typeContext, type, this.iriSettings, { vocab: true }))
        .sort(compareCodePoints);
      for (const term of compactedTypes) {
        const typeTerm = inputContext.getTerm(term);
        if (typeTerm !== undefined && typeTerm.context !== undefined) {
          context = await this.process(context, typeTerm.context, typeTerm.baseUrl ?? null, { propagate: false });
        }
      }
    }

    const keys = this.run.ordered ? Object.keys(element).sort(compareCodePoints) : Object.keys(element);
    for (const expandedProperty of keys) {
      const expandedValue = getEntry(element, expandedProperty);
      if (expandedValue === undefined) continue;

      if (expandedProperty === '@id') {
        if (isString(expandedValue)) {
          result[this.alias(context, '@id')] = this.compactIri(context, expandedValue);
        }
        continue;
      }

      if (expandedProperty === '@type') {
        const compacted = asArray(expandedValue)
          .filter(isString)
          .map((type) => compactIri(typeContext, type, this.iriSettings, { vocab: true }));
        const alias = this.alias(context, '@type');
        const asArrayEntry =
          (this.run.options.processingMode !== 'json-ld-1.0' && hasContainer(context.getTerm(alias), '@set')) ||
          !this.run.compactArrays;
        addValue(result, alias, compacted, asArrayEntry);
        continue;
      }

      if (expandedProperty === '@reverse') {
        const compacted = await this.compactElement(context, '@reverse', expandedValue);
        if (isObject(compacted)) {
          for (const [property, value] of Object.entries(compacted)) {
            const definition = context.getTerm(property);
            if (definition !== undefined && definition.reverse) {
              const asArrayEntry = hasContainer(definition, '@set') || !this.run.compactArrays;
              addValue(result, property, value, asArrayEntry);
              delete compacted[property];
            }
          }
          if (Object.keys(compacted).length > 0) {
            result[this.alias(context, '@reverse')] = compacted;
          }
        }
        continue;
      }

      if (expandedProperty === '@index' && hasContainer(activeDefinition, '@index')) {
        continue;
      }

      if (
        expandedProperty === '@direction' ||
        expandedProperty === '@index' ||
        expandedProperty === '@language' ||
        expandedProperty === '@value'
      ) {
        result[this.alias(context, expandedProperty)] = expandedValue;
        continue;
      }

      const items = asArray(expandedValue);
      if (items.length === 0) {
        const itemProperty = this.compactProperty(context, expandedProperty, {
          value: expandedValue,
          reverse: insideReverse,
        });
        addValue(this.nestTarget(context, itemProperty, result), itemProperty, [], true);
      }

      for (const item of items) {
        await this.compactItem(context, expandedProperty, item, insideReverse, result);
      }
    }

    return result;
  }

  private async compactItem(
    context: ActiveContext,
    expandedProperty: string,
    item: JsonValue,
    insideReverse: boolean,
    result: JsonObject,
  ): Promise<void> {
    const itemProperty = this.compactProperty(context, expandedProperty, { value: item, reverse: insideReverse });
    const target = this.nestTarget(context, itemProperty, result);
    const definition = context.getTerm(itemProperty);
    const asArrayEntry =
      hasContainer(definition, '@set') ||
      itemProperty === '@graph' ||
      itemProperty === '@list' ||
      !this.run.compactArrays;

    let inner: JsonValue = item;
    if (isListObject(item)) inner = getEntry(item, '@list') ?? [];
    else if (isGraphObject(item)) inner = getEntry(item, '@graph') ?? [];
    let compacted = await this.compactElement(context, itemProperty, inner);

    if (isListObject(item)) {
      compacted = asArray(compacted);
      if (hasContainer(definition, '@list')) {
        target[itemProperty] = compacted;
        return;
      }
      const wrapper: JsonObject = { [this.alias(context, '@list')]: compacted };
      const index = getEntry(item, '@index');
      if (index !== undefined) wrapper[this.alias(context, '@index')] = index;
      addValue(target, itemProperty, wrapper, asArrayEntry);
      return;
    }

    if (isGraphObject(item)) {
      const id = getEntry(item, '@id');
      const index = getEntry(item, '@index');
      if (hasContainer(definition, '@graph') && hasContainer(definition, '@id')) {
        const mapKey = isString(id)
          ? this.compactIri(context, id)
          : this.alias(context, '@none');
        addValue(this.mapObject(target, itemProperty), mapKey, compacted, asArrayEntry);
      } else if (hasContainer(definition, '@graph') && hasContainer(definition, '@index') && isSimpleGraphObject(item)) {
        const mapKey = isString(index) ? index : this.alias(context, '@none');
        addValue(this.mapObject(target, itemProperty), mapKey, compacted, asArrayEntry);
      } else if (hasContainer(definition, '@graph') && isSimpleGraphObject(item)) {
        if (isArray(compacted) && compacted.length > 1) {
          compacted = { [this.alias(context, '@included')]: compacted };
        }
        addValue(target, itemProperty, compacted, asArrayEntry);
      } else {
        const wrapper: JsonObject = { [this.alias(context, '@graph')]: compacted };
        if (isString(id)) wrapper[this.alias(context, '@id')] = this.compactIri(context, id);
        if (index !== undefined) wrapper[this.alias(context, '@index')] = index;
        addValue(target, itemProperty, wrapper, asArrayEntry);
      }
      return;
    }

    const mapContainer = MAP_CONTAINERS.find((container) => hasContainer(definition, container));
    if (mapContainer !== undefined && !hasContainer(definition, '@graph')) {
      const mapObject = this.mapObject(target, itemProperty);
      let containerKey = this.alias(context, mapContainer);
      const indexKey = definition?.index ?? '@index';
      let mapKey: string | null = null;

      if (mapContainer === '@language' && isObject(item) && hasEntry(item, '@value')) {
        compacted = getEntry(item, '@value') ?? null;
        const language = getEntry(item, '@language');
        if (isString(language)) mapKey = language;
      } else if (mapContainer === '@index' && indexKey === '@index') {
        const index = isObject(item) ? getEntry(item, '@index') : undefined;
        if (isString(index)) mapKey = index;
      } else if (mapContainer === '@index') {
        containerKey = this.compactProperty(context, indexKey, {});
        if (isObject(compacted)) mapKey = this.takeFirst(compacted, containerKey);
      } else if (mapContainer === '@id') {
        if (isObject(compacted)) {
          const id = getEntry(compacted, containerKey);
          if (isString(id)) mapKey = id;
          delete compacted[containerKey];
        }
      } else if (isObject(compacted)) {
        mapKey = this.takeFirst(compacted, containerKey);
        const keys = Object.keys(compacted);
        const [onlyKey] = keys;
        const id = isObject(item) ? getEntry(item, '@id') : undefined;
        if (
          keys.length === 1 &&
          onlyKey !== undefined &&
          expandIri(context, onlyKey, { vocab: true }) === '@id' &&
          id !== undefined
        ) {
          compacted = await this.compactElement(context, itemProperty, { '@id': id });
        }
      }

      addValue(mapObject, mapKey ?? this.alias(context, '@none'), compacted, asArrayEntry);
      return;
    }

    addValue(target, itemProperty, compacted, asArrayEntry);
  }

  /** Removes and returns the first string under `key`; the rest stay. */
  private takeFirst(object: JsonObject, key: string): string | null {
    const [first, ...rest] = asArray(getEntry(object, key));
    if (!isString(first)) return null;
    if (rest.length === 0) delete object[key];
    else object[key] = rest.length === 1 ? (rest[0] ?? null) : rest;
    return first;
  }

  private isNodeReference(element: JsonObject): boolean {
    const keys = Object.keys(element);
    return keys.length === 1 && keys[0] === '@id';
  }

  /** `@id` with at most an `@index` beside it */
  private isIndexedNodeReference(element: JsonObject): boolean {
    return hasEntry(element, '@id') && Object.keys(element).every((key) => key === '@id' || key === '@index');
  }

  /** The map a property's values go into: the result, or its nest entry. */
  private nestTarget(context: ActiveContext, property: string, result: JsonObject): JsonObject {
    const nest = context.getTerm(property)?.nest;
    if (nest === undefined) return result;
    if (nest !== '@nest' && expandIri(context, nest, { vocab: true }) !== '@nest') {
      throw new JsonLdError('invalid @nest value', `Nest term "${nest}" of "${property}" does not alias @nest`);
    }
    return this.mapObject(result, nest);
  }

  private mapObject(target: JsonObject, key: string): JsonObject {
    const existing = getEntry(target, key);
    if (isObject(existing)) return existing;
    const created: JsonObject = {};
    target[key] = created;
    return created;
  }

  private compactProperty(context: ActiveContext, iri: string, flags: IriCompactionFlags): string {
    return compactIri(context, iri, this.iriSettings, { ...flags, vocab: true });
  }

  private compactIri(context: ActiveContext, iri: string): string {
    return compactIri(context, iri, this.iriSettings);
  }

  private alias(context: ActiveContext, keyword: string): string {
    return compactIri(context, keyword, this.iriSettings, { vocab: true });
  }

  private process(
    context: ActiveContext,
    localContext: JsonValue,
    baseUrl: string | null,
    flags: ContextProcessingFlags,
  ): Promise<ActiveContext> {
    return processContext(context, localContext, baseUrl, this.run.options, flags);
  }
}
