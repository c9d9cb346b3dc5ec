/**
 * Expansion: rewrites a document so that every key is an absolute IRI or
 * keyword and every value is a value object, node object or list.
 */

import { BlankNodeIssuer } from '../blank-node.js';
import { ActiveContext, TermDefinition, hasContainer } from '../context/active-context.js';
import { expandIri } from '../context/iri-expansion.js';
import { ContextProcessingFlags, ContextProcessingOptions, processContext } from '../context/processing.js';
import { JsonLdError } from '../errors.js';
import { isAbsoluteIri, isBlankNodeIdentifier, isIdentifier } from '../iri.js';
import { VALUE_OBJECT_KEYWORDS, isDirection, isKeyword } from '../keywords.js';
import { normalizeLanguage } from '../language.js';
import { warn } from '../logger.js';
import type { KeyPolicy } from '../types.js';
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
  isNodeObject,
  isObject,
  isScalar,
  isString,
  isValueObject,
} from '../value.js';
import { expandValue } from './value.js';

/** Settings shared by every step of one expansion call. */
export interface ExpansionRun {
  options: ContextProcessingOptions;
  ordered: boolean;
  policy: KeyPolicy;
  /** Present when blank nodes are relabelled */
  issuer?: BlankNodeIssuer;
  /** Deepest nesting of maps and arrays the expander descends into */
  maxDepth: number;
}

/** Where in the document a map is being expanded. */
interface NodeScope {
  context: ActiveContext;
  /** Context in effect before type-scoped contexts were applied */
  typeScopedContext: ActiveContext;
  activeProperty: string | null;
  /** Expanded last `@type` of the map, used to recognise JSON literals */
  inputType: string | null;
  baseUrl: string | null;
  depth: number;
}

function isNotNull<T>(value: T | null): value is T {
  return value !== null;
}

export class Expander {
  constructor(private readonly run: ExpansionRun) {}

  /** Expands `input` and returns the top-level array of the expanded form. */
  async expandDocument(context: ActiveContext, input: JsonValue, baseUrl: string | null): Promise<JsonValue[]> {
    let expanded = await this.expandElement(context, null, input, baseUrl, false, 0);
    if (isObject(expanded) && Object.keys(expanded).length === 1 && hasEntry(expanded, '@graph')) {
      expanded = getEntry(expanded, '@graph') ?? null;
    }
    return expanded === null ? [] : asArray(expanded);
  }

  private async expandElement(
    activeContext: ActiveContext,
    activeProperty: string | null,
    element: JsonValue,
    baseUrl: string | null,
    fromMap: boolean,
    depth: number,
  ): Promise<JsonValue> {
    if (depth > this.run.maxDepth) {
      throw new JsonLdError('resource limit exceeded', `Document nests deeper than ${this.run.maxDepth} levels`);
    }
    if (element === null) return null;

    const definition = activeProperty === null ? undefined : activeContext.getTerm(activeProperty);
    const propertyScopedContext = definition?.context;

    if (isScalar(element)) {
      if (activeProperty === null || activeProperty === '@graph') return null;
      let context = activeContext;
      if (propertyScopedContext !== undefined) {
        context = await this.process(context, propertyScopedContext, definition?.baseUrl ?? null);
      }
      return expandValue(context, activeProperty, element, this.run.options.logger);
    }

    if (isArray(element)) {
      const result: JsonValue[] = [];
      const listContainer = hasContainer(definition, '@list');
      for (const item of element) {
        let expanded = await this.expandElement(activeContext, activeProperty, item, baseUrl, fromMap, depth + 1);
        if (listContainer && this.run.options.processingMode === 'json-ld-1.0' && (isArray(expanded) || isListObject(expanded))) {
          throw new JsonLdError('list of lists', 'Lists of lists are not supported in json-ld-1.0 mode');
        }
        if (listContainer && isArray(expanded)) expanded = { '@list': expanded };
        if (isArray(expanded)) result.push(...expanded);
        else if (expanded !== null) result.push(expanded);
      }
      return result;
    }

    let context = activeContext;
    if (context.previousContext !== null && !fromMap && !this.keepsPropagatedContext(context, element)) {
      context = context.previousContext;
    }
    if (propertyScopedContext !== undefined) {
      context = await this.process(context, propertyScopedContext, definition?.baseUrl ?? null, {
        overrideProtected: true,
      });
    }
    const localContext = getEntry(element, '@context');
    if (localContext !== undefined) {
      context = await this.process(context, localContext, baseUrl);
    }

    const typeScopedContext = context;
    const typeKeys = Object.keys(element)
      .sort(compareCodePoints)
      .filter((key) => expandIri(typeScopedContext, key, { vocab: true }) === '@type');
    for (const key of typeKeys) {
      const terms = asArray(getEntry(element, key)).filter(isString).sort(compareCodePoints);
      for (const term of terms) {
        const typeTerm = typeScopedContext.getTerm(term);
        if (typeTerm !== undefined && typeTerm.context !== undefined) {
          context = await this.process(context, typeTerm.context, typeTerm.baseUrl ?? null, { propagate: false });
        }
      }
    }

    let inputType: string | null = null;
    const [firstTypeKey] = typeKeys;
    if (firstTypeKey !== undefined) {
      const types = asArray(getEntry(element, firstTypeKey));
      const last = types[types.length - 1];
      if (isString(last)) inputType = expandIri(context, last, { vocab: true });
    }

    const result: JsonObject = {};
    await this.expandEntries(
      { context, typeScopedContext, activeProperty, inputType, baseUrl, depth },
      element,
      result,
    );
    return this.finishObject(result, activeProperty);
  }

  /** A value object or a lone node reference keeps a non-propagated context. */
  private keepsPropagatedContext(context: ActiveContext, element: JsonObject): boolean {
    const keys = Object.keys(element).map((key) => expandIri(context, key, { vocab: true }));
    return keys.includes('@value') || (keys.length === 1 && keys[0] === '@id');
  }

  private async expandEntries(scope: NodeScope, element: JsonObject, result: JsonObject): Promise<void> {
    const { context, baseUrl, depth } = scope;
    const nests: string[] = [];

    for (const key of this.keysOf(element)) {
      if (key === '@context') continue;
      const value = getEntry(element, key);
      if (value === undefined) continue;

      const expandedProperty = this.expandKey(context, key);
      if (expandedProperty === null) continue;

      if (isKeyword(expandedProperty)) {
        if (expandedProperty === '@nest') {
          if (scope.activeProperty === '@reverse') {
            throw new JsonLdError('invalid reverse property map', '@nest cannot be used inside @reverse');
          }
          if (!nests.includes(key)) nests.push(key);
          continue;
        }
        await this.expandKeyword(scope, expandedProperty, value, result);
        continue;
      }

      const definition = context.getTerm(key);
      let expandedValue: JsonValue;
      if (definition !== undefined && definition.type === '@json') {
        expandedValue = { '@value': value, '@type': '@json' };
      } else if (definition !== undefined && hasContainer(definition, '@language') && isObject(value)) {
        expandedValue = this.expandLanguageMap(context, definition, value);
      } else if (
        definition !== undefined &&
        (hasContainer(definition, '@index') || hasContainer(definition, '@type') || hasContainer(definition, '@id')) &&
        isObject(value)
      ) {
        expandedValue = await this.expandIndexMap(scope, key, definition, value);
      } else {
        expandedValue = await this.expandElement(context, key, value, baseUrl, false, depth + 1);
      }
      if (expandedValue === null) continue;

      if (hasContainer(definition, '@list') && !isListObject(expandedValue)) {
        expandedValue = { '@list': asArray(expandedValue) };
      }
      if (
        hasContainer(definition, '@graph') &&
        !hasContainer(definition, '@id') &&
        !hasContainer(definition, '@index')
      ) {
        expandedValue = asArray(expandedValue).map((item): JsonValue => ({ '@graph': asArray(item) }));
      }

      if (definition !== undefined && definition.reverse) {
        const reverseMap = this.reverseMap(result);
        for (const item of asArray(expandedValue)) {
          if (isValueObject(item) || isListObject(item)) {
            throw new JsonLdError('invalid reverse property value', `Reverse property "${key}" cannot hold a value or list`);
          }
          addValue(reverseMap, expandedProperty, item, true);
        }
      } else {
        addValue(result, expandedProperty, expandedValue, true);
      }
    }

    const orderedNests = this.run.ordered ? [...nests].sort(compareCodePoints) : nests;
    for (const nestKey of orderedNests) {
      for (const nested of asArray(getEntry(element, nestKey))) {
        if (
          !isObject(nested) ||
          Object.keys(nested).some((key) => expandIri(context, key, { vocab: true }) === '@value')
        ) {
          throw new JsonLdError('invalid @nest value', `Value of "${nestKey}" must be a map without @value`);
        }
        await this.expandEntries({ ...scope, activeProperty: nestKey }, nested, result);
      }
    }
  }

  /** Expands a map key, applying the key policy to keys that map to no IRI. */
  private expandKey(context: ActiveContext, key: string): string | null {
    const expanded = expandIri(context, key, { vocab: true }, this.run.options.logger);
    if (expanded === null || isKeyword(expanded)) return expanded;

    switch (this.run.policy) {
      case 'relaxed':
        return expanded;
      case 'standard':
        return expanded.includes(':') ? expanded : null;
      case 'strict':
        if (expanded.includes(':')) return expanded;
        break;
      case 'strictest':
        if (isIdentifier(expanded)) return expanded;
        break;
    }
    throw new JsonLdError('key expansion failed', `Key "${key}" does not expand to an IRI`);
  }

  private async expandKeyword(
    scope: NodeScope,
    keyword: string,
    value: JsonValue,
    result: JsonObject,
  ): Promise<void> {
    const { context, activeProperty, baseUrl, depth } = scope;
    const { processingMode: mode, logger } = this.run.options;

    if (activeProperty === '@reverse') {
      throw new JsonLdError('invalid reverse property map', `Keyword ${keyword} cannot be used inside @reverse`);
    }
    if (hasEntry(result, keyword) && keyword !== '@included' && keyword !== '@type') {
      throw new JsonLdError('colliding keywords', `Keyword ${keyword} appears more than once`);
    }

    switch (keyword) {
      case '@id': {
        if (!isString(value)) throw new JsonLdError('invalid @id value', '@id must be a string');
        const id = this.expandIdentifier(context, value);
        if (id !== null) result['@id'] = id;
        return;
      }

      case '@type': {
        const types = isString(value) ? [value] : isArray(value) ? value.filter(isString) : null;
        if (types === null || (isArray(value) && types.length !== value.length)) {
          throw new JsonLdError('invalid type value', '@type must be a string or an array of strings');
        }
        const expanded = types
          .map((type) => expandIri(scope.typeScopedContext, type, { vocab: true, documentRelative: true }, logger))
          .filter(isNotNull);
        const existing = getEntry(result, '@type');
        if (existing !== undefined) {
          result['@type'] = [...asArray(existing), ...expanded];
        } else if (isString(value)) {
          const [type] = expanded;
          if (type !== undefined) result['@type'] = type;
        } else {
          result['@type'] = expanded;
        }
        return;
      }

      case '@graph': {
        const graph = await this.expandElement(context, '@graph', value, baseUrl, false, depth + 1);
        result['@graph'] = graph === null ? [] : asArray(graph);
        return;
      }

      case '@included': {
        if (mode === 'json-ld-1.0') {
          warn(logger, { code: 'ignored entry', message: '@included is not available in json-ld-1.0 mode' });
          return;
        }
        const expanded = await this.expandElement(context, null, value, baseUrl, false, depth + 1);
        const included = expanded === null ? [] : asArray(expanded);
        if (included.some((item) => !isNodeObject(item))) {
          throw new JsonLdError('invalid @included value', '@included must contain node objects');
        }
        result['@included'] = [...asArray(getEntry(result, '@included')), ...included];
        return;
      }

      case '@value': {
        if (scope.inputType === '@json') {
          if (mode === 'json-ld-1.0') {
            throw new JsonLdError('invalid value object value', 'JSON literals are not available in json-ld-1.0 mode');
          }
        } else if (value !== null && !isScalar(value)) {
          throw new JsonLdError('invalid value object value', '@value must be a scalar or null');
        }
        result['@value'] = value;
        return;
      }

      case '@language': {
        if (!isString(value)) throw new JsonLdError('invalid language-tagged string', '@language must be a string');
        result['@language'] = normalizeLanguage(value, logger);
        return;
      }

      case '@direction': {
        if (mode === 'json-ld-1.0') {
          warn(logger, { code: 'ignored entry', message: '@direction is not available in json-ld-1.0 mode' });
          return;
        }
        if (!isDirection(value)) throw new JsonLdError('invalid base direction', '@direction must be "ltr" or "rtl"');
        result['@direction'] = value;
        return;
      }

      case '@index': {
        if (!isString(value)) throw new JsonLdError('invalid @index value', '@index must be a string');
        result['@index'] = value;
        return;
      }

      case '@list': {
        if (activeProperty === null || activeProperty === '@graph') return;
        const expanded = await this.expandElement(context, activeProperty, value, baseUrl, false, depth + 1);
        const items = expanded === null ? [] : asArray(expanded);
        if (mode === 'json-ld-1.0' && items.some((item) => isListObject(item))) {
          throw new JsonLdError('list of lists', 'Lists of lists are not supported in json-ld-1.0 mode');
        }
        result['@list'] = items;
        return;
      }

      case '@set': {
        result['@set'] = await this.expandElement(context, activeProperty, value, baseUrl, false, depth + 1);
        return;
      }

      case '@reverse': {
        if (!isObject(value)) throw new JsonLdError('invalid @reverse value', '@reverse must be a map');
        const expanded = await this.expandElement(context, '@reverse', value, baseUrl, false, depth + 1);
        if (!isObject(expanded)) return;

        const doubleReversed = getEntry(expanded, '@reverse');
        if (isObject(doubleReversed)) {
          for (const [property, item] of Object.entries(doubleReversed)) {
            addValue(result, property, item, true);
          }
        }
        const properties = Object.keys(expanded).filter((key) => key !== '@reverse');
        if (properties.length > 0) {
          const reverseMap = this.reverseMap(result);
          for (const property of properties) {
            for (const item of asArray(getEntry(expanded, property))) {
              if (isValueObject(item) || isListObject(item)) {
                throw new JsonLdError('invalid reverse property value', `Reverse property ${property} cannot hold a value or list`);
              }
              addValue(reverseMap, property, item, true);
            }
          }
        }
        return;
      }

      default:
        return;
    }
  }

  private expandLanguageMap(context: ActiveContext, definition: TermDefinition, value: JsonObject): JsonValue[] {
    const { logger } = this.run.options;
    const direction = definition.direction !== undefined ? definition.direction : context.defaultDirection;
    const result: JsonValue[] = [];
    for (const language of this.keysOf(value)) {
      const isNone = language === '@none' || expandIri(context, language, { vocab: true }) === '@none';
      for (const item of asArray(getEntry(value, language))) {
        if (item === null) continue;
        if (!isString(item)) {
          throw new JsonLdError('invalid language map value', `Language map entry "${language}" must hold strings`);
        }
        const entry: JsonObject = { '@value': item };
        if (!isNone) entry['@language'] = normalizeLanguage(language, logger);
        if (direction !== null) entry['@direction'] = direction;
        result.push(entry);
      }
    }
    return result;
  }

  /** Index, id and type maps. */
  private async expandIndexMap(
    scope: NodeScope,
    key: string,
    definition: TermDefinition,
    value: JsonObject,
  ): Promise<JsonValue[]> {
    const { context, baseUrl, depth } = scope;
    const { logger } = this.run.options;
    const indexKey = definition.index ?? '@index';
    const idMap = hasContainer(definition, '@id');
    const typeMap = hasContainer(definition, '@type');
    const indexMap = hasContainer(definition, '@index');
    const result: JsonValue[] = [];

    for (const index of this.keysOf(value)) {
      let mapContext = context;
      if (idMap || typeMap) {
        mapContext = context.previousContext ?? context;
      }
      if (typeMap) {
        const indexTerm = mapContext.getTerm(index);
        if (indexTerm !== undefined && indexTerm.context !== undefined) {
          mapContext = await this.process(mapContext, indexTerm.context, indexTerm.baseUrl ?? null);
        }
      }

      const expandedIndex = expandIri(context, index, { vocab: true });
      const items = await this.expandElement(
        mapContext,
        key,
        asArray(getEntry(value, index)),
        baseUrl,
        true,
        depth + 1,
      );

      for (const expanded of asArray(items)) {
        let item = expanded;
        if (hasContainer(definition, '@graph') && !isGraphObject(item)) {
          item = { '@graph': asArray(item) };
        }
        if (!isObject(item) || expandedIndex === '@none') {
          result.push(item);
          continue;
        }

        if (indexMap && indexKey !== '@index') {
          const reExpandedIndex = expandValue(context, indexKey, index, logger);
          const indexProperty = expandIri(context, indexKey, { vocab: true });
          if (isValueObject(item)) {
            throw new JsonLdError('invalid value object', `Value objects in "${key}" cannot carry index property ${indexKey}`);
          }
          if (indexProperty !== null) {
            item[indexProperty] = [reExpandedIndex, ...asArray(getEntry(item, indexProperty))];
          }
        } else if (indexMap && !hasEntry(item, '@index')) {
          item['@index'] = index;
        } else if (idMap && !hasEntry(item, '@id')) {
          item['@id'] = this.expandIdentifier(context, index);
        } else if (typeMap && expandedIndex !== null) {
          item['@type'] = [expandedIndex, ...asArray(getEntry(item, '@type'))];
        }
        result.push(item);
      }
    }
    return result;
  }

  /** Post-processing of an expanded map: validation, unwrapping and dropping. */
  private finishObject(result: JsonObject, activeProperty: string | null): JsonValue {
    let output: JsonValue = result;

    if (hasEntry(result, '@value')) {
      if (!this.isValidValueObject(result)) return null;
    } else if (hasEntry(result, '@type')) {
      const type = getEntry(result, '@type');
      if (!isArray(type)) result['@type'] = asArray(type);
    } else if (hasEntry(result, '@set') || hasEntry(result, '@list')) {
      const keys = Object.keys(result);
      if (keys.length > 2 || (keys.length === 2 && !hasEntry(result, '@index'))) {
        throw new JsonLdError('invalid set or list object', '@set and @list may only be combined with @index');
      }
      if (hasEntry(result, '@set')) output = getEntry(result, '@set') ?? null;
    }

    if (isObject(output)) {
      const keys = Object.keys(output);
      if (keys.length === 1 && keys[0] === '@language') return null;

      if (activeProperty === null || activeProperty === '@graph') {
        if (keys.length === 0 || hasEntry(output, '@value') || hasEntry(output, '@list')) return null;
      }

      const { issuer } = this.run;
      if (issuer !== undefined && isNodeObject(output) && !isGraphObject(output) && !hasEntry(output, '@id')) {
        output['@id'] = issuer.issue();
      }
    }
    return output;
  }

  /** Validates a value object; false when it is to be dropped. */
  private isValidValueObject(result: JsonObject): boolean {
    const keys = Object.keys(result);
    const type = getEntry(result, '@type');
    if (
      keys.some((key) => !VALUE_OBJECT_KEYWORDS.has(key)) ||
      (type !== undefined && (hasEntry(result, '@language') || hasEntry(result, '@direction')))
    ) {
      throw new JsonLdError('invalid value object', `Value object has incompatible entries: ${keys.join(', ')}`);
    }
    if (type === '@json') return true;

    const value = getEntry(result, '@value');
    if (value === null || (isArray(value) && value.length === 0)) return false;
    if (!isString(value) && hasEntry(result, '@language')) {
      throw new JsonLdError('invalid language-tagged value', 'Only strings can carry @language');
    }
    if (type !== undefined && !(isString(type) && isAbsoluteIri(type))) {
      throw new JsonLdError('invalid typed value', `Value type ${JSON.stringify(type)} is not an IRI`);
    }
    return true;
  }

  private expandIdentifier(context: ActiveContext, value: string): string | null {
    const iri = expandIri(context, value, { documentRelative: true }, this.run.options.logger);
    if (iri !== null && this.run.issuer !== undefined && isBlankNodeIdentifier(iri)) {
      return this.run.issuer.issue(iri);
    }
    return iri;
  }

  private reverseMap(result: JsonObject): JsonObject {
    const existing = getEntry(result, '@reverse');
    if (isObject(existing)) return existing;
    const created: JsonObject = {};
    result['@reverse'] = created;
    return created;
  }

  private keysOf(object: JsonObject): string[] {
    const keys = Object.keys(object);
    return this.run.ordered ? keys.sort(compareCodePoints) : keys;
  }

  private process(
    context: ActiveContext,
    localContext: JsonValue,
    baseUrl: string | null,
    flags: ContextProcessingFlags = {},
  ): Promise<ActiveContext> {
    return processContext(context, localContext, baseUrl, this.run.options, flags);
  }
}
