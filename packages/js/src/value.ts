/**
 * Value model shared by every algorithm: the already-parsed JSON tree the
 * engine consumes and produces, plus the JSON-LD shape predicates built on it.
 */

// ── Types ─────────────────────────────────────────────────────────

export type JsonPrimitive = null | boolean | number | string;

export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;

export interface JsonObject {
  [key: string]: JsonValue;
}

/**
 * A map known to carry `K`. Shape predicates narrow to this rather than to
 * `JsonObject`, so a map that fails the check stays a `JsonObject`.
 */
export type JsonObjectWith<K extends string> = JsonObject & { [P in K]: JsonValue };

export type JsonKind = 'null' | 'boolean' | 'number' | 'string' | 'array' | 'object';

/** Discriminates a value so callers can switch over every variant. */
export function kindOf(value: JsonValue): JsonKind {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  switch (typeof value) {
    case 'boolean':
      return 'boolean';
    case 'number':
      return 'number';
    case 'string':
      return 'string';
    default:
      return 'object';
  }
}

// ── Primitive guards ──────────────────────────────────────────────

export function isObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isArray(value: JsonValue | undefined): value is JsonValue[] {
  return Array.isArray(value);
}

export function isString(value: JsonValue | undefined): value is string {
  return typeof value === 'string';
}

export function isScalar(value: JsonValue | undefined): value is string | number | boolean {
  return typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean';
}

/** Reads an entry without pretending an absent key holds a value. */
export function getEntry(object: JsonObject, key: string): JsonValue | undefined {
  return Object.prototype.hasOwnProperty.call(object, key) ? object[key] : undefined;
}

export function hasEntry(object: JsonObject, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(object, key);
}

export function asArray(value: JsonValue | undefined): JsonValue[] {
  if (value === undefined) return [];
  return Array.isArray(value) ? value : [value];
}

// ── JSON-LD shapes ────────────────────────────────────────────────

export function isValueObject(value: JsonValue | undefined): value is JsonObjectWith<'@value'> {
  return isObject(value) && hasEntry(value, '@value');
}

export function isListObject(value: JsonValue | undefined): value is JsonObjectWith<'@list'> {
  return isObject(value) && hasEntry(value, '@list');
}

export function isGraphObject(value: JsonValue | undefined): value is JsonObjectWith<'@graph'> {
  if (!isObject(value) || !hasEntry(value, '@graph')) return false;
  return Object.keys(value).every(
    (key) => key === '@graph' || key === '@id' || key === '@index' || key === '@context',
  );
}

/** A graph object without an `@id`. */
export function isSimpleGraphObject(value: JsonValue | undefined): value is JsonObjectWith<'@graph'> {
  return isGraphObject(value) && !hasEntry(value, '@id');
}

export function isNodeObject(value: JsonValue | undefined): boolean {
  return (
    isObject(value) &&
    !hasEntry(value, '@value') &&
    !hasEntry(value, '@list') &&
    !hasEntry(value, '@set')
  );
}

// ── Construction ──────────────────────────────────────────────────

/**
 * Adds `value` under `key`, turning the entry into an array when a second
 * value arrives. With `asArray` the entry is always an array.
 */
export function addValue(
  object: JsonObject,
  key: string,
  value: JsonValue,
  asArrayEntry = false,
): void {
  if (asArrayEntry && !Array.isArray(getEntry(object, key))) {
    const existing = getEntry(object, key);
    object[key] = existing === undefined ? [] : [existing];
  }
  if (Array.isArray(value)) {
    for (const item of value) {
      addValue(object, key, item, asArrayEntry);
    }
    return;
  }
  const existing = getEntry(object, key);
  if (existing === undefined) {
    object[key] = value;
  } else if (Array.isArray(existing)) {
    existing.push(value);
  } else {
    object[key] = [existing, value];
  }
}

export function cloneValue<T extends JsonValue>(value: T): T;
export function cloneValue(value: JsonValue): JsonValue {
  if (Array.isArray(value)) return value.map((item) => cloneValue(item));
  if (isObject(value)) {
    const copy: JsonObject = {};
    for (const [key, entry] of Object.entries(value)) {
      copy[key] = cloneValue(entry);
    }
    return copy;
  }
  return value;
}

/** Structural equality; arrays compare in order, maps ignore key order. */
export function deepEqual(a: JsonValue | undefined, b: JsonValue | undefined): boolean {
  if (a === b) return true;
  if (a === undefined || b === undefined) return false;
  if (Array.isArray(a)) {
    return Array.isArray(b) && a.length === b.length && a.every((item, i) => deepEqual(item, b[i]));
  }
  if (isObject(a)) {
    if (!isObject(b)) return false;
    const keys = Object.keys(a);
    if (keys.length !== Object.keys(b).length) return false;
    return keys.every((key) => hasEntry(b, key) && deepEqual(a[key], b[key]));
  }
  return false;
}

/** Code-point order, as the ordered processing option requires. */
export function compareCodePoints(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

/** Shortest first, then code-point order. */
export function compareShortestLeast(a: string, b: string): number {
  if (a.length !== b.length) return a.length - b.length;
  return compareCodePoints(a, b);
}
