/**
 * IRI helpers: RFC 3986 reference resolution, relativisation against a base,
 * and the lexical tests the context and expansion algorithms need.
 */

// ── Parsing ───────────────────────────────────────────────────────

export interface IriParts {
  scheme?: string;
  authority?: string;
  path: string;
  query?: string;
  fragment?: string;
}

const IRI_PATTERN = /^(?:([^:/?#]+):)?(?:\/\/([^/?#]*))?([^?#]*)(?:\?([^#]*))?(?:#(.*))?$/s;

const ABSOLUTE_IRI = /^[A-Za-z][A-Za-z0-9+\-.]*:[^\s]*$/;

/** Characters that end an IRI usable as a prefix */
const GEN_DELIMS = new Set([':', '/', '?', '#', '[', ']', '@']);

export function parseIri(iri: string): IriParts {
  const match = IRI_PATTERN.exec(iri);
  if (!match) return { path: iri };
  const [, scheme, authority, path, query, fragment] = match;
  return { scheme, authority, path: path ?? '', query, fragment };
}

export function formatIri(parts: IriParts): string {
  let result = '';
  if (parts.scheme !== undefined) result += `${parts.scheme}:`;
  if (parts.authority !== undefined) result += `//${parts.authority}`;
  result += parts.path;
  if (parts.query !== undefined) result += `?${parts.query}`;
  if (parts.fragment !== undefined) result += `#${parts.fragment}`;
  return result;
}

// ── Predicates ────────────────────────────────────────────────────

export function isAbsoluteIri(value: string): boolean {
  return ABSOLUTE_IRI.test(value);
}

export function isBlankNodeIdentifier(value: string): boolean {
  return value.startsWith('_:');
}

/** Absolute IRI or blank node identifier */
export function isIdentifier(value: string): boolean {
  return isAbsoluteIri(value) || isBlankNodeIdentifier(value);
}

export function endsWithGenDelim(iri: string): boolean {
  return iri.length > 0 && GEN_DELIMS.has(iri[iri.length - 1] ?? '');
}

/**
 * Splits `prefix:suffix` at the first colon after position 0. Returns
 * undefined when the value has no such colon.
 */
export function splitCompactIri(value: string): { prefix: string; suffix: string } | undefined {
  const index = value.indexOf(':', 1);
  if (index === -1) return undefined;
  return { prefix: value.slice(0, index), suffix: value.slice(index + 1) };
}

// ── Resolution ────────────────────────────────────────────────────

export function removeDotSegments(path: string): string {
  const input = path.split('/');
  const output: string[] = [];
  const last = input.length - 1;
  input.forEach((segment, i) => {
    if (segment === '.') {
      if (i === last) output.push('');
      return;
    }
    if (segment === '..') {
      if (output.length > 1 || (output.length === 1 && output[0] !== '')) {
        output.pop();
      }
      if (i === last) output.push('');
      return;
    }
    output.push(segment);
  });
  return output.join('/');
}

function mergePaths(base: IriParts, reference: string): string {
  if (base.authority !== undefined && base.path === '') return `/${reference}`;
  const slash = base.path.lastIndexOf('/');
  return slash === -1 ? reference : base.path.slice(0, slash + 1) + reference;
}

/**
 * Resolves `reference` against `base` (RFC 3986 §5.2). Without a base the
 * reference is returned unchanged.
 */
export function resolveIri(base: string | null | undefined, reference: string): string {
  if (base === null || base === undefined) return reference;
  const ref = parseIri(reference);
  if (ref.scheme !== undefined) {
    return formatIri({ ...ref, path: removeDotSegments(ref.path) });
  }
  const b = parseIri(base);
  const target: IriParts = { scheme: b.scheme, path: '' };
  if (ref.authority !== undefined) {
    target.authority = ref.authority;
    target.path = removeDotSegments(ref.path);
    target.query = ref.query;
  } else {
    target.authority = b.authority;
    if (ref.path === '') {
      target.path = b.path;
      target.query = ref.query !== undefined ? ref.query : b.query;
    } else {
      target.path = ref.path.startsWith('/')
        ? removeDotSegments(ref.path)
        : removeDotSegments(mergePaths(b, ref.path));
      target.query = ref.query;
    }
  }
  target.fragment = ref.fragment;
  return formatIri(target);
}

/**
 * Expresses `iri` relative to `base` where both share scheme and authority;
 * otherwise returns `iri` unchanged.
 */
export function relativizeIri(base: string | null | undefined, iri: string): string {
  if (base === null || base === undefined) return iri;
  const b = parseIri(base);
  const target = parseIri(iri);
  if (b.scheme !== target.scheme || b.authority !== target.authority) return iri;

  const baseSegments = removeDotSegments(b.path).split('/');
  const iriSegments = removeDotSegments(target.path).split('/');
  const keep = target.query !== undefined || target.fragment !== undefined ? 0 : 1;

  while (
    baseSegments.length > 0 &&
    iriSegments.length > keep &&
    baseSegments[0] === iriSegments[0]
  ) {
    baseSegments.shift();
    iriSegments.shift();
  }

  let relative = '';
  if (baseSegments.length > 0) {
    baseSegments.pop();
    relative += '../'.repeat(baseSegments.length);
  }
  relative += iriSegments.join('/');
  if (target.query !== undefined) relative += `?${target.query}`;
  if (target.fragment !== undefined) relative += `#${target.fragment}`;
  return relative === '' ? './' : relative;
}
