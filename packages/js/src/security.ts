/**
 * Security
 *
 * - Context allowlists: restrict which remote contexts can be loaded
 * - Resource limits: bound document size, nesting depth and processing time
 */

import { JsonLdError } from './errors.js';
import type { ContextAllowlist, ResourceLimits } from './types.js';
import { JsonValue, isArray, isObject } from './value.js';

// ── Default Resource Limits ───────────────────────────────────────

export const DEFAULT_RESOURCE_LIMITS: Required<ResourceLimits> = {
  maxContextDepth: 10,
  maxGraphDepth: 100,
  maxDocumentSize: 10 * 1024 * 1024, // 10 MB
  maxExpansionTime: 30_000, // 30 seconds
};

export function resolveResourceLimits(...layers: (ResourceLimits | undefined)[]): Required<ResourceLimits> {
  const resolved = { ...DEFAULT_RESOURCE_LIMITS };
  for (const layer of layers) {
    if (layer === undefined) continue;
    if (layer.maxContextDepth !== undefined) resolved.maxContextDepth = layer.maxContextDepth;
    if (layer.maxGraphDepth !== undefined) resolved.maxGraphDepth = layer.maxGraphDepth;
    if (layer.maxDocumentSize !== undefined) resolved.maxDocumentSize = layer.maxDocumentSize;
    if (layer.maxExpansionTime !== undefined) resolved.maxExpansionTime = layer.maxExpansionTime;
  }
  return resolved;
}

// ── Context Allowlist ─────────────────────────────────────────────

function globToRegExp(pattern: string): RegExp {
  const escaped = pattern.replace(/[.+^${}()|[\]\\]/g, '\\$&');
  return new RegExp('^' + escaped.replace(/\*/g, '.*').replace(/\?/g, '.') + '$');
}

/**
 * Checks whether a context URL is permitted by the allowlist configuration.
 * An empty configuration allows everything.
 */
export function isContextAllowed(contextUrl: string, config: ContextAllowlist): boolean {
  if (config.blockRemoteContexts) {
    return false;
  }

  if (config.allowed?.includes(contextUrl)) {
    return true;
  }

  for (const pattern of config.patterns ?? []) {
    const regex = typeof pattern === 'string' ? globToRegExp(pattern) : pattern;
    if (regex.test(contextUrl)) return true;
  }

  // An allowlist that is configured but not matched denies
  const restricted = (config.allowed?.length ?? 0) > 0 || (config.patterns?.length ?? 0) > 0;
  return !restricted;
}

// ── Resource Limits ───────────────────────────────────────────────

/** Deepest nesting of arrays and maps; scalars at the top are depth 0. */
export function measureDepth(value: JsonValue): number {
  let deepest = 0;
  const stack: [JsonValue, number][] = [[value, 0]];
  while (stack.length > 0) {
    const next = stack.pop();
    if (next === undefined) break;
    const [current, depth] = next;
    deepest = Math.max(deepest, depth);
    if (isArray(current)) {
      for (const item of current) stack.push([item, depth + 1]);
    } else if (isObject(current)) {
      for (const item of Object.values(current)) stack.push([item, depth + 1]);
    }
  }
  return deepest;
}

/**
 * Validates a document against resource limits before processing.
 *
 * @throws JsonLdError `resource limit exceeded` if any limit is exceeded
 */
export function enforceResourceLimits(document: JsonValue, limits: ResourceLimits = DEFAULT_RESOURCE_LIMITS): void {
  const resolved = resolveResourceLimits(limits);

  const size = Buffer.byteLength(JSON.stringify(document), 'utf8');
  if (size > resolved.maxDocumentSize) {
    throw new JsonLdError(
      'resource limit exceeded',
      `Document size ${size} bytes exceeds limit of ${resolved.maxDocumentSize} bytes`,
    );
  }

  const depth = measureDepth(document);
  if (depth > resolved.maxGraphDepth) {
    throw new JsonLdError(
      'resource limit exceeded',
      `Document nesting depth ${depth} exceeds limit of ${resolved.maxGraphDepth}`,
    );
  }
}

/**
 * Rejects with `resource limit exceeded` when `promise` has not settled
 * within `timeoutMs`.
 */
export function withTimeout<T>(promise: Promise<T>, timeoutMs: number, operation: string = 'processing'): Promise<T> {
  return new Promise((resolve, reject) => {
    const timer = setTimeout(() => {
      reject(new JsonLdError('resource limit exceeded', `${operation} timed out after ${timeoutMs}ms`));
    }, timeoutMs);

    promise
      .then((result) => {
        clearTimeout(timer);
        resolve(result);
      })
      .catch((err: unknown) => {
        clearTimeout(timer);
        reject(err);
      });
  });
}
