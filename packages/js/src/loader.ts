/**
 * Document loaders
 *
 * Loaders retrieve remote contexts by IRI. The engine never performs I/O
 * itself; it only calls the loader it is given.
 */

import { readFile } from 'node:fs/promises';
import * as path from 'node:path';
import { DocumentLoaderError } from './errors.js';
import { parseJson } from './schemas.js';
import { isContextAllowed } from './security.js';
import type { ContextAllowlist, DocumentLoader, RemoteDocument } from './types.js';
import type { JsonValue } from './value.js';

/** Rejects every request. Used when no loader is configured. */
export const noDocumentLoader: DocumentLoader = (url) =>
  Promise.reject(new DocumentLoaderError('loading failed', url, `No document loader is configured to load ${url}`));

/**
 * Serves documents from memory, keyed by IRI. Useful for bundled contexts
 * and tests.
 */
export function staticDocumentLoader(
  documents: Readonly<Record<string, JsonValue>> | ReadonlyMap<string, JsonValue>,
): DocumentLoader {
  const table = documents instanceof Map ? documents : new Map(Object.entries(documents));
  return async (url) => {
    const document = table.get(url);
    if (document === undefined) {
      throw new DocumentLoaderError('not found', url, `No document registered for ${url}`);
    }
    return { document, documentUrl: url };
  };
}

export interface FileSystemMount {
  /** IRIs starting with this prefix are served from `directory` */
  urlPrefix: string;
  directory: string;
}

/**
 * Maps IRI prefixes onto directories and reads JSON files from them. The
 * remainder of the IRI after the prefix is the file's relative path.
 */
export function fileSystemDocumentLoader(mounts: readonly FileSystemMount[]): DocumentLoader {
  return async (url) => {
    const mount = mounts.find((candidate) => url.startsWith(candidate.urlPrefix));
    if (mount === undefined) {
      throw new DocumentLoaderError('not found', url, `No mount serves ${url}`);
    }
    const root = path.resolve(mount.directory);
    const file = path.resolve(root, url.slice(mount.urlPrefix.length));
    if (file !== root && !file.startsWith(root + path.sep)) {
      throw new DocumentLoaderError('not found', url, `${url} resolves outside its mount`);
    }

    let text: string;
    try {
      text = await readFile(file, 'utf8');
    } catch (error) {
      const missing = error instanceof Error && 'code' in error && error.code === 'ENOENT';
      throw new DocumentLoaderError(missing ? 'not found' : 'loading failed', url, `Cannot read ${file}`, {
        cause: error,
      });
    }

    try {
      return { document: parseJson(text), documentUrl: url };
    } catch (error) {
      throw new DocumentLoaderError('loading failed', url, `${file} is not valid JSON`, { cause: error });
    }
  };
}

export interface CachingDocumentLoader extends DocumentLoader {
  /** Forgets every cached document */
  clear(): void;
}

/**
 * Caches documents by IRI. Concurrent requests for the same IRI share one
 * fetch; a failed fetch is evicted so the next request retries.
 */
export function cachingDocumentLoader(loader: DocumentLoader): CachingDocumentLoader {
  const cache = new Map<string, Promise<RemoteDocument>>();

  const load = (url: string): Promise<RemoteDocument> => {
    const cached = cache.get(url);
    if (cached !== undefined) return cached;
    const pending = loader(url);
    cache.set(url, pending);
    pending.catch(() => {
      if (cache.get(url) === pending) cache.delete(url);
    });
    return pending;
  };

  return Object.assign(load, { clear: () => cache.clear() });
}

/**
 * Wraps a loader with allowlist enforcement. Blocked IRIs reject before
 * the underlying loader is called.
 */
export function secureDocumentLoader(loader: DocumentLoader, config: ContextAllowlist): DocumentLoader {
  return async (url) => {
    if (!isContextAllowed(url, config)) {
      throw new DocumentLoaderError(
        'loading failed',
        url,
        `Context URL blocked by allowlist: ${url}. Allowed: ${JSON.stringify(config.allowed ?? [])}`,
      );
    }
    return loader(url);
  };
}

/** Fails requests that take longer than `timeoutMs`. */
export function timeoutDocumentLoader(loader: DocumentLoader, timeoutMs: number): DocumentLoader {
  return (url) =>
    new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        reject(new DocumentLoaderError('loading failed', url, `Loading ${url} timed out after ${timeoutMs}ms`));
      }, timeoutMs);

      loader(url)
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
