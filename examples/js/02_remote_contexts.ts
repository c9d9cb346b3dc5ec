/**
 * Example 02: Remote Contexts
 * ===========================
 *
 * Serves contexts from memory behind a cache and an allowlist, and bounds
 * processing with resource limits.
 */

import {
  JsonLdError,
  JsonLdProcessor,
  JsonObject,
  cachingDocumentLoader,
  consoleLogger,
  staticDocumentLoader,
} from '../../packages/js/src/index.js';

const contexts = staticDocumentLoader({
  'https://contexts.example/person': {
    '@context': { name: 'http://schema.org/name', email: 'http://schema.org/email' },
  },
  'https://untrusted.example/context': {
    '@context': { name: 'http://untrusted.example/name' },
  },
});

const processor = new JsonLdProcessor({
  documentLoader: cachingDocumentLoader(contexts),
  contextAllowlist: { patterns: ['https://contexts.example/*'] },
  resourceLimits: { maxGraphDepth: 20, maxExpansionTime: 5_000 },
  logger: consoleLogger,
});

async function main(): Promise<void> {
  console.log('=== 1. Allowed context ===\n');
  const expanded = await processor.expand({
    '@context': 'https://contexts.example/person',
    name: 'Ann',
    email: 'ann@example.com',
  });
  console.log(JSON.stringify(expanded, null, 2));

  console.log('\n=== 2. Blocked context ===\n');
  try {
    await processor.expand({ '@context': 'https://untrusted.example/context', name: 'Eve' });
  } catch (err) {
    if (!(err instanceof JsonLdError)) throw err;
    console.log(`${err.code}: ${err.message}`);
  }

  console.log('\n=== 3. Depth limit ===\n');
  let deep: JsonObject = { 'http://schema.org/name': 'leaf' };
  for (let i = 0; i < 30; i++) deep = { 'http://schema.org/knows': deep };
  try {
    await processor.expand(deep);
  } catch (err) {
    if (!(err instanceof JsonLdError)) throw err;
    console.log(`${err.code}: ${err.message}`);
  }
}

main().catch((err: unknown) => {
  console.error(err);
  process.exitCode = 1;
});
