/**
 * Example 01: Expansion and Compaction
 * ====================================
 *
 * Expands a document into its context-free form, then compacts it again
 * with a different context. Shows type coercion, language maps and the
 * key policies.
 */

import { CounterBlankNodeGenerator, JsonLdError, compact, expand } from '../../packages/js/src/index.js';

const doc = {
  '@context': {
    '@vocab': 'http://schema.org/',
    knows: { '@type': '@id' },
    label: { '@id': 'http://www.w3.org/2000/01/rdf-schema#label', '@container': '@language' },
  },
  '@id': 'http://example.com/ann',
  '@type': 'Person',
  name: 'Ann',
  knows: 'http://example.com/bob',
  label: { en: 'Ann', fr: 'Anne' },
};

async function main(): Promise<void> {
  // ── 1. Expansion ─────────────────────────────────────────────────

  console.log('=== 1. Expansion ===\n');
  const expanded = await expand(doc);
  console.log(JSON.stringify(expanded, null, 2));

  // ── 2. Compaction with another context ───────────────────────────

  console.log('\n=== 2. Compaction ===\n');
  const compacted = await compact(expanded, {
    schema: 'http://schema.org/',
    friend: { '@id': 'http://schema.org/knows', '@type': '@id' },
  });
  console.log(JSON.stringify(compacted, null, 2));
  // "schema:name": "Ann", "friend": "http://example.com/bob", ...

  // ── 3. Key policies ──────────────────────────────────────────────

  console.log('\n=== 3. Key policies ===\n');
  const loose = { '@id': 'http://example.com/x', title: 'untyped key' };
  console.log('standard:', JSON.stringify(await expand(loose)));
  console.log('relaxed: ', JSON.stringify(await expand(loose, { policy: 'relaxed' })));
  try {
    await expand(loose, { policy: 'strict' });
  } catch (err) {
    if (!(err instanceof JsonLdError)) throw err;
    console.log('strict:  ', err.code);
  }

  // ── 4. Blank node relabelling ────────────────────────────────────

  console.log('\n=== 4. Blank nodes ===\n');
  const anonymous = { 'http://schema.org/name': 'Nobody', 'http://schema.org/knows': { '@id': '_:friend' } };
  console.log(JSON.stringify(await expand(anonymous, { generator: new CounterBlankNodeGenerator() })));
}

main().catch((err: unknown) => {
  console.error(err);
  process.exitCode = 1;
});
