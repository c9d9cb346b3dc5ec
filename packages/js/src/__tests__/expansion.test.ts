import { describe, it, expect } from '@jest/globals';
import { CounterBlankNodeGenerator } from '../blank-node.js';
import { ActiveContext } from '../context/active-context.js';
import { Expander } from '../expansion/expand.js';
import { expansionRun } from '../options.js';
import { expand } from '../processor.js';
import { isObject } from '../value.js';

const NAME_CONTEXT = { name: 'http://schema.org/name' };

describe('Expansion', () => {
    describe('terms and values', () => {
        it('should expand terms to IRIs and scalars to value objects', async () => {
            const doc = { '@context': NAME_CONTEXT, '@id': 'http://example.com/ann', name: 'Ann' };
            expect(await expand(doc)).toEqual([
                { '@id': 'http://example.com/ann', 'http://schema.org/name': [{ '@value': 'Ann' }] },
            ]);
        });

        it('should be idempotent on expanded documents', async () => {
            const expanded = await expand({ '@context': NAME_CONTEXT, '@id': 'http://example.com/ann', name: 'Ann' });
            expect(await expand(expanded)).toEqual(expanded);
        });

        it('should expand @type and properties through the vocabulary mapping', async () => {
            const doc = {
                '@context': { '@vocab': 'http://example.com/vocab#' },
                '@type': 'Person',
                name: 'Ann',
            };
            expect(await expand(doc)).toEqual([
                {
                    '@type': ['http://example.com/vocab#Person'],
                    'http://example.com/vocab#name': [{ '@value': 'Ann' }],
                },
            ]);
        });

        it('should resolve @id against the base IRI', async () => {
            const doc = { '@id': 'ann', 'http://example.com/p': 'x' };
            expect(await expand(doc, { base: 'http://example.com/people/' })).toEqual([
                { '@id': 'http://example.com/people/ann', 'http://example.com/p': [{ '@value': 'x' }] },
            ]);
        });

        it('should apply type coercion', async () => {
            const doc = {
                '@context': {
                    age: { '@id': 'http://example.com/age', '@type': 'http://www.w3.org/2001/XMLSchema#integer' },
                    knows: { '@id': 'http://example.com/knows', '@type': '@id' },
                },
                '@id': 'http://example.com/ann',
                age: '42',
                knows: 'http://example.com/bob',
            };
            expect(await expand(doc)).toEqual([
                {
                    '@id': 'http://example.com/ann',
                    'http://example.com/age': [
                        { '@value': '42', '@type': 'http://www.w3.org/2001/XMLSchema#integer' },
                    ],
                    'http://example.com/knows': [{ '@id': 'http://example.com/bob' }],
                },
            ]);
        });

        it('should keep JSON literals verbatim', async () => {
            const doc = {
                '@context': { data: { '@id': 'http://example.com/data', '@type': '@json' } },
                data: { a: [1, 2] },
            };
            expect(await expand(doc)).toEqual([
                { 'http://example.com/data': [{ '@value': { a: [1, 2] }, '@type': '@json' }] },
            ]);
        });
    });

    describe('key policies', () => {
        const doc = { name: 'Ann' };

        it('should drop unmapped keys under the standard policy', async () => {
            expect(await expand(doc)).toEqual([]);
        });

        it('should keep unmapped keys under the relaxed policy', async () => {
            expect(await expand(doc, { policy: 'relaxed' })).toEqual([{ name: [{ '@value': 'Ann' }] }]);
        });

        it('should fail on unmapped keys under the strict policy', async () => {
            await expect(expand(doc, { policy: 'strict' })).rejects.toMatchObject({ code: 'key expansion failed' });
        });

        it('should accept colon keys under strict but not under strictest', async () => {
            const colonDoc = { '1:name': 'Ann' };
            expect(await expand(colonDoc, { policy: 'strict' })).toEqual([{ '1:name': [{ '@value': 'Ann' }] }]);
            await expect(expand(colonDoc, { policy: 'strictest' })).rejects.toMatchObject({
                code: 'key expansion failed',
            });
        });
    });

    describe('dropping', () => {
        it('should drop null values and null @value', async () => {
            const doc = {
                '@context': NAME_CONTEXT,
                '@id': 'http://example.com/a',
                name: null,
                'http://example.com/p': 'x',
                'http://example.com/q': { '@value': null },
            };
            expect(await expand(doc)).toEqual([
                { '@id': 'http://example.com/a', 'http://example.com/p': [{ '@value': 'x' }] },
            ]);
        });

        it('should keep top-level nodes that only carry @id', async () => {
            expect(await expand({ '@id': 'http://example.com/a' })).toEqual([{ '@id': 'http://example.com/a' }]);
            expect(
                await expand({ '@graph': [{ '@id': 'http://example.com/a' }, { '@id': 'http://example.com/b' }] }),
            ).toEqual([{ '@id': 'http://example.com/a' }, { '@id': 'http://example.com/b' }]);
        });

        it('should drop empty top-level maps and lists', async () => {
            expect(await expand({})).toEqual([]);
            expect(await expand({ '@list': ['a'] })).toEqual([]);
        });

        it('should drop free-floating values', async () => {
            expect(await expand({ '@value': 'loose' })).toEqual([]);
            expect(await expand('loose')).toEqual([]);
        });
    });

    describe('containers', () => {
        it('should wrap @list container values in a list object', async () => {
            const doc = {
                '@context': { tags: { '@id': 'http://example.com/tags', '@container': '@list' } },
                tags: ['a', 'b'],
            };
            expect(await expand(doc)).toEqual([
                { 'http://example.com/tags': [{ '@list': [{ '@value': 'a' }, { '@value': 'b' }] }] },
            ]);
        });

        it('should expand language maps with normalised tags', async () => {
            const doc = {
                '@context': { label: { '@id': 'http://example.com/label', '@container': '@language' } },
                label: { en: 'Hello', DE: 'Hallo' },
            };
            expect(await expand(doc)).toEqual([
                {
                    'http://example.com/label': [
                        { '@value': 'Hello', '@language': 'en' },
                        { '@value': 'Hallo', '@language': 'de' },
                    ],
                },
            ]);
        });

        it('should move index map keys into @index', async () => {
            const doc = {
                '@context': { post: { '@id': 'http://example.com/post', '@container': '@index' } },
                '@id': 'http://example.com/blog',
                post: { en: { '@id': 'http://example.com/p1' } },
            };
            expect(await expand(doc)).toEqual([
                {
                    '@id': 'http://example.com/blog',
                    'http://example.com/post': [{ '@id': 'http://example.com/p1', '@index': 'en' }],
                },
            ]);
        });

        it('should turn id map keys into node identifiers', async () => {
            const doc = {
                '@context': { member: { '@id': 'http://example.com/member', '@container': '@id' } },
                '@id': 'http://example.com/team',
                member: {
                    'http://example.com/ann': { 'http://example.com/name': 'Ann' },
                    bob: {},
                },
            };
            expect(await expand(doc, { base: 'http://example.com/' })).toEqual([
                {
                    '@id': 'http://example.com/team',
                    'http://example.com/member': [
                        { '@id': 'http://example.com/ann', 'http://example.com/name': [{ '@value': 'Ann' }] },
                        { '@id': 'http://example.com/bob' },
                    ],
                },
            ]);
        });

        it('should add type map keys to @type', async () => {
            const doc = {
                '@context': {
                    '@vocab': 'http://example.com/',
                    byType: { '@id': 'http://example.com/byType', '@container': '@type' },
                },
                byType: {
                    Person: { '@id': 'http://example.com/ann' },
                    Place: { name: 'Oslo' },
                },
            };
            expect(await expand(doc)).toEqual([
                {
                    'http://example.com/byType': [
                        { '@id': 'http://example.com/ann', '@type': ['http://example.com/Person'] },
                        { '@type': ['http://example.com/Place'], 'http://example.com/name': [{ '@value': 'Oslo' }] },
                    ],
                },
            ]);
        });

        it('should wrap @graph container values in graph objects', async () => {
            const doc = {
                '@context': { claim: { '@id': 'http://example.com/claim', '@container': '@graph' } },
                '@id': 'http://example.com/doc',
                claim: { '@id': 'http://example.com/ann', 'http://example.com/age': 30 },
            };
            expect(await expand(doc)).toEqual([
                {
                    '@id': 'http://example.com/doc',
                    'http://example.com/claim': [
                        { '@graph': [{ '@id': 'http://example.com/ann', 'http://example.com/age': [{ '@value': 30 }] }] },
                    ],
                },
            ]);
        });

        it('should reject value objects under a property-valued index', async () => {
            const doc = {
                '@context': {
                    post: { '@id': 'http://example.com/post', '@container': '@index', '@index': 'http://example.com/lang' },
                },
                post: { en: 'Hello' },
            };
            await expect(expand(doc)).rejects.toMatchObject({ code: 'invalid value object' });
        });
    });

    describe('lists of lists', () => {
        const context = { matrix: { '@id': 'http://example.com/matrix', '@container': '@list' } };

        it('should nest arrays under a @list container as lists', async () => {
            const doc = { '@context': context, matrix: [['a', 'b'], ['c']] };
            expect(await expand(doc)).toEqual([
                {
                    'http://example.com/matrix': [
                        {
                            '@list': [
                                { '@list': [{ '@value': 'a' }, { '@value': 'b' }] },
                                { '@list': [{ '@value': 'c' }] },
                            ],
                        },
                    ],
                },
            ]);
        });

        it('should keep an explicit list inside a list', async () => {
            const doc = { 'http://example.com/p': { '@list': [{ '@list': ['a'] }] } };
            expect(await expand(doc)).toEqual([
                { 'http://example.com/p': [{ '@list': [{ '@list': [{ '@value': 'a' }] }] }] },
            ]);
        });

        it('should reject both forms in json-ld-1.0 mode', async () => {
            const options = { processingMode: 'json-ld-1.0' } as const;
            await expect(expand({ '@context': context, matrix: [['a'], ['b']] }, options)).rejects.toMatchObject({
                code: 'list of lists',
            });
            await expect(
                expand({ 'http://example.com/p': { '@list': [{ '@list': ['a'] }] } }, options),
            ).rejects.toMatchObject({ code: 'list of lists' });
        });
    });

    describe('scoped contexts', () => {
        const context = {
            Person: { '@id': 'http://example.com/Person', '@context': { name: 'http://example.com/personName' } },
            name: 'http://example.com/name',
            knows: 'http://example.com/knows',
        };

        it('should apply type-scoped contexts to the typed node only', async () => {
            const doc = { '@context': context, '@type': 'Person', name: 'Ann', knows: { name: 'Bob' } };
            expect(await expand(doc)).toEqual([
                {
                    '@type': ['http://example.com/Person'],
                    'http://example.com/personName': [{ '@value': 'Ann' }],
                    'http://example.com/knows': [{ 'http://example.com/name': [{ '@value': 'Bob' }] }],
                },
            ]);
        });

        it('should return to the outer context below a non-propagated property-scoped context', async () => {
            const doc = {
                '@context': {
                    '@vocab': 'http://example.com/',
                    author: {
                        '@id': 'http://example.com/author',
                        '@context': { '@propagate': false, name: 'http://example.com/authorName' },
                    },
                },
                author: { name: 'Ann', knows: { name: 'Bob' } },
            };
            expect(await expand(doc)).toEqual([
                {
                    'http://example.com/author': [
                        {
                            'http://example.com/authorName': [{ '@value': 'Ann' }],
                            'http://example.com/knows': [{ 'http://example.com/name': [{ '@value': 'Bob' }] }],
                        },
                    ],
                },
            ]);
        });

        describe('protected terms', () => {
            const protectedContext = {
                '@protected': true,
                name: 'http://schema.org/name',
                author: { '@id': 'http://example.com/author', '@context': { name: 'http://example.com/authorName' } },
                Book: { '@id': 'http://example.com/Book', '@context': { name: 'http://example.com/title' } },
            };

            it('should let a property-scoped context override a protected term', async () => {
                const doc = { '@context': protectedContext, name: 'Notes', author: { name: 'Ann' } };
                expect(await expand(doc)).toEqual([
                    {
                        'http://schema.org/name': [{ '@value': 'Notes' }],
                        'http://example.com/author': [{ 'http://example.com/authorName': [{ '@value': 'Ann' }] }],
                    },
                ]);
            });

            it('should not let a type-scoped context override a protected term', async () => {
                const doc = { '@context': protectedContext, '@type': 'Book', name: 'Notes' };
                await expect(expand(doc)).rejects.toMatchObject({ code: 'protected term redefinition' });
            });

            it('should reject redefining a protected term in a later context', async () => {
                const doc = { '@context': [protectedContext, { name: 'http://example.com/other' }], name: 'Notes' };
                await expect(expand(doc)).rejects.toMatchObject({ code: 'protected term redefinition' });
            });
        });
    });

    describe('keywords', () => {
        it('should store reverse properties under @reverse', async () => {
            const doc = {
                '@context': { children: { '@reverse': 'http://example.com/parent' } },
                '@id': 'http://example.com/ann',
                children: { '@id': 'http://example.com/bob' },
            };
            expect(await expand(doc)).toEqual([
                {
                    '@id': 'http://example.com/ann',
                    '@reverse': { 'http://example.com/parent': [{ '@id': 'http://example.com/bob' }] },
                },
            ]);
        });

        it('should lift nested properties into the node', async () => {
            const doc = {
                '@context': { details: '@nest', age: { '@id': 'http://example.com/age', '@nest': 'details' } },
                '@id': 'http://example.com/ann',
                details: { age: 30 },
            };
            expect(await expand(doc)).toEqual([
                { '@id': 'http://example.com/ann', 'http://example.com/age': [{ '@value': 30 }] },
            ]);
        });

        it('should unwrap a top-level @graph', async () => {
            const doc = {
                '@context': NAME_CONTEXT,
                '@graph': [
                    { '@id': 'http://example.com/a', name: 'Ann' },
                    { '@id': 'http://example.com/b', name: 'Bob' },
                ],
            };
            expect(await expand(doc)).toEqual([
                { '@id': 'http://example.com/a', 'http://schema.org/name': [{ '@value': 'Ann' }] },
                { '@id': 'http://example.com/b', 'http://schema.org/name': [{ '@value': 'Bob' }] },
            ]);
        });

        it('should keep @included nodes in json-ld-1.1 and ignore them in json-ld-1.0', async () => {
            const doc = {
                '@context': { '@vocab': 'http://example.com/' },
                '@id': 'http://example.com/a',
                '@included': [{ '@id': 'http://example.com/b', name: 'Bob' }],
            };
            expect(await expand(doc)).toEqual([
                {
                    '@id': 'http://example.com/a',
                    '@included': [{ '@id': 'http://example.com/b', 'http://example.com/name': [{ '@value': 'Bob' }] }],
                },
            ]);
            expect(await expand(doc, { processingMode: 'json-ld-1.0' })).toEqual([{ '@id': 'http://example.com/a' }]);
        });

        it('should reject colliding keywords', async () => {
            const doc = {
                '@context': { id: '@id' },
                '@id': 'http://example.com/a',
                id: 'http://example.com/b',
            };
            await expect(expand(doc)).rejects.toMatchObject({ code: 'colliding keywords' });
        });

        it('should reject value objects mixing @type and @language', async () => {
            const doc = {
                'http://example.com/p': { '@value': 'x', '@language': 'en', '@type': 'http://example.com/t' },
            };
            await expect(expand(doc)).rejects.toMatchObject({ code: 'invalid value object' });
        });
    });

    describe('options', () => {
        it('should order keys by code point when ordered', async () => {
            const [node] = await expand({ 'http://example.com/b': '1', 'http://example.com/a': '2' }, { ordered: true });
            expect(isObject(node) ? Object.keys(node) : []).toEqual(['http://example.com/a', 'http://example.com/b']);
        });

        it('should relabel blank nodes and name anonymous nodes with a generator', async () => {
            const doc = {
                '@id': '_:x',
                'http://example.com/knows': { '@id': '_:y', 'http://example.com/name': 'Bob' },
                'http://example.com/likes': { '@id': '_:x' },
            };
            expect(await expand(doc, { generator: new CounterBlankNodeGenerator() })).toEqual([
                {
                    '@id': '_:b0',
                    'http://example.com/knows': [{ '@id': '_:b1', 'http://example.com/name': [{ '@value': 'Bob' }] }],
                    'http://example.com/likes': [{ '@id': '_:b0' }],
                },
            ]);

            expect(await expand({ 'http://example.com/name': 'Ann' }, { generator: new CounterBlankNodeGenerator('n') })).toEqual([
                { '@id': '_:n0', 'http://example.com/name': [{ '@value': 'Ann' }] },
            ]);
        });

        it('should issue the same labels when one options object is reused', async () => {
            const options = { generator: new CounterBlankNodeGenerator() };
            const doc = {
                'http://example.com/knows': [{ 'http://example.com/name': 'Bob' }, { 'http://example.com/name': 'Cy' }],
            };
            const first = await expand(doc, options);
            expect(first).toEqual([
                {
                    '@id': '_:b2',
                    'http://example.com/knows': [
                        { '@id': '_:b0', 'http://example.com/name': [{ '@value': 'Bob' }] },
                        { '@id': '_:b1', 'http://example.com/name': [{ '@value': 'Cy' }] },
                    ],
                },
            ]);
            expect(await expand(doc, options)).toEqual(first);
        });
    });

    describe('Expander', () => {
        it('should stop at the configured depth', async () => {
            const expander = new Expander(expansionRun({ resourceLimits: { maxGraphDepth: 2 } }));
            const doc = { 'http://example.com/p': { 'http://example.com/p': { 'http://example.com/p': 'x' } } };
            await expect(expander.expandDocument(ActiveContext.initial(null), doc, null)).rejects.toMatchObject({
                code: 'resource limit exceeded',
            });
        });
    });
});
