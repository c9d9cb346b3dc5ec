import { describe, it, expect, jest } from '@jest/globals';
import { ActiveContext } from '../context/active-context.js';
import { expandIri } from '../context/iri-expansion.js';
import { ContextProcessingOptions, processContext } from '../context/processing.js';
import { DocumentLoaderError, JsonLdError, ProcessingWarning } from '../errors.js';
import { staticDocumentLoader } from '../loader.js';
import { Logger } from '../logger.js';
import { contextProcessingOptions } from '../options.js';
import { JsonValue } from '../value.js';

function options(overrides: Partial<ContextProcessingOptions> = {}): ContextProcessingOptions {
    return { ...contextProcessingOptions({}), ...overrides };
}

function process(local: JsonValue, opts: ContextProcessingOptions = options()): Promise<ActiveContext> {
    return processContext(ActiveContext.initial(null), local, null, opts);
}

function recordingLogger(warnings: ProcessingWarning[]): Logger {
    return {
        debug: () => undefined,
        warn: (_message, warning) => {
            if (warning) warnings.push(warning);
        },
    };
}

describe('Context processing', () => {
    describe('term definitions', () => {
        it('should define simple terms', async () => {
            const ctx = await process({ name: 'http://schema.org/name' });
            const definition = ctx.getTerm('name');
            expect(definition?.iri).toBe('http://schema.org/name');
            expect(definition?.prefix).toBe(false);
            expect(definition?.container).toEqual([]);
        });

        it('should flag terms mapped to gen-delim IRIs as prefixes', async () => {
            const ctx = await process({ ex: 'http://example.com/' });
            expect(ctx.getTerm('ex')?.prefix).toBe(true);
            expect(expandIri(ctx, 'ex:name', { vocab: true })).toBe('http://example.com/name');
        });

        it('should resolve terms through other terms of the same context', async () => {
            const ctx = await process({
                knows: { '@id': 'ex:knows', '@type': '@id' },
                ex: 'http://example.com/',
            });
            expect(ctx.getTerm('knows')?.iri).toBe('http://example.com/knows');
            expect(ctx.getTerm('knows')?.type).toBe('@id');
        });

        it('should sort container mappings', async () => {
            const ctx = await process({
                tags: { '@id': 'http://example.com/tags', '@container': ['@set', '@index'] },
            });
            expect(ctx.getTerm('tags')?.container).toEqual(['@index', '@set']);
        });

        it('should derive IRIs from the vocabulary mapping', async () => {
            const ctx = await process({ '@vocab': 'http://example.com/vocab#', label: {} });
            expect(ctx.vocab).toBe('http://example.com/vocab#');
            expect(ctx.getTerm('label')?.iri).toBe('http://example.com/vocab#label');
            expect(expandIri(ctx, 'thing', { vocab: true })).toBe('http://example.com/vocab#thing');
        });

        it('should normalise the default language', async () => {
            const ctx = await process({ '@language': 'EN-us' });
            expect(ctx.defaultLanguage).toBe('en-us');
        });

        it('should resolve a relative @base against the current base', async () => {
            const ctx = await processContext(
                ActiveContext.initial('http://example.com/docs/'),
                { '@base': 'sub/' },
                null,
                options(),
            );
            expect(ctx.baseIri).toBe('http://example.com/docs/sub/');
            expect(ctx.originalBaseUrl).toBe('http://example.com/docs/');
        });

        it('should decouple terms mapped to null', async () => {
            const ctx = await process({ '@vocab': 'http://example.com/', hidden: null });
            expect(ctx.getTerm('hidden')?.iri).toBeNull();
            expect(expandIri(ctx, 'hidden', { vocab: true })).toBeNull();
        });
    });

    describe('snapshots', () => {
        it('should leave the input context untouched', async () => {
            const first = await process({ a: 'http://example.com/a' });
            const second = await processContext(first, { b: 'http://example.com/b' }, null, options());
            expect(first.hasTerm('b')).toBe(false);
            expect(second.hasTerm('a')).toBe(true);
            expect(second.termCount).toBe(2);
        });

        it('should reset to an empty context on null', async () => {
            const ctx = await process([{ a: 'http://example.com/a' }, null]);
            expect(ctx.termCount).toBe(0);
        });

        it('should remember the previous context when not propagated', async () => {
            const base = await process({ a: 'http://example.com/a' });
            const scoped = await processContext(base, { b: 'http://example.com/b' }, null, options(), {
                propagate: false,
            });
            expect(scoped.previousContext).toBe(base);
        });
    });

    describe('protected terms', () => {
        it('should reject a differing redefinition', async () => {
            await expect(
                process([
                    { '@protected': true, name: 'http://schema.org/name' },
                    { name: 'http://example.com/other' },
                ]),
            ).rejects.toMatchObject({ code: 'protected term redefinition' });
        });

        it('should accept an identical redefinition', async () => {
            const ctx = await process([
                { '@protected': true, name: 'http://schema.org/name' },
                { name: 'http://schema.org/name' },
            ]);
            expect(ctx.getTerm('name')?.protected).toBe(true);
        });

        it('should refuse to nullify a context with protected terms', async () => {
            await expect(
                process([{ '@protected': true, name: 'http://schema.org/name' }, null]),
            ).rejects.toMatchObject({ code: 'invalid context nullification' });
        });
    });

    describe('errors', () => {
        it.each<[string, JsonValue, string]>([
            ['cyclic definitions', { a: { '@id': 'b' }, b: { '@id': 'a' } }, 'cyclic IRI mapping'],
            ['keyword redefinition', { '@id': 'http://example.com/id' }, 'keyword redefinition'],
            ['@context alias', { ctx: '@context' }, 'invalid keyword alias'],
            ['unknown container', { x: { '@id': 'http://example.com/x', '@container': '@bogus' } }, 'invalid container mapping'],
            ['unknown entry', { x: { '@id': 'http://example.com/x', '@bogus': true } }, 'invalid term definition'],
            ['term without IRI', { name: { '@type': '@id' } }, 'invalid IRI mapping'],
            ['empty term', { '': 'http://example.com/empty' }, 'invalid term definition'],
            ['non-boolean @protected', { '@protected': 'yes' }, 'invalid @protected value'],
            ['scalar context', 42, 'invalid local context'],
            [
                'invalid scoped context',
                { x: { '@id': 'http://example.com/x', '@context': { y: { '@type': '@id' } } } },
                'invalid scoped context',
            ],
        ])('should reject %s', async (_name, local, code) => {
            await expect(process(local)).rejects.toMatchObject({ code });
        });

        it('should reject @version 1.1 in json-ld-1.0 mode', async () => {
            await expect(
                process({ '@version': 1.1 }, options({ processingMode: 'json-ld-1.0' })),
            ).rejects.toMatchObject({ code: 'processing mode conflict' });
        });

        it('should reject a relative context reference without a base', async () => {
            await expect(process('contexts/person.jsonld')).rejects.toMatchObject({
                code: 'invalid context IRI',
                message: 'Cannot resolve context reference "contexts/person.jsonld" without a base IRI',
            });
        });
    });

    describe('warnings', () => {
        it('should ignore keyword-like terms with a warning', async () => {
            const warnings: ProcessingWarning[] = [];
            const ctx = await process(
                { '@foo': 'http://example.com/foo', name: 'http://schema.org/name' },
                options({ logger: recordingLogger(warnings) }),
            );
            expect(ctx.hasTerm('@foo')).toBe(false);
            expect(ctx.hasTerm('name')).toBe(true);
            expect(warnings.map((w) => w.code)).toEqual(['keyword-like term']);
        });

        it('should warn about malformed language tags', async () => {
            const warnings: ProcessingWarning[] = [];
            const ctx = await process({ '@language': 'not a tag' }, options({ logger: recordingLogger(warnings) }));
            expect(ctx.defaultLanguage).toBe('not a tag');
            expect(warnings.map((w) => w.code)).toEqual(['malformed language tag']);
        });
    });

    describe('remote contexts', () => {
        const loader = staticDocumentLoader({
            'http://example.com/person': { '@context': { name: 'http://schema.org/name' } },
            'http://example.com/a': { '@context': 'http://example.com/b' },
            'http://example.com/b': { '@context': 'http://example.com/a' },
            'http://example.com/outer': { '@context': 'http://example.com/person' },
            'http://example.com/not-a-context': { name: 'http://schema.org/name' },
            'http://example.com/base': {
                '@context': { name: 'http://example.com/name', age: 'http://example.com/age' },
            },
        });

        it('should load and apply a remote context', async () => {
            const ctx = await process('http://example.com/person', options({ documentLoader: loader }));
            expect(ctx.getTerm('name')?.iri).toBe('http://schema.org/name');
        });

        it('should resolve relative references against the base URL', async () => {
            const ctx = await processContext(
                ActiveContext.initial(null),
                'person',
                'http://example.com/doc',
                options({ documentLoader: loader }),
            );
            expect(ctx.hasTerm('name')).toBe(true);
        });

        it('should load each IRI once per run', async () => {
            const counted = jest.fn(loader);
            const debug = jest.fn();
            const opts = options({ documentLoader: counted, logger: { debug, warn: () => undefined } });
            await process(['http://example.com/person', 'http://example.com/person'], opts);
            expect(counted).toHaveBeenCalledTimes(1);
            expect(debug).toHaveBeenCalledWith('Loading remote context http://example.com/person');
        });

        it('should detect recursive inclusion', async () => {
            await expect(
                process('http://example.com/a', options({ documentLoader: loader })),
            ).rejects.toMatchObject({ code: 'recursive context inclusion' });
        });

        it('should bound the chain of remote contexts', async () => {
            await expect(
                process('http://example.com/outer', options({ documentLoader: loader, maxContextDepth: 1 })),
            ).rejects.toMatchObject({ code: 'context overflow' });
        });

        it('should report loader failures with the original error as cause', async () => {
            let caught: unknown;
            try {
                await process('http://example.com/missing', options({ documentLoader: loader }));
            } catch (error) {
                caught = error;
            }
            expect(caught).toBeInstanceOf(JsonLdError);
            if (caught instanceof JsonLdError) {
                expect(caught.code).toBe('loading remote context failed');
                expect(caught.cause).toBeInstanceOf(DocumentLoaderError);
            }
        });

        it('should reject documents without a top-level @context', async () => {
            await expect(
                process('http://example.com/not-a-context', options({ documentLoader: loader })),
            ).rejects.toMatchObject({ code: 'invalid remote context' });
        });

        it('should merge @import under the local entries', async () => {
            const ctx = await process(
                { '@import': 'http://example.com/base', name: 'http://example.com/override' },
                options({ documentLoader: loader }),
            );
            expect(ctx.getTerm('name')?.iri).toBe('http://example.com/override');
            expect(ctx.getTerm('age')?.iri).toBe('http://example.com/age');
        });
    });
});
