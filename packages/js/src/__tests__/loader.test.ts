import { describe, it, expect, jest } from '@jest/globals';
import { DocumentLoaderError } from '../errors.js';
import {
    cachingDocumentLoader,
    noDocumentLoader,
    secureDocumentLoader,
    staticDocumentLoader,
    timeoutDocumentLoader,
} from '../loader.js';
import type { DocumentLoader } from '../types.js';

const PERSON = { '@context': { name: 'http://schema.org/name' } };

describe('Document loaders', () => {
    describe('noDocumentLoader', () => {
        it('should reject every request', async () => {
            await expect(noDocumentLoader('http://example.com/ctx')).rejects.toMatchObject({
                kind: 'loading failed',
                url: 'http://example.com/ctx',
            });
        });
    });

    describe('staticDocumentLoader', () => {
        it('should serve registered documents from a record or a map', async () => {
            const fromRecord = staticDocumentLoader({ 'http://example.com/person': PERSON });
            const fromMap = staticDocumentLoader(new Map([['http://example.com/person', PERSON]]));
            expect(await fromRecord('http://example.com/person')).toEqual({
                document: PERSON,
                documentUrl: 'http://example.com/person',
            });
            expect((await fromMap('http://example.com/person')).document).toEqual(PERSON);
        });

        it('should report unknown IRIs as not found', async () => {
            const loader = staticDocumentLoader({});
            await expect(loader('http://example.com/missing')).rejects.toBeInstanceOf(DocumentLoaderError);
            await expect(loader('http://example.com/missing')).rejects.toMatchObject({ kind: 'not found' });
        });
    });

    describe('cachingDocumentLoader', () => {
        it('should fetch each IRI once', async () => {
            const inner = jest.fn<DocumentLoader>(async (url) => ({ document: PERSON, documentUrl: url }));
            const loader = cachingDocumentLoader(inner);

            const [first, second] = await Promise.all([loader('a'), loader('a')]);
            await loader('b');

            expect(first).toBe(second);
            expect(inner.mock.calls.map(([url]) => url)).toEqual(['a', 'b']);
        });

        it('should retry after a failure', async () => {
            let attempts = 0;
            const inner: DocumentLoader = async (url) => {
                attempts += 1;
                if (attempts === 1) throw new DocumentLoaderError('loading failed', url, 'flaky');
                return { document: PERSON, documentUrl: url };
            };
            const loader = cachingDocumentLoader(inner);

            await expect(loader('a')).rejects.toMatchObject({ message: 'flaky' });
            expect((await loader('a')).document).toEqual(PERSON);
            expect(attempts).toBe(2);
        });

        it('should forget documents on clear', async () => {
            const inner = jest.fn<DocumentLoader>(async (url) => ({ document: PERSON, documentUrl: url }));
            const loader = cachingDocumentLoader(inner);

            await loader('a');
            loader.clear();
            await loader('a');

            expect(inner).toHaveBeenCalledTimes(2);
        });
    });

    describe('secureDocumentLoader', () => {
        const inner = staticDocumentLoader({
            'https://schema.org/': PERSON,
            'https://evil.example/ctx': PERSON,
        });

        it('should pass allowed IRIs through', async () => {
            const loader = secureDocumentLoader(inner, { allowed: ['https://schema.org/'] });
            expect((await loader('https://schema.org/')).document).toEqual(PERSON);
        });

        it('should block IRIs outside the allowlist before loading', async () => {
            const spy = jest.fn(inner);
            const loader = secureDocumentLoader(spy, { allowed: ['https://schema.org/'] });
            await expect(loader('https://evil.example/ctx')).rejects.toMatchObject({
                kind: 'loading failed',
                message: 'Context URL blocked by allowlist: https://evil.example/ctx. Allowed: ["https://schema.org/"]',
            });
            expect(spy).not.toHaveBeenCalled();
        });
    });

    describe('timeoutDocumentLoader', () => {
        it('should reject slow loads', async () => {
            const never: DocumentLoader = () => new Promise(() => undefined);
            const loader = timeoutDocumentLoader(never, 10);
            await expect(loader('http://example.com/slow')).rejects.toMatchObject({
                kind: 'loading failed',
                message: 'Loading http://example.com/slow timed out after 10ms',
            });
        });

        it('should pass through loads that finish in time', async () => {
            const loader = timeoutDocumentLoader(staticDocumentLoader({ a: PERSON }), 1000);
            expect((await loader('a')).documentUrl).toBe('a');
        });
    });
});
