import * as path from 'node:path';
import { DocumentLoaderError } from '../src/errors';
import { fileSystemDocumentLoader } from '../src/loader';
import { JsonLdProcessor } from '../src/processor';

const loader = fileSystemDocumentLoader([
  { urlPrefix: 'https://contexts.test/', directory: path.join(__dirname, 'fixtures', 'contexts') },
]);

describe('fileSystemDocumentLoader', () => {
  it('reads JSON documents below the mount', async () => {
    const remote = await loader('https://contexts.test/person.jsonld');
    expect(remote.documentUrl).toBe('https://contexts.test/person.jsonld');
    expect(remote.document).toEqual({
      '@context': {
        name: 'http://schema.org/name',
        knows: { '@id': 'http://schema.org/knows', '@type': '@id' },
      },
    });
  });

  it('reports missing files as not found', async () => {
    await expect(loader('https://contexts.test/missing.jsonld')).rejects.toMatchObject({ kind: 'not found' });
  });

  it('reports invalid JSON as a loading failure', async () => {
    await expect(loader('https://contexts.test/broken.jsonld')).rejects.toMatchObject({ kind: 'loading failed' });
  });

  it('refuses paths that leave the mount', async () => {
    await expect(loader('https://contexts.test/../conformance.json')).rejects.toMatchObject({ kind: 'not found' });
  });

  it('refuses IRIs no mount serves', async () => {
    await expect(loader('https://elsewhere.test/person.jsonld')).rejects.toBeInstanceOf(DocumentLoaderError);
  });

  it('resolves nested relative context references against the loaded document', async () => {
    const processor = new JsonLdProcessor({ documentLoader: loader });
    const expanded = await processor.expand({
      '@context': 'https://contexts.test/outer.jsonld',
      '@id': 'http://example.com/ann',
      age: 30,
    });
    expect(expanded).toEqual([{ '@id': 'http://example.com/ann', 'http://example.com/age': [{ '@value': 30 }] }]);
  });
});
