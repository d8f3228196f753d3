import { FakeEmbeddings, InMemoryDataStore } from '../../test/fakes/in-memory.datastore';

describe('DataStore', () => {
  let embeddings: FakeEmbeddings;
  let store: InMemoryDataStore;

  beforeEach(() => {
    embeddings = new FakeEmbeddings();
    store = new InMemoryDataStore('docs', embeddings);
  });

  describe('upsert', () => {
    it('returns one id per document in input order', async () => {
      const ids = await store.upsert([
        { id: 'doc-1', text: 'first document' },
        { text: 'second document' },
        { id: 'doc-3', text: '' },
      ]);

      expect(ids).toHaveLength(3);
      expect(ids[0]).toBe('doc-1');
      expect(ids[1]).toMatch(/^[0-9a-f-]{36}$/);
      expect(ids[2]).toBe('doc-3');
    });

    it('stores chunks tagged with their document id', async () => {
      await store.upsert([{ id: 'doc-1', text: 'first document', metadata: { source: 'chat' } }]);

      expect(store.chunks.get('doc-1_0')).toEqual({
        id: 'doc-1_0',
        text: 'first document',
        metadata: { source: 'chat', document_id: 'doc-1' },
        embedding: [14, 4, 1],
      });
    });

    it('embeds every chunk in a single call', async () => {
      await store.upsert([
        { id: 'a', text: 'alpha text' },
        { id: 'b', text: 'bravo text' },
      ]);

      expect(embeddings.calls).toEqual([['alpha text', 'bravo text']]);
    });

    it('removes the previous chunks of documents that carry an id', async () => {
      await store.upsert([{ id: 'doc-1', text: 'old paragraph\n\n' + 'x'.repeat(200) }]);
      expect(store.chunks.has('doc-1_1')).toBe(true);

      await store.upsert([{ id: 'doc-1', text: 'new paragraph' }, { text: 'no id here' }]);

      expect(store.deletes).toEqual([{ ids: ['doc-1'] }, { ids: ['doc-1'] }]);
      expect(store.chunks.has('doc-1_1')).toBe(false);
      expect(store.chunks.get('doc-1_0')?.text).toBe('new paragraph');
    });

    it('skips embedding when no document yields a chunk', async () => {
      const ids = await store.upsert([{ id: 'empty', text: '   ' }]);

      expect(ids).toEqual(['empty']);
      expect(embeddings.calls).toEqual([]);
    });
  });

  describe('query', () => {
    it('returns one result set per query in query order', async () => {
      await store.upsert([{ id: 'doc-1', text: 'some stored text' }]);

      const results = await store.query([
        { query: 'first question', top_k: 3 },
        { query: 'second question', top_k: 3 },
      ]);

      expect(results.map((result) => result.query)).toEqual(['first question', 'second question']);
      expect(results[0].results.map((chunk) => chunk.id)).toEqual(['doc-1_0']);
    });

    it('embeds all queries in one call', async () => {
      await store.query([
        { query: 'one', top_k: 1 },
        { query: 'two', top_k: 1 },
      ]);

      expect(embeddings.calls).toEqual([['one', 'two']]);
    });

    it('returns no results for no queries', async () => {
      await expect(store.query([])).resolves.toEqual([]);
      expect(embeddings.calls).toEqual([]);
    });
  });
});
