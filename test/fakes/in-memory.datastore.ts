import { DataStore, DeleteParams } from '../../src/datastore/datastore';
import { EmbeddingProvider } from '../../src/embeddings/embedding.types';
import { DocumentChunk, QueryResult, QueryWithEmbedding } from '../../src/retrieval/retrieval.types';

/** Deterministic three-dimensional "embedding" derived from the text. */
export class FakeEmbeddings implements EmbeddingProvider {
  readonly calls: string[][] = [];

  async embed(texts: string[]): Promise<number[][]> {
    this.calls.push(texts);
    return texts.map((text) => [text.length, (text.match(/[aeiou]/g) ?? []).length, 1]);
  }
}

function dot(a: number[], b: number[]): number {
  return a.reduce((sum, value, index) => sum + value * (b[index] ?? 0), 0);
}

/** Keeps chunks in a map and ranks them by dot product. */
export class InMemoryDataStore extends DataStore {
  readonly chunks = new Map<string, DocumentChunk>();
  readonly deletes: DeleteParams[] = [];
  failure?: unknown;

  constructor(
    readonly name: string,
    embeddings: EmbeddingProvider = new FakeEmbeddings(),
  ) {
    super(embeddings, { maxChars: 200, overlapChars: 0 });
  }

  async delete(params: DeleteParams): Promise<boolean> {
    this.throwIfFailing();
    this.deletes.push(params);
    if (params.deleteAll) {
      this.chunks.clear();
      return true;
    }
    for (const [id, chunk] of this.chunks) {
      const documentId = chunk.metadata.document_id;
      const byId = params.ids?.some((candidate) => candidate === documentId) ?? false;
      const byFilter = params.filter?.document_id !== undefined && params.filter.document_id === documentId;
      if (byId || byFilter) {
        this.chunks.delete(id);
      }
    }
    return true;
  }

  protected async upsertChunks(chunks: DocumentChunk[]): Promise<void> {
    this.throwIfFailing();
    for (const chunk of chunks) {
      this.chunks.set(chunk.id, chunk);
    }
  }

  protected async queryWithEmbeddings(queries: QueryWithEmbedding[]): Promise<QueryResult[]> {
    this.throwIfFailing();
    return queries.map((query) => ({
      query: query.query,
      results: [...this.chunks.values()]
        .map((chunk) => ({
          id: chunk.id,
          text: chunk.text,
          metadata: chunk.metadata,
          score: dot(query.embedding, chunk.embedding ?? []),
        }))
        .sort((a, b) => b.score - a.score)
        .slice(0, query.top_k),
    }));
  }

  private throwIfFailing(): void {
    if (this.failure !== undefined) {
      throw this.failure;
    }
  }
}
