import { EmbeddingProvider } from '../embeddings/embedding.types';
import {
  Document,
  DocumentChunk,
  DocumentMetadataFilter,
  Query,
  QueryResult,
  QueryWithEmbedding,
} from '../retrieval/retrieval.types';
import { ChunkingOptions, createDocumentChunks, DEFAULT_CHUNKING, withDocumentId } from './chunks';

export interface DeleteParams {
  ids?: string[];
  filter?: DocumentMetadataFilter;
  deleteAll?: boolean;
}

/**
 * A vector index behind the retrieval API. Subclasses store and search
 * embedded chunks; chunking and embedding happen here.
 */
export abstract class DataStore {
  protected constructor(
    protected readonly embeddings: EmbeddingProvider,
    protected readonly chunking: ChunkingOptions = DEFAULT_CHUNKING,
  ) {}

  /**
   * Replaces the chunks of every document and returns the document ids in
   * input order. Documents without an id get a fresh one.
   */
  async upsert(documents: Document[]): Promise<string[]> {
    const identified = documents.map(withDocumentId);

    const replaced = documents.flatMap((document) => (document.id ? [document.id] : []));
    if (replaced.length > 0) {
      await this.delete({ ids: replaced });
    }

    const chunks = identified.flatMap((document) => createDocumentChunks(document, this.chunking));
    if (chunks.length > 0) {
      const vectors = await this.embeddings.embed(chunks.map((chunk) => chunk.text));
      await this.upsertChunks(chunks.map((chunk, index) => ({ ...chunk, embedding: vectors[index] })));
    }

    return identified.map((document) => document.id);
  }

  /** One result set per query, in query order. */
  async query(queries: Query[]): Promise<QueryResult[]> {
    if (queries.length === 0) {
      return [];
    }
    const vectors = await this.embeddings.embed(queries.map((query) => query.query));
    return this.queryWithEmbeddings(queries.map((query, index) => ({ ...query, embedding: vectors[index] })));
  }

  abstract delete(params: DeleteParams): Promise<boolean>;

  protected abstract upsertChunks(chunks: DocumentChunk[]): Promise<void>;

  protected abstract queryWithEmbeddings(queries: QueryWithEmbedding[]): Promise<QueryResult[]>;
}
