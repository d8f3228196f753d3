import { Logger } from '@nestjs/common';
import { QdrantClient, Schemas } from '@qdrant/js-client-rest';
import { v5 as uuidv5 } from 'uuid';
import { z } from 'zod';
import { EmbeddingProvider } from '../embeddings/embedding.types';
import {
  DocumentChunk,
  DocumentChunkMetadataSchema,
  DocumentChunkWithScore,
  DocumentMetadataFilter,
  QueryResult,
  QueryWithEmbedding,
} from '../retrieval/retrieval.types';
import { ChunkingOptions } from './chunks';
import { DataStore, DeleteParams } from './datastore';

// Namespace for deriving Qdrant point ids from chunk ids.
const POINT_ID_NAMESPACE = '4f6b3a4e-2c1d-5e8f-9a0b-7c6d5e4f3a2b';

const ChunkPayloadSchema = z.object({
  id: z.string(),
  text: z.string(),
  metadata: DocumentChunkMetadataSchema.default({}),
});

type Condition = Schemas['FieldCondition'];
type Filter = Schemas['Filter'];

export interface QdrantDataStoreOptions {
  dimension: number;
  chunking?: ChunkingOptions;
}

export function toPointId(chunkId: string): string {
  return uuidv5(chunkId, POINT_ID_NAMESPACE);
}

/** Unix seconds for a date string, or undefined when it does not parse. */
export function toUnixSeconds(date: string | undefined): number | undefined {
  if (date === undefined) {
    return undefined;
  }
  const millis = Date.parse(date);
  return Number.isNaN(millis) ? undefined : Math.floor(millis / 1000);
}

export function toQdrantFilter(filter: DocumentMetadataFilter | undefined, ids?: string[]): Filter | undefined {
  const must: Condition[] = [];

  if (ids && ids.length > 0) {
    must.push({ key: 'metadata.document_id', match: { any: ids } });
  }

  if (filter) {
    const { start_date, end_date, ...fields } = filter;
    for (const [field, value] of Object.entries(fields)) {
      if (value !== undefined) {
        must.push({ key: `metadata.${field}`, match: { value } });
      }
    }

    const gte = toUnixSeconds(start_date);
    const lte = toUnixSeconds(end_date);
    if (gte !== undefined || lte !== undefined) {
      must.push({ key: 'created_at', range: { gte, lte } });
    }
  }

  return must.length > 0 ? { must } : undefined;
}

/** One Qdrant collection per store; chunks are stored as points. */
export class QdrantDataStore extends DataStore {
  private readonly logger = new Logger(QdrantDataStore.name);

  constructor(
    private readonly qdrantClient: QdrantClient,
    readonly collectionName: string,
    embeddings: EmbeddingProvider,
    private readonly options: QdrantDataStoreOptions,
  ) {
    super(embeddings, options.chunking);
  }

  async ensureCollectionExists(): Promise<void> {
    const { collections } = await this.qdrantClient.getCollections();
    const collectionExists = collections.some((collection) => collection.name === this.collectionName);

    if (!collectionExists) {
      await this.qdrantClient.createCollection(this.collectionName, {
        vectors: {
          size: this.options.dimension,
          distance: 'Cosine',
        },
      });
      this.logger.log(`Created collection ${this.collectionName}`);
    }
  }

  async delete({ ids, filter, deleteAll }: DeleteParams): Promise<boolean> {
    if (deleteAll) {
      await this.qdrantClient.deleteCollection(this.collectionName);
      await this.ensureCollectionExists();
      return true;
    }

    const selector = toQdrantFilter(filter, ids);
    if (!selector) {
      return true;
    }

    await this.qdrantClient.delete(this.collectionName, { wait: true, filter: selector });
    return true;
  }

  protected async upsertChunks(chunks: DocumentChunk[]): Promise<void> {
    const points = chunks.map((chunk) => {
      const createdAt = toUnixSeconds(chunk.metadata.created_at);
      return {
        id: toPointId(chunk.id),
        vector: chunk.embedding ?? [],
        payload: {
          id: chunk.id,
          text: chunk.text,
          metadata: chunk.metadata,
          ...(createdAt !== undefined ? { created_at: createdAt } : {}),
        },
      };
    });

    await this.qdrantClient.upsert(this.collectionName, { wait: true, points });
  }

  protected async queryWithEmbeddings(queries: QueryWithEmbedding[]): Promise<QueryResult[]> {
    return Promise.all(
      queries.map(async (query) => {
        const hits = await this.qdrantClient.search(this.collectionName, {
          vector: query.embedding,
          limit: query.top_k,
          filter: toQdrantFilter(query.filter),
          with_payload: true,
        });

        const results: DocumentChunkWithScore[] = [];
        for (const hit of hits) {
          const payload = ChunkPayloadSchema.safeParse(hit.payload);
          if (!payload.success) {
            this.logger.warn(`Skipping point ${String(hit.id)} in ${this.collectionName}: malformed payload`);
            continue;
          }
          results.push({ ...payload.data, score: hit.score });
        }

        return { query: query.query, results };
      }),
    );
  }
}
