import { Module } from '@nestjs/common';
import { QdrantClient } from '@qdrant/js-client-rest';
import { APP_CONFIG, AppConfig } from '../config/app.config';
import { EmbeddingService } from '../embeddings/embedding.service';
import { DATASTORE_BUILDER, DatastoreBuilder, DatastoreService } from './datastore.service';
import { QdrantDataStore } from './qdrant.datastore';

@Module({
  providers: [
    EmbeddingService,
    {
      provide: DATASTORE_BUILDER,
      inject: [APP_CONFIG, EmbeddingService],
      useFactory: (config: AppConfig, embeddings: EmbeddingService): DatastoreBuilder => {
        const qdrantClient = new QdrantClient({
          url: config.qdrant.url,
          apiKey: config.qdrant.apiKey,
        });
        return async (storeName) => {
          const store = new QdrantDataStore(qdrantClient, storeName, embeddings, {
            dimension: config.embedding.dimension,
            chunking: config.chunking,
          });
          await store.ensureCollectionExists();
          return store;
        };
      },
    },
    DatastoreService,
  ],
  exports: [DatastoreService],
})
export class DatastoreModule {}
