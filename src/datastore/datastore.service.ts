import { Inject, Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { APP_CONFIG, AppConfig } from '../config/app.config';
import { DataStore } from './datastore';

export const DATASTORE_BUILDER = Symbol('DATASTORE_BUILDER');

/** Builds a ready-to-use datastore for a store name. */
export type DatastoreBuilder = (storeName: string) => Promise<DataStore>;

/**
 * Resolves store names to datastore handles. Each handle is built once and
 * shared; the default store is built while the application starts.
 */
@Injectable()
export class DatastoreService implements OnModuleInit {
  private readonly logger = new Logger(DatastoreService.name);
  private readonly stores = new Map<string, Promise<DataStore>>();
  private defaultStore?: DataStore;

  constructor(
    @Inject(APP_CONFIG) private readonly config: AppConfig,
    @Inject(DATASTORE_BUILDER) private readonly build: DatastoreBuilder,
  ) {}

  async onModuleInit(): Promise<void> {
    this.defaultStore = await this.getDatastore();
    this.logger.log(`Default datastore ready: ${this.config.defaultIndex}`);
  }

  /** The handle created at startup for PINECONE_INDEX. */
  get defaultDatastore(): DataStore {
    if (!this.defaultStore) {
      throw new Error('The default datastore has not been initialized');
    }
    return this.defaultStore;
  }

  getDatastore(storeName?: string): Promise<DataStore> {
    const key = storeName?.trim() || this.config.defaultIndex;
    const existing = this.stores.get(key);
    if (existing) {
      return existing;
    }

    this.logger.log(`Building datastore for ${key}`);
    const pending = this.build(key).catch((error: unknown) => {
      this.stores.delete(key);
      throw error;
    });
    this.stores.set(key, pending);
    return pending;
  }
}
