import { Inject, Injectable } from '@nestjs/common';
import { OpenAI } from 'openai';
import { APP_CONFIG, AppConfig } from '../config/app.config';
import { batched } from '../datastore/chunks';
import { EmbeddingProvider } from './embedding.types';

@Injectable()
export class EmbeddingService implements EmbeddingProvider {
  private readonly openaiClient: OpenAI;

  constructor(@Inject(APP_CONFIG) private readonly config: AppConfig) {
    this.openaiClient = new OpenAI({
      apiKey: config.openai.apiKey,
      baseURL: config.openai.baseURL,
    });
  }

  async embed(texts: string[]): Promise<number[][]> {
    const { model, dimension, batchSize } = this.config.embedding;
    const embeddings: number[][] = [];

    for (const batch of batched(texts, batchSize)) {
      const response = await this.openaiClient.embeddings.create({
        model,
        input: batch,
        // Only the text-embedding-3 family accepts a target dimension.
        ...(model.startsWith('text-embedding-3') ? { dimensions: dimension } : {}),
      });
      const ordered = [...response.data].sort((a, b) => a.index - b.index);
      embeddings.push(...ordered.map((item) => item.embedding));
    }

    return embeddings;
  }
}
