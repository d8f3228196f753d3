import { z } from 'zod';

export const APP_CONFIG = Symbol('APP_CONFIG');

const EnvSchema = z.object({
  BEARER_TOKEN: z.string().min(1),
  PINECONE_INDEX: z.string().min(1),
  PORT: z.coerce.number().int().positive().default(8000),
  QDRANT_URL: z.string().url().default('http://localhost:6333'),
  QDRANT_API_KEY: z.string().optional(),
  OPENAI_API_KEY: z.string().default(''),
  OPENAI_BASE_URL: z.string().url().optional(),
  EMBEDDING_MODEL: z.string().min(1).default('text-embedding-ada-002'),
  EMBEDDING_DIMENSION: z.coerce.number().int().positive().default(1536),
  EMBEDDINGS_BATCH_SIZE: z.coerce.number().int().positive().default(128),
  CHUNK_SIZE: z.coerce.number().int().positive().default(1000),
  CHUNK_OVERLAP: z.coerce.number().int().nonnegative().default(100),
  WELL_KNOWN_DIR: z.string().min(1).default('.well-known'),
  PUBLIC_URL: z.string().url().optional(),
});

export interface AppConfig {
  bearerToken: string;
  defaultIndex: string;
  port: number;
  qdrant: {
    url: string;
    apiKey?: string;
  };
  openai: {
    apiKey: string;
    baseURL?: string;
  };
  embedding: {
    model: string;
    dimension: number;
    batchSize: number;
  };
  chunking: {
    maxChars: number;
    overlapChars: number;
  };
  wellKnownDir: string;
  publicUrl?: string;
}

/**
 * Reads the service configuration from environment variables.
 * Throws when a required variable is missing or a value does not parse,
 * listing every offending variable.
 */
export function loadAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid environment configuration: ${problems}`);
  }

  const vars = parsed.data;
  return {
    bearerToken: vars.BEARER_TOKEN,
    defaultIndex: vars.PINECONE_INDEX,
    port: vars.PORT,
    qdrant: {
      url: vars.QDRANT_URL,
      apiKey: vars.QDRANT_API_KEY,
    },
    openai: {
      apiKey: vars.OPENAI_API_KEY,
      baseURL: vars.OPENAI_BASE_URL,
    },
    embedding: {
      model: vars.EMBEDDING_MODEL,
      dimension: vars.EMBEDDING_DIMENSION,
      batchSize: vars.EMBEDDINGS_BATCH_SIZE,
    },
    chunking: {
      maxChars: vars.CHUNK_SIZE,
      overlapChars: vars.CHUNK_OVERLAP,
    },
    wellKnownDir: vars.WELL_KNOWN_DIR,
    publicUrl: vars.PUBLIC_URL,
  };
}
