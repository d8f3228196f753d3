import { z } from 'zod';

export const SourceSchema = z.enum(['email', 'file', 'chat']);

export const DocumentMetadataSchema = z.object({
  source: SourceSchema.optional(),
  source_id: z.string().optional(),
  url: z.string().optional(),
  created_at: z.string().optional(),
  author: z.string().optional(),
});

export const DocumentSchema = z.object({
  id: z.string().optional(),
  text: z.string(),
  metadata: DocumentMetadataSchema.optional(),
});

export const DocumentChunkMetadataSchema = DocumentMetadataSchema.extend({
  document_id: z.string().optional(),
});

const DateStringSchema = z.string().refine((value) => !Number.isNaN(Date.parse(value)), {
  message: 'Invalid date',
});

export const DocumentMetadataFilterSchema = z.object({
  document_id: z.string().optional(),
  source: SourceSchema.optional(),
  source_id: z.string().optional(),
  author: z.string().optional(),
  start_date: DateStringSchema.optional(),
  end_date: DateStringSchema.optional(),
});

export const QuerySchema = z.object({
  query: z.string(),
  filter: DocumentMetadataFilterSchema.optional(),
  top_k: z.number().int().positive().default(3),
});

export const UpsertRequestSchema = z.object({
  documents: z.array(DocumentSchema),
});

export const QueryRequestSchema = z.object({
  queries: z.array(QuerySchema),
});

export const DocumentChunkWithScoreSchema = z.object({
  id: z.string(),
  text: z.string(),
  metadata: DocumentChunkMetadataSchema,
  score: z.number(),
});

export const QueryResultSchema = z.object({
  query: z.string(),
  results: z.array(DocumentChunkWithScoreSchema),
});

export const QueryResponseSchema = z.object({
  results: z.array(QueryResultSchema),
});

export const DeleteRequestSchema = z.object({
  ids: z.array(z.string()).optional(),
  filter: DocumentMetadataFilterSchema.optional(),
  delete_all: z.boolean().optional().default(false),
});

export type DocumentMetadata = z.infer<typeof DocumentMetadataSchema>;
export type Document = z.infer<typeof DocumentSchema>;
export type DocumentChunkMetadata = z.infer<typeof DocumentChunkMetadataSchema>;
export type DocumentMetadataFilter = z.infer<typeof DocumentMetadataFilterSchema>;
export type Query = z.infer<typeof QuerySchema>;

export interface DocumentChunk {
  id: string;
  text: string;
  metadata: DocumentChunkMetadata;
  embedding?: number[];
}

export type DocumentChunkWithScore = z.infer<typeof DocumentChunkWithScoreSchema>;

export interface QueryWithEmbedding extends Query {
  embedding: number[];
}

export type QueryResult = z.infer<typeof QueryResultSchema>;

export type UpsertRequest = z.infer<typeof UpsertRequestSchema>;

export interface UpsertResponse {
  ids: string[];
}

export type QueryRequest = z.infer<typeof QueryRequestSchema>;

export type QueryResponse = z.infer<typeof QueryResponseSchema>;

export type DeleteRequest = z.infer<typeof DeleteRequestSchema>;

export interface DeleteResponse {
  success: boolean;
}
