import { OpenAPIRegistry, OpenApiGeneratorV3 } from '@asteasolutions/zod-to-openapi';
import { z } from 'zod';
import { QueryRequestSchema, QueryResponseSchema } from './retrieval.types';

const ValidationErrorSchema = z.object({
  detail: z.array(
    z.object({
      loc: z.array(z.union([z.string(), z.number()])),
      msg: z.string(),
      type: z.string(),
    }),
  ),
});

export type OpenApiDocument = ReturnType<OpenApiGeneratorV3['generateDocument']>;

const ErrorSchema = z.object({ detail: z.string() });

export const SUB_QUERY_DESCRIPTION =
  "Accepts search query objects array each with query and optional filter. Break down complex questions into sub-questions. Refine results by criteria, e.g. time / source, don't do this often. Split queries if ResponseTooLargeError occurs.";

/**
 * OpenAPI document describing only `POST /sub/query`, the surface handed to
 * external tools. Built from the same zod schemas the endpoint validates with.
 */
export function buildSubOpenApiDocument(serverUrl?: string): OpenApiDocument {
  const registry = new OpenAPIRegistry();
  const bearer = registry.registerComponent('securitySchemes', 'HTTPBearer', {
    type: 'http',
    scheme: 'bearer',
  });

  registry.registerPath({
    method: 'post',
    path: '/sub/query',
    summary: 'Query',
    description: SUB_QUERY_DESCRIPTION,
    operationId: 'query_query_post',
    security: [{ [bearer.name]: [] }],
    request: {
      headers: z.object({ pinecone_name: z.string().optional() }),
      body: {
        required: true,
        content: { 'application/json': { schema: QueryRequestSchema } },
      },
    },
    responses: {
      200: {
        description: 'Successful Response',
        content: { 'application/json': { schema: QueryResponseSchema } },
      },
      400: {
        description: 'No credentials configured for the store',
        content: { 'application/json': { schema: ErrorSchema } },
      },
      401: {
        description: 'Invalid or missing token',
        content: { 'application/json': { schema: ErrorSchema } },
      },
      422: {
        description: 'Validation Error',
        content: { 'application/json': { schema: ValidationErrorSchema } },
      },
    },
  });

  const generator = new OpenApiGeneratorV3(registry.definitions);
  return generator.generateDocument({
    openapi: '3.0.2',
    info: {
      title: 'Retrieval Plugin API',
      description:
        'A retrieval API for querying and filtering documents based on natural language queries and metadata',
      version: '1.0.0',
    },
    servers: serverUrl ? [{ url: serverUrl }] : [],
  });
}
