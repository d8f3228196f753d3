import { Body, Controller, Get, Headers, HttpCode, HttpStatus, Inject, Logger, Post } from '@nestjs/common';
import { StoreAuthService } from '../auth/store-auth.service';
import { APP_CONFIG, AppConfig } from '../config/app.config';
import { normalizeError } from '../common/http-error';
import { StoreName } from '../common/store-name.decorator';
import { ZodValidationPipe } from '../common/zod-validation.pipe';
import { DatastoreService } from '../datastore/datastore.service';
import { QueryRequest, QueryRequestSchema, QueryResponse } from './retrieval.types';
import { buildSubOpenApiDocument, OpenApiDocument } from './sub-openapi';

/**
 * Query endpoint exposed on its own path for external tool integration,
 * with its schema at `/sub/openapi.json`.
 *
 * The token is checked against the store named in the request, but the
 * query always runs against the default store built at startup.
 */
@Controller('sub')
export class SubRetrievalController {
  private readonly logger = new Logger(SubRetrievalController.name);
  private readonly openApiDocument: OpenApiDocument;

  constructor(
    private readonly storeAuth: StoreAuthService,
    private readonly datastores: DatastoreService,
    @Inject(APP_CONFIG) config: AppConfig,
  ) {
    this.openApiDocument = buildSubOpenApiDocument(config.publicUrl);
  }

  @Get('openapi.json')
  openApi(): OpenApiDocument {
    return this.openApiDocument;
  }

  @Post('query')
  @HttpCode(HttpStatus.OK)
  async query(
    @Body(new ZodValidationPipe(QueryRequestSchema)) request: QueryRequest,
    @Headers('authorization') authorization: string | undefined,
    @StoreName() storeName: string | undefined,
  ): Promise<QueryResponse> {
    try {
      this.storeAuth.validateToken(storeName, authorization);
      const results = await this.datastores.defaultDatastore.query(request.queries);
      return { results };
    } catch (error) {
      throw normalizeError(error, this.logger);
    }
  }
}
