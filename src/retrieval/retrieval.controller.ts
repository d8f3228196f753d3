import {
  BadRequestException,
  Body,
  Controller,
  Delete,
  Headers,
  HttpCode,
  HttpException,
  HttpStatus,
  Logger,
  Post,
  UploadedFile,
  UseInterceptors,
} from '@nestjs/common';
import { FileInterceptor } from '@nestjs/platform-express';
import { StoreAuthService } from '../auth/store-auth.service';
import { normalizeError } from '../common/http-error';
import { StoreName } from '../common/store-name.decorator';
import { toValidationIssues, ZodValidationPipe } from '../common/zod-validation.pipe';
import { DatastoreService } from '../datastore/datastore.service';
import { FileService } from './file.service';
import {
  DeleteRequest,
  DeleteRequestSchema,
  DeleteResponse,
  DocumentMetadata,
  DocumentMetadataSchema,
  QueryRequest,
  QueryRequestSchema,
  QueryResponse,
  UpsertRequest,
  UpsertRequestSchema,
  UpsertResponse,
} from './retrieval.types';

function parseMetadataField(raw: string | undefined): DocumentMetadata | undefined {
  if (raw === undefined || raw.trim() === '') {
    return undefined;
  }
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch {
    throw new HttpException(
      { detail: [{ loc: ['body', 'metadata'], msg: 'metadata must be a JSON object', type: 'json_invalid' }] },
      HttpStatus.UNPROCESSABLE_ENTITY,
    );
  }
  const parsed = DocumentMetadataSchema.safeParse(value);
  if (!parsed.success) {
    throw new HttpException(
      { detail: toValidationIssues(parsed.error.issues, ['body', 'metadata']) },
      HttpStatus.UNPROCESSABLE_ENTITY,
    );
  }
  return parsed.data;
}

@Controller()
export class RetrievalController {
  private readonly logger = new Logger(RetrievalController.name);

  constructor(
    private readonly storeAuth: StoreAuthService,
    private readonly datastores: DatastoreService,
    private readonly files: FileService,
  ) {}

  @Post('upsert-file')
  @HttpCode(HttpStatus.OK)
  @UseInterceptors(FileInterceptor('file'))
  async upsertFile(
    @UploadedFile() file: Express.Multer.File | undefined,
    @Body('metadata') metadata: string | undefined,
    @Headers('authorization') authorization: string | undefined,
    @StoreName() storeName: string | undefined,
  ): Promise<UpsertResponse> {
    if (!file) {
      throw new HttpException(
        { detail: [{ loc: ['body', 'file'], msg: 'Field required', type: 'missing' }] },
        HttpStatus.UNPROCESSABLE_ENTITY,
      );
    }
    const extraMetadata = parseMetadataField(metadata);

    try {
      this.storeAuth.validateToken(storeName, authorization);
      const document = await this.files.getDocumentFromFile(file, extraMetadata);
      const datastore = await this.datastores.getDatastore(storeName);
      const ids = await datastore.upsert([document]);
      return { ids };
    } catch (error) {
      throw normalizeError(error, this.logger);
    }
  }

  @Post('upsert')
  @HttpCode(HttpStatus.OK)
  async upsert(
    @Body(new ZodValidationPipe(UpsertRequestSchema)) request: UpsertRequest,
    @Headers('authorization') authorization: string | undefined,
    @StoreName() storeName: string | undefined,
  ): Promise<UpsertResponse> {
    try {
      this.storeAuth.validateToken(storeName, authorization);
      const datastore = await this.datastores.getDatastore(storeName);
      const ids = await datastore.upsert(request.documents);
      return { ids };
    } catch (error) {
      throw normalizeError(error, this.logger);
    }
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
      const datastore = await this.datastores.getDatastore(storeName);
      const results = await datastore.query(request.queries);
      return { results };
    } catch (error) {
      throw normalizeError(error, this.logger);
    }
  }

  @Delete('delete')
  async delete(
    @Body(new ZodValidationPipe(DeleteRequestSchema)) request: DeleteRequest,
    @Headers('authorization') authorization: string | undefined,
    @StoreName() storeName: string | undefined,
  ): Promise<DeleteResponse> {
    const hasIds = request.ids !== undefined && request.ids.length > 0;
    if (!(hasIds || request.filter || request.delete_all)) {
      throw new BadRequestException('One of ids, filter, or delete_all is required');
    }

    try {
      this.storeAuth.validateToken(storeName, authorization);
      const datastore = await this.datastores.getDatastore(storeName);
      const success = await datastore.delete({
        ids: request.ids,
        filter: request.filter,
        deleteAll: request.delete_all,
      });
      return { success };
    } catch (error) {
      throw normalizeError(error, this.logger);
    }
  }
}
