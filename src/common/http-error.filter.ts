import { ArgumentsHost, Catch, ExceptionFilter, HttpException, HttpStatus, Logger } from '@nestjs/common';
import type { Response } from 'express';
import { DEFAULT_ERROR_DETAIL, detailOf, statusOf } from './http-error';

/**
 * Writes every error as `{ "detail": ... }`. Errors that are not
 * HttpExceptions never went through a handler's normalizer, so they are
 * logged here.
 */
@Catch()
export class HttpErrorFilter implements ExceptionFilter {
  private readonly logger = new Logger(HttpErrorFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const response = host.switchToHttp().getResponse<Response>();
    const status = statusOf(exception) ?? HttpStatus.INTERNAL_SERVER_ERROR;
    const detail = detailOf(exception) ?? DEFAULT_ERROR_DETAIL;

    if (!(exception instanceof HttpException)) {
      const stack = exception instanceof Error ? exception.stack : undefined;
      this.logger.error(`Error: ${JSON.stringify(detail)} status_code: ${status}`, stack);
    }

    response.status(status).json({ detail });
  }
}
