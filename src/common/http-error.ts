import { HttpException, HttpStatus, Logger } from '@nestjs/common';

export const DEFAULT_ERROR_DETAIL = 'Internal Service Error';

export type ErrorDetail = string | Record<string, unknown>[];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function isDetail(value: unknown): value is ErrorDetail {
  return typeof value === 'string' || (Array.isArray(value) && value.every(isRecord));
}

/** Status carried by the error itself, if any. */
export function statusOf(error: unknown): number | undefined {
  if (error instanceof HttpException) {
    return error.getStatus();
  }
  if (!isRecord(error)) {
    return undefined;
  }
  for (const key of ['status_code', 'statusCode', 'status']) {
    const value = error[key];
    if (typeof value === 'number' && Number.isInteger(value) && value >= 400 && value < 600) {
      return value;
    }
  }
  return undefined;
}

/** Detail carried by the error itself, if any. */
export function detailOf(error: unknown): ErrorDetail | undefined {
  if (error instanceof HttpException) {
    const body = error.getResponse();
    if (isDetail(body)) {
      return body;
    }
    if (isRecord(body)) {
      if (isDetail(body.detail)) {
        return body.detail;
      }
      if (typeof body.message === 'string') {
        return body.message;
      }
    }
    return error.message;
  }
  if (isRecord(error) && isDetail(error.detail)) {
    return error.detail;
  }
  return undefined;
}

/**
 * Turns anything a handler raised into an HttpException carrying
 * `{ detail }`, logging the pair first. Callers rethrow the result.
 */
export function normalizeError(error: unknown, logger: Logger): HttpException {
  const status = statusOf(error) ?? HttpStatus.INTERNAL_SERVER_ERROR;
  const detail = detailOf(error) ?? DEFAULT_ERROR_DETAIL;
  const printable = typeof detail === 'string' ? detail : JSON.stringify(detail);
  logger.error(`Error: ${printable} status_code: ${status}`);
  return new HttpException({ detail }, status);
}
