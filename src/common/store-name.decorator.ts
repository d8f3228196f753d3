import { createParamDecorator, ExecutionContext } from '@nestjs/common';
import type { Request } from 'express';

export const STORE_NAME_HEADERS = ['pinecone_name', 'pinecone-name'] as const;

/** Store name selected by the caller, or undefined for the default store. */
export const StoreName = createParamDecorator((_data: unknown, ctx: ExecutionContext): string | undefined => {
  const request = ctx.switchToHttp().getRequest<Request>();
  for (const header of STORE_NAME_HEADERS) {
    const raw = request.headers[header];
    const value = Array.isArray(raw) ? raw[0] : raw;
    if (value !== undefined && value.trim() !== '') {
      return value.trim();
    }
  }
  return undefined;
});
