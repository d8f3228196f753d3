import { BadRequestException, Inject, Injectable, UnauthorizedException } from '@nestjs/common';
import { APP_CONFIG, AppConfig } from '../config/app.config';

/** Name of the environment variable holding a store's bearer secret. */
export function bearerEnvName(storeName: string): string {
  return `${storeName.toUpperCase()}_BEARER`;
}

/** Token from an `Authorization: Bearer <token>` header, or undefined. */
export function parseBearer(authorization: string | undefined): string | undefined {
  if (!authorization) {
    return undefined;
  }
  const [scheme, ...rest] = authorization.trim().split(/\s+/);
  if (scheme.toLowerCase() !== 'bearer' || rest.length !== 1) {
    return undefined;
  }
  return rest[0];
}

@Injectable()
export class StoreAuthService {
  constructor(@Inject(APP_CONFIG) private readonly config: AppConfig) {}

  /**
   * Checks the caller's bearer token against the secret registered for the
   * store. Without a store name the default store's `BEARER_TOKEN` applies.
   */
  validateToken(storeName: string | undefined, authorization: string | undefined): void {
    const expected = this.expectedToken(storeName);
    const token = parseBearer(authorization);
    if (token === undefined || token !== expected) {
      throw new UnauthorizedException('Invalid or missing token');
    }
  }

  private expectedToken(storeName: string | undefined): string {
    if (storeName === undefined) {
      return this.config.bearerToken;
    }
    const envName = bearerEnvName(storeName);
    const secret = process.env[envName];
    if (secret === undefined) {
      throw new BadRequestException(
        `The server has no credentials set up for the store ${storeName}. They must be stored in an environment variable named ${envName}`,
      );
    }
    return secret;
  }
}
