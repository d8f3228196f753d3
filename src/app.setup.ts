import { NestExpressApplication } from '@nestjs/platform-express';
import { resolve } from 'node:path';
import { HttpErrorFilter } from './common/http-error.filter';
import { AppConfig } from './config/app.config';

/** Wiring shared by the server entry point and the end-to-end tests. */
export function configureApp(app: NestExpressApplication, config: AppConfig): NestExpressApplication {
  app.enableCors();
  app.useGlobalFilters(new HttpErrorFilter());
  app.useStaticAssets(resolve(process.cwd(), config.wellKnownDir), { prefix: '/.well-known' });
  return app;
}
