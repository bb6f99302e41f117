import type { NestExpressApplication } from '@nestjs/platform-express';

export const MAX_BODY_SIZE = '1mb';

/**
 * HTTP settings shared by the server entry point and the e2e tests.
 *
 * Every request body is kept as raw bytes; the webhook decodes and
 * validates JSON itself so a malformed body gets the webhook's own answer.
 */
export function configureHttpApp(app: NestExpressApplication): NestExpressApplication {
  // Match every request, including those without a Content-Type header
  app.useBodyParser('raw', { type: () => true, limit: MAX_BODY_SIZE });
  app.enableShutdownHooks();
  return app;
}
