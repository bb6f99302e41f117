import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import type { NestExpressApplication } from '@nestjs/platform-express';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import { AppModule } from './app.module';
import { configureHttpApp } from './app.setup';
import { EnvironmentVariables, resolveLogLevels } from './config';

async function bootstrap(): Promise<void> {
  const app = configureHttpApp(
    await NestFactory.create<NestExpressApplication>(AppModule, {
      bodyParser: false,
      bufferLogs: true,
    }),
  );

  const config = app.get<ConfigService<EnvironmentVariables, true>>(ConfigService);
  app.useLogger(resolveLogLevels(config.get('LOG_LEVEL', { infer: true })));

  // Swagger configuration
  const document = SwaggerModule.createDocument(
    app,
    new DocumentBuilder()
      .setTitle('Merchant Desk Bot')
      .setDescription(
        'Webhook receiver of the merchant desk bot. Deposit notifications pushed by the payments API are relayed to the enrolled Telegram chats.',
      )
      .setVersion('0.1.0')
      .addTag('Webhook', 'Notifications pushed by the payments API')
      .addTag('Health', 'Liveness')
      .build(),
  );
  SwaggerModule.setup('api', app, document);

  const host = config.get('WEB_SERVER_HOST', { infer: true });
  const port = config.get('WEB_SERVER_PORT', { infer: true });

  await app.listen(port, host);

  const logger = new Logger('Bootstrap');
  logger.log(`Webhook server listening on http://${host}:${port}/webhook`);
  logger.log(`OpenAPI documentation available at http://${host}:${port}/api`);
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').fatal(
    `Startup failed: ${error instanceof Error ? error.message : String(error)}`,
  );
  process.exitCode = 1;
});
