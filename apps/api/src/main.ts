import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import { Logger } from '@nestjs/common';
import { AppModule } from './app.module';
import { configureApp } from './configure-app';

async function bootstrap(): Promise<void> {
  const logger = new Logger('Bootstrap');
  const app = await NestFactory.create(AppModule, {
    logger: ['log', 'error', 'warn', 'debug'],
  });

  const configService = app.get(ConfigService);
  configureApp(app);

  // ── CORS ──────────────────────────────────────────────
  const corsOrigin = configService.get<string>('API_CORS_ORIGIN', 'http://localhost:3000');
  app.enableCors({
    origin: corsOrigin.split(',').map((origin) => origin.trim()),
    credentials: true,
  });

  // Lets JobRunner drain in-flight jobs on SIGTERM
  app.enableShutdownHooks();

  // ── Start ─────────────────────────────────────────────
  const port = Number(configService.get<number | string>('API_PORT', 4000));
  await app.listen(port);

  logger.log(`API running on http://localhost:${port}`);
}

bootstrap().catch((error: unknown) => {
  const message = error instanceof Error ? (error.stack ?? error.message) : String(error);
  new Logger('Bootstrap').error(`Failed to start: ${message}`);
  process.exit(1);
});
