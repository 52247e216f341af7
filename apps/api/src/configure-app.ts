import { INestApplication, ValidationPipe } from '@nestjs/common';

/**
 * Global pipes shared by main.ts and the e2e tests, so both validate
 * request bodies the same way.
 */
export function configureApp(app: INestApplication): void {
  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
    }),
  );
}
