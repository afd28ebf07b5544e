import { INestApplication, ValidationPipe } from '@nestjs/common';

/**
 * Pipes and hooks shared by the server bootstrap and the e2e tests.
 */
export function configureApp(app: INestApplication): INestApplication {
  app.useGlobalPipes(
    new ValidationPipe({
      transform: true, // Auto-transform to DTO types
      whitelist: true, // Strip non-DTO properties
      forbidNonWhitelisted: false, // Don't throw on extra props
      transformOptions: {
        enableImplicitConversion: true, // "5" → 5
      },
    }),
  );

  // Lets the notifier drain in-flight messages on SIGTERM
  app.enableShutdownHooks();

  return app;
}
