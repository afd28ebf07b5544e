import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger } from '@nestjs/common';
import { SwaggerModule, DocumentBuilder } from '@nestjs/swagger';
import { AppModule } from './app.module';
import { configureApp } from './app.setup';

async function bootstrap() {
  const app = await NestFactory.create(AppModule);

  app.enableCors({
    origin: (process.env.CORS_ORIGINS ?? 'http://localhost:4200').split(','),
    credentials: true,
    methods: ['GET', 'POST', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization'],
  });

  app.setGlobalPrefix(process.env.API_PREFIX ?? 'api/v1');
  configureApp(app);

  // OpenAPI/Swagger documentation
  const config = new DocumentBuilder()
    .setTitle('Deald Feedback API')
    .setDescription(
      'Per-ticket buyer/seller feedback with a single dispute round resolved by administrators.',
    )
    .setVersion('1.0')
    .addBearerAuth()
    .addTag('Feedback', 'Leave, view, dispute and delete feedback')
    .addTag('Admin - Feedback', 'Dispute queue and resolution')
    .addTag('Users', 'User cards with feedback summary')
    .addTag('Auth', 'Authentication')
    .build();

  const document = SwaggerModule.createDocument(app, config);
  SwaggerModule.setup('api', app, document);

  const port = process.env.PORT ?? 3000;
  await app.listen(port);
  Logger.log(`Listening on port ${port}`, 'Bootstrap');
}

bootstrap().catch((error: unknown) => {
  Logger.error(error instanceof Error ? error.stack : String(error), 'Bootstrap');
  process.exit(1);
});
