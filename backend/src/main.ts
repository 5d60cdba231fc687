import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { Logger, ValidationPipe } from '@nestjs/common';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';

async function bootstrap() {
  const app = await NestFactory.create(AppModule);
  const logger = new Logger('Bootstrap');

  // Close the database pool on SIGTERM/SIGINT
  app.enableShutdownHooks();

  // Enable CORS with allowlist
  const corsOrigins = (process.env.CORS_ORIGINS || '*')
    .split(',')
    .map((s) => s.trim())
    .filter(Boolean);
  app.enableCors({
    origin: corsOrigins.includes('*') ? true : corsOrigins,
  });

  // Set up global validation pipe
  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      transform: true,
      forbidNonWhitelisted: true,
    }),
  );

  // Set up global prefix
  app.setGlobalPrefix('api');

  // Swagger - only enable in non-production environments
  const isProduction = process.env.NODE_ENV === 'production';
  if (!isProduction) {
    const config = new DocumentBuilder()
      .setTitle('Phishing URL Analytics API')
      .setDescription(
        'APIs for registering URLs and recording phishing analysis results',
      )
      .setVersion('1.0.0')
      .build();
    const document = SwaggerModule.createDocument(app, config);
    SwaggerModule.setup('api/docs', app, document);
  }

  await app.listen(process.env.PORT ?? 3000);
  const appUrl = await app.getUrl();
  logger.log(`Application is running on: ${appUrl}`);
  if (!isProduction) {
    logger.log(`Swagger docs: ${appUrl}/api/docs`);
  }
}
void bootstrap();
