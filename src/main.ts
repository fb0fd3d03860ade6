import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import { AppModule } from './app.module';
import { configureApp } from './app.setup';
import { AppLogger } from './common/app.logger';
import { readFlag } from './config/env.validation';
import { DatabaseService } from './database/database.service';
import { StartupValidatorService } from './startup/startup-validator.service';

async function bootstrap() {
  const app = await NestFactory.create(AppModule, { bufferLogs: true });
  const config = app.get(ConfigService);

  const logger = new AppLogger({
    level: config.get<string>('LOG_LEVEL'),
    logDir: config.get<string>('LOG_DIR') ?? 'logs',
  });
  app.useLogger(logger);
  const log = new Logger('Bootstrap');

  if (!readFlag(config.get('SKIP_STARTUP_VALIDATION'), false)) {
    const report = await app.get(StartupValidatorService).run();
    if (!report.ok) {
      log.error('Application startup validation failed. Exiting...');
      await app.close();
      logger.close();
      process.exit(1);
    }
  }

  await app.get(DatabaseService).ensureSchema();
  configureApp(app);

  const swaggerConfig = new DocumentBuilder()
    .setTitle('AI Travel Advisor API')
    .setDescription('Destinations, travel notes and AI-powered travel Q&A')
    .setVersion('1.0')
    .build();
  SwaggerModule.setup(
    'docs',
    app,
    SwaggerModule.createDocument(app, swaggerConfig),
  );

  const port = Number(config.get('PORT') ?? 8000);
  await app.listen(port);
  log.log(`Travel Advisor API listening on port ${port}`);
}
void bootstrap();
