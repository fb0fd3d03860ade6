import 'reflect-metadata';
import { Logger, Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { validate } from '../config/env.validation';
import { DatabaseModule } from '../database/database.module';
import { DatabaseService } from '../database/database.service';

@Module({
  imports: [ConfigModule.forRoot({ isGlobal: true, validate }), DatabaseModule],
})
class SetupModule {}

async function setup(): Promise<void> {
  const logger = new Logger('DatabaseSetup');
  const app = await NestFactory.createApplicationContext(SetupModule);
  const database = app.get(DatabaseService);

  try {
    await database.ping();
    logger.log('Database connection successful');
    await database.ensureSchema();
    logger.log('Schema applied (destinations, knowledge_base)');
  } catch (error) {
    logger.error(`Database setup failed: ${(error as Error).message}`);
    process.exitCode = 1;
  } finally {
    await app.close();
  }
}
void setup();
