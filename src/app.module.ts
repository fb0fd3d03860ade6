import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { EventEmitterModule } from '@nestjs/event-emitter';
import { AdvisorModule } from './advisor/advisor.module';
import { validate } from './config/env.validation';
import { DatabaseModule } from './database/database.module';
import { DestinationsModule } from './destinations/destinations.module';
import { EventsModule } from './events/events.module';
import { HealthModule } from './health/health.module';
import { KnowledgeModule } from './knowledge/knowledge.module';
import { NotesModule } from './notes/notes.module';
import { RateLimitModule } from './rate-limit/rate-limit.module';
import { StartupModule } from './startup/startup.module';
import { WeatherModule } from './weather/weather.module';
import { WebModule } from './web/web.module';

@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true, validate }),
    EventEmitterModule.forRoot({ wildcard: true }),
    DatabaseModule,
    RateLimitModule,
    HealthModule,
    DestinationsModule,
    NotesModule,
    KnowledgeModule,
    WeatherModule,
    AdvisorModule,
    EventsModule,
    StartupModule,
    WebModule,
  ],
})
export class AppModule {}
