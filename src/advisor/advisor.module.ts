import { Module } from '@nestjs/common';
import { DestinationsModule } from '../destinations/destinations.module';
import { KnowledgeModule } from '../knowledge/knowledge.module';
import { NotesModule } from '../notes/notes.module';
import { OllamaModule } from '../ollama/ollama.module';
import { WeatherModule } from '../weather/weather.module';
import { AdvisorAgent } from './advisor.agent';
import { AdvisorController } from './advisor.controller';
import { AdvisorService } from './advisor.service';

@Module({
  imports: [
    DestinationsModule,
    NotesModule,
    KnowledgeModule,
    OllamaModule,
    WeatherModule,
  ],
  providers: [AdvisorService, AdvisorAgent],
  controllers: [AdvisorController],
  exports: [AdvisorService],
})
export class AdvisorModule {}
