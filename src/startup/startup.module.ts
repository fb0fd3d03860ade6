import { Module } from '@nestjs/common';
import { OllamaModule } from '../ollama/ollama.module';
import { StartupValidatorService } from './startup-validator.service';

@Module({
  imports: [OllamaModule],
  providers: [StartupValidatorService],
  exports: [StartupValidatorService],
})
export class StartupModule {}
