import { Module } from '@nestjs/common';
import { OllamaModule } from '../ollama/ollama.module';
import { VectorstoreModule } from '../vectorstore/vectorstore.module';
import { NoteIndexService } from './note-index.service';

@Module({
  imports: [OllamaModule, VectorstoreModule],
  providers: [NoteIndexService],
  exports: [NoteIndexService],
})
export class KnowledgeModule {}
