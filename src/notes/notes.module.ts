import { Module } from '@nestjs/common';
import { DestinationsModule } from '../destinations/destinations.module';
import { NotesController } from './notes.controller';
import { DrizzleNotesRepository, NotesRepository } from './notes.repository';
import { NotesService } from './notes.service';

@Module({
  imports: [DestinationsModule],
  providers: [
    NotesService,
    { provide: NotesRepository, useClass: DrizzleNotesRepository },
  ],
  controllers: [NotesController],
  exports: [NotesService, NotesRepository],
})
export class NotesModule {}
