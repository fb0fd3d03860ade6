import { Injectable, Logger, NotFoundException } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { requireNonEmpty, requirePositiveId } from '../common/validation';
import { DestinationsService } from '../destinations/destinations.service';
import { TRAVEL_EVENTS, type NoteCreatedEvent } from '../events/travel.events';
import { NotesRepository } from './notes.repository';
import type { Note } from './notes.types';

@Injectable()
export class NotesService {
  private readonly logger = new Logger(NotesService.name);

  constructor(
    private readonly repo: NotesRepository,
    private readonly destinations: DestinationsService,
    private readonly eventEmitter: EventEmitter2,
  ) {}

  async list(destinationId: number): Promise<Note[]> {
    await this.destinations.require(destinationId);

    const notes = await this.repo.findByDestination(destinationId);
    this.logger.log(
      `Retrieved ${notes.length} notes for destination ${destinationId}`,
    );
    return notes;
  }

  async create(destinationId: number, rawContent: string): Promise<Note> {
    requirePositiveId(destinationId);
    const content = requireNonEmpty(rawContent, 'Note content');
    await this.destinations.require(destinationId);

    // The repository re-checks ownership inside its transaction.
    const note = await this.repo.create(destinationId, content);
    if (!note) throw new NotFoundException('Destination not found');

    this.logger.log(
      `Created note for destination ${destinationId} (Note ID: ${note.id})`,
    );
    this.eventEmitter.emit(TRAVEL_EVENTS.NOTE_CREATED, {
      noteId: note.id,
      destinationId,
      content,
    } satisfies NoteCreatedEvent);

    return note;
  }
}
