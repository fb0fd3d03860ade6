import {
  BadRequestException,
  Injectable,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { requireNonEmpty, requirePositiveId } from '../common/validation';
import {
  TRAVEL_EVENTS,
  type DestinationCreatedEvent,
  type DestinationDeletedEvent,
} from '../events/travel.events';
import { DestinationsRepository } from './destinations.repository';
import {
  MAX_DESTINATION_NAME_LENGTH,
  type Destination,
  type DestinationDeletion,
} from './destinations.types';

@Injectable()
export class DestinationsService {
  private readonly logger = new Logger(DestinationsService.name);

  constructor(
    private readonly repo: DestinationsRepository,
    private readonly eventEmitter: EventEmitter2,
  ) {}

  async list(): Promise<Destination[]> {
    const all = await this.repo.findAll();
    this.logger.log(`Retrieved ${all.length} destinations`);
    return all;
  }

  async create(rawName: string): Promise<Destination> {
    const name = requireNonEmpty(rawName, 'Destination name');
    if (name.length > MAX_DESTINATION_NAME_LENGTH) {
      throw new BadRequestException(
        `Destination name must be at most ${MAX_DESTINATION_NAME_LENGTH} characters`,
      );
    }

    if (await this.repo.findByName(name)) {
      throw new BadRequestException('Destination already exists');
    }

    const destination = await this.repo.create(name);
    this.logger.log(
      `Created destination: ${destination.name} (ID: ${destination.id})`,
    );

    this.eventEmitter.emit(TRAVEL_EVENTS.DESTINATION_CREATED, {
      destinationId: destination.id,
      name: destination.name,
    } satisfies DestinationCreatedEvent);

    return destination;
  }

  async remove(id: number): Promise<DestinationDeletion> {
    requirePositiveId(id);

    const removed = await this.repo.remove(id);
    if (!removed) throw new NotFoundException('Destination not found');

    const count = removed.removedNoteIds.length;
    this.logger.log(
      `Deleted destination: ${removed.destination.name} (ID: ${id}) with ${count} associated notes`,
    );

    this.eventEmitter.emit(TRAVEL_EVENTS.DESTINATION_DELETED, {
      destinationId: id,
      name: removed.destination.name,
      removedNoteIds: removed.removedNoteIds,
    } satisfies DestinationDeletedEvent);

    return {
      message: `Destination deleted successfully (removed ${count} associated notes)`,
      removedNotes: count,
    };
  }

  /** Resolves a destination or fails with 404. */
  async require(id: number): Promise<Destination> {
    requirePositiveId(id);
    const destination = await this.repo.findById(id);
    if (!destination) throw new NotFoundException('Destination not found');
    return destination;
  }
}
