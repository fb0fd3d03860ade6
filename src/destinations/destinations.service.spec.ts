import { BadRequestException, NotFoundException } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { Test } from '@nestjs/testing';
import { TRAVEL_EVENTS } from '../events/travel.events';
import {
  InMemoryDestinationsRepository,
  InMemoryTravelStore,
} from '../../test/support/in-memory.repositories';
import { DestinationsRepository } from './destinations.repository';
import { DestinationsService } from './destinations.service';

describe('DestinationsService', () => {
  let store: InMemoryTravelStore;
  let service: DestinationsService;
  let emitter: EventEmitter2;

  beforeEach(async () => {
    store = new InMemoryTravelStore();
    emitter = new EventEmitter2();
    const moduleRef = await Test.createTestingModule({
      providers: [
        DestinationsService,
        { provide: DestinationsRepository, useValue: new InMemoryDestinationsRepository(store) },
        { provide: EventEmitter2, useValue: emitter },
      ],
    }).compile();
    service = moduleRef.get(DestinationsService);
  });

  it('stores the trimmed name and announces the new destination', async () => {
    const emit = jest.spyOn(emitter, 'emit');

    const created = await service.create('  Kyoto  ');

    expect(created.name).toBe('Kyoto');
    expect(store.destinations.map((d) => d.name)).toEqual(['Kyoto']);
    expect(emit).toHaveBeenCalledWith(TRAVEL_EVENTS.DESTINATION_CREATED, {
      destinationId: created.id,
      name: 'Kyoto',
    });
  });

  it('rejects blank names', async () => {
    await expect(service.create('   ')).rejects.toThrow(
      new BadRequestException('Destination name cannot be empty'),
    );
  });

  it('measures the name length after trimming', async () => {
    const longest = 'a'.repeat(255);

    const created = await service.create(`   ${longest}   `);
    expect(created.name).toBe(longest);

    await expect(service.create('b'.repeat(256))).rejects.toThrow(
      new BadRequestException('Destination name must be at most 255 characters'),
    );
  });

  it('rejects a name that already exists after trimming', async () => {
    await service.create('Lisbon');
    await expect(service.create(' Lisbon ')).rejects.toThrow('Destination already exists');
    expect(store.destinations).toHaveLength(1);
  });

  it('lists destinations by id', async () => {
    await service.create('Oslo');
    await service.create('Athens');

    const names = (await service.list()).map((d) => d.name);
    expect(names).toEqual(['Oslo', 'Athens']);
  });

  it('deletes a destination with its notes and reports how many went', async () => {
    const rome = await service.create('Rome');
    store.addNote(rome.id, 'Colosseum tickets sell out early');
    store.addNote(rome.id, 'Trastevere for dinner');
    const emit = jest.spyOn(emitter, 'emit');

    const result = await service.remove(rome.id);

    expect(result).toEqual({
      message: 'Destination deleted successfully (removed 2 associated notes)',
      removedNotes: 2,
    });
    expect(store.notes).toHaveLength(0);
    expect(emit).toHaveBeenCalledWith(TRAVEL_EVENTS.DESTINATION_DELETED, {
      destinationId: rome.id,
      name: 'Rome',
      removedNoteIds: [1, 2],
    });
  });

  it('fails with 404 when deleting an unknown destination', async () => {
    await expect(service.remove(42)).rejects.toBeInstanceOf(NotFoundException);
  });

  it('rejects non-positive ids', async () => {
    await expect(service.remove(0)).rejects.toThrow('Invalid destination ID');
    await expect(service.require(-3)).rejects.toThrow('Invalid destination ID');
  });
});
