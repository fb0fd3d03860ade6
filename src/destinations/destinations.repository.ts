import { Injectable } from '@nestjs/common';
import { asc, eq } from 'drizzle-orm';
import { DatabaseService } from '../database/database.service';
import { destinations, knowledgeBase } from '../database/schema';
import type { Destination } from './destinations.types';

export interface RemovedDestination {
  destination: Destination;
  removedNoteIds: number[];
}

/** Storage seam for destinations; swapped for an in-memory one in tests. */
export abstract class DestinationsRepository {
  abstract findAll(): Promise<Destination[]>;
  abstract findById(id: number): Promise<Destination | null>;
  abstract findByName(name: string): Promise<Destination | null>;
  abstract create(name: string): Promise<Destination>;
  /** Deletes the destination and (by cascade) its notes, in one transaction. */
  abstract remove(id: number): Promise<RemovedDestination | null>;
}

@Injectable()
export class DrizzleDestinationsRepository extends DestinationsRepository {
  constructor(private readonly database: DatabaseService) {
    super();
  }

  async findAll(): Promise<Destination[]> {
    return this.database.db
      .select()
      .from(destinations)
      .orderBy(asc(destinations.id));
  }

  async findById(id: number): Promise<Destination | null> {
    const [row] = await this.database.db
      .select()
      .from(destinations)
      .where(eq(destinations.id, id))
      .limit(1);
    return row ?? null;
  }

  async findByName(name: string): Promise<Destination | null> {
    const [row] = await this.database.db
      .select()
      .from(destinations)
      .where(eq(destinations.name, name))
      .limit(1);
    return row ?? null;
  }

  async create(name: string): Promise<Destination> {
    return this.database.db.transaction(async (tx) => {
      const [row] = await tx.insert(destinations).values({ name }).returning();
      return row;
    });
  }

  async remove(id: number): Promise<RemovedDestination | null> {
    return this.database.db.transaction(async (tx) => {
      const notes = await tx
        .select({ id: knowledgeBase.id })
        .from(knowledgeBase)
        .where(eq(knowledgeBase.destinationId, id));

      const [deleted] = await tx
        .delete(destinations)
        .where(eq(destinations.id, id))
        .returning();
      if (!deleted) return null;

      return { destination: deleted, removedNoteIds: notes.map((n) => n.id) };
    });
  }
}
