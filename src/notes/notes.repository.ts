import { Injectable } from '@nestjs/common';
import { asc, eq } from 'drizzle-orm';
import { DatabaseService } from '../database/database.service';
import { destinations, knowledgeBase } from '../database/schema';
import type { Note } from './notes.types';

export abstract class NotesRepository {
  abstract findByDestination(destinationId: number): Promise<Note[]>;
  /** Returns null when the destination does not exist. */
  abstract create(destinationId: number, content: string): Promise<Note | null>;
}

@Injectable()
export class DrizzleNotesRepository extends NotesRepository {
  constructor(private readonly database: DatabaseService) {
    super();
  }

  async findByDestination(destinationId: number): Promise<Note[]> {
    return this.database.db
      .select()
      .from(knowledgeBase)
      .where(eq(knowledgeBase.destinationId, destinationId))
      .orderBy(asc(knowledgeBase.id));
  }

  async create(destinationId: number, content: string): Promise<Note | null> {
    return this.database.db.transaction(async (tx) => {
      const [owner] = await tx
        .select({ id: destinations.id })
        .from(destinations)
        .where(eq(destinations.id, destinationId))
        .limit(1);
      if (!owner) return null;

      const [row] = await tx
        .insert(knowledgeBase)
        .values({ destinationId, content })
        .returning();
      return row;
    });
  }
}
