import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { OnEvent } from '@nestjs/event-emitter';
import { RecursiveCharacterTextSplitter } from '@langchain/textsplitters';
import { v5 as uuidv5 } from 'uuid';
import {
  TRAVEL_EVENTS,
  type DestinationDeletedEvent,
  type NoteCreatedEvent,
} from '../events/travel.events';
import { OllamaService } from '../ollama/ollama.service';
import { VectorstoreService } from '../vectorstore/vectorstore.service';
import type { NoteChunkPoint } from '../vectorstore/vectorstore.types';

export interface IndexableNote {
  id: number;
  destinationId: number;
  content: string;
}

// Namespace for deterministic point ids: re-indexing a note overwrites its chunks.
const POINT_NAMESPACE = '0f5d1c1e-5b7a-4f47-9a3c-2d8e6b1f4a90';
const EMBED_BATCH_SIZE = 64;

/**
 * Per-destination similarity index over note chunks, kept in step with the
 * notes table through events and reconciled before each retrieval.
 */
@Injectable()
export class NoteIndexService {
  private readonly logger = new Logger(NoteIndexService.name);
  private readonly indexed = new Map<number, Set<number>>();
  private readonly splitter: RecursiveCharacterTextSplitter;

  constructor(
    private readonly config: ConfigService,
    private readonly ollama: OllamaService,
    private readonly vs: VectorstoreService,
  ) {
    this.splitter = new RecursiveCharacterTextSplitter({
      chunkSize: Number(this.config.get('CHUNK_SIZE') ?? 1000),
      chunkOverlap: Number(this.config.get('CHUNK_OVERLAP') ?? 200),
    });
  }

  indexedNoteIds(destinationId: number): number[] {
    return [...(this.indexed.get(destinationId) ?? [])].sort((a, b) => a - b);
  }

  async indexNote(note: IndexableNote): Promise<number> {
    const chunks = await this.splitter.splitText(note.content);
    if (chunks.length === 0) return 0;

    for (let i = 0; i < chunks.length; i += EMBED_BATCH_SIZE) {
      const batch = chunks.slice(i, i + EMBED_BATCH_SIZE);
      const vectors = await this.ollama.embed(batch);
      await this.vs.ensureCollection(vectors[0].length);

      const points: NoteChunkPoint[] = batch.map((text, j) => ({
        id: uuidv5(`${note.id}:${i + j}`, POINT_NAMESPACE),
        vector: vectors[j],
        payload: {
          destinationId: note.destinationId,
          noteId: note.id,
          chunkIndex: i + j,
          text,
        },
      }));
      await this.vs.upsert(points);
    }

    this.known(note.destinationId).add(note.id);
    this.logger.log(
      `Indexed note ${note.id} for destination ${note.destinationId} (${chunks.length} chunks)`,
    );
    return chunks.length;
  }

  /**
   * Embeds the notes of one destination the index has not seen yet. Notes
   * only disappear with their destination, which `dropDestination` handles,
   * so nothing is removed here: a note indexed by an event while this runs
   * stays indexed.
   */
  async sync(destinationId: number, notes: IndexableNote[]): Promise<void> {
    const known = this.known(destinationId);
    for (const note of notes) {
      if (!known.has(note.id)) await this.indexNote(note);
    }
  }

  async retrieve(
    destinationId: number,
    question: string,
    topK: number,
  ): Promise<string[]> {
    if (this.known(destinationId).size === 0) return [];

    try {
      const [queryVector] = await this.ollama.embed([question]);
      const hits = await this.vs.search(queryVector, destinationId, topK);
      return hits.map((h) => h.payload.text);
    } catch (error) {
      this.logger.error(
        `Error retrieving context for destination ${destinationId}`,
        error,
      );
      return [];
    }
  }

  async dropDestination(destinationId: number): Promise<void> {
    this.indexed.delete(destinationId);
    await this.vs.deleteByDestination(destinationId);
  }

  @OnEvent(TRAVEL_EVENTS.NOTE_CREATED)
  async onNoteCreated(event: NoteCreatedEvent): Promise<void> {
    try {
      await this.indexNote({
        id: event.noteId,
        destinationId: event.destinationId,
        content: event.content,
      });
    } catch (error) {
      // Picked up again by sync() on the next question.
      this.logger.warn(
        `Deferred indexing of note ${event.noteId}: ${(error as Error).message}`,
      );
    }
  }

  @OnEvent(TRAVEL_EVENTS.DESTINATION_DELETED)
  async onDestinationDeleted(event: DestinationDeletedEvent): Promise<void> {
    try {
      await this.dropDestination(event.destinationId);
    } catch (error) {
      this.logger.warn(
        `Could not drop index for destination ${event.destinationId}: ${(error as Error).message}`,
      );
    }
  }

  private known(destinationId: number): Set<number> {
    let set = this.indexed.get(destinationId);
    if (!set) {
      set = new Set();
      this.indexed.set(destinationId, set);
    }
    return set;
  }
}
