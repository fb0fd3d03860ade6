import { ConflictException, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { QdrantClient } from '@qdrant/js-client-rest';
import {
  isNoteChunkPayload,
  type NoteChunkHit,
  type NoteChunkPoint,
} from './vectorstore.types';

@Injectable()
export class VectorstoreService {
  private readonly logger = new Logger(VectorstoreService.name);
  private readonly client: QdrantClient;
  private readonly collection: string;
  private readyDimension: number | null = null;

  constructor(private readonly config: ConfigService) {
    const url = this.config.get<string>('QDRANT_URL') ?? 'http://localhost:6333';
    this.collection =
      this.config.get<string>('QDRANT_COLLECTION') ?? 'travel_notes';
    this.client = new QdrantClient({ url });
  }

  async ensureCollection(vectorSize: number): Promise<void> {
    if (this.readyDimension === vectorSize) return;

    const collections = await this.client.getCollections();
    const exists = collections.collections?.some(
      (c) => c.name === this.collection,
    );

    if (exists) {
      const info = await this.client.getCollection(this.collection);
      const vectors = info.config?.params?.vectors;
      const existingDim =
        vectors && 'size' in vectors && typeof vectors.size === 'number'
          ? vectors.size
          : undefined;

      if (existingDim !== undefined && existingDim !== vectorSize) {
        throw new ConflictException(
          `Dimension mismatch on collection "${this.collection}": ` +
            `existing=${existingDim}, embedding model=${vectorSize}. ` +
            `Drop the collection to recreate it.`,
        );
      }
    } else {
      await this.client.createCollection(this.collection, {
        vectors: { size: vectorSize, distance: 'Cosine' },
      });
      await this.client.createPayloadIndex(this.collection, {
        field_name: 'destinationId',
        field_schema: 'integer',
      });
      this.logger.log(
        `Collection "${this.collection}" created (dim=${vectorSize})`,
      );
    }
    this.readyDimension = vectorSize;
  }

  async upsert(points: NoteChunkPoint[]): Promise<void> {
    await this.client.upsert(this.collection, {
      wait: true,
      points: points.map((p) => ({
        id: p.id,
        vector: p.vector,
        payload: p.payload,
      })),
    });
  }

  async search(
    queryVector: number[],
    destinationId: number,
    limit: number,
  ): Promise<NoteChunkHit[]> {
    const hits = await this.client.search(this.collection, {
      vector: queryVector,
      limit,
      filter: { must: [{ key: 'destinationId', match: { value: destinationId } }] },
      with_payload: true,
      with_vector: false,
    });

    return hits.flatMap((h) =>
      isNoteChunkPayload(h.payload) ? [{ score: h.score, payload: h.payload }] : [],
    );
  }

  async deleteByDestination(destinationId: number): Promise<void> {
    await this.client.delete(this.collection, {
      wait: true,
      filter: {
        must: [{ key: 'destinationId', match: { value: destinationId } }],
      },
    });
  }
}
