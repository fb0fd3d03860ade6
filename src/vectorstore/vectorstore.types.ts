export type NoteChunkPayload = {
  destinationId: number;
  noteId: number;
  chunkIndex: number;
  text: string;
};

export interface NoteChunkPoint {
  id: string;
  vector: number[];
  payload: NoteChunkPayload;
}

export interface NoteChunkHit {
  score: number;
  payload: NoteChunkPayload;
}

export function isNoteChunkPayload(value: unknown): value is NoteChunkPayload {
  if (typeof value !== 'object' || value === null) return false;
  return (
    typeof Reflect.get(value, 'destinationId') === 'number' &&
    typeof Reflect.get(value, 'noteId') === 'number' &&
    typeof Reflect.get(value, 'chunkIndex') === 'number' &&
    typeof Reflect.get(value, 'text') === 'string'
  );
}
