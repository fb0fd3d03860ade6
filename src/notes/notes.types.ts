export interface Note {
  id: number;
  destinationId: number;
  content: string;
  createdAt: Date;
}

export interface NoteResponse {
  id: number;
  destination_id: number;
  content: string;
  created_at: string;
}

export function toNoteResponse(n: Note): NoteResponse {
  return {
    id: n.id,
    destination_id: n.destinationId,
    content: n.content,
    created_at: n.createdAt.toISOString(),
  };
}
