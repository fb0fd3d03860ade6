export const TRAVEL_EVENTS = {
  DESTINATION_CREATED: 'destination.created',
  DESTINATION_DELETED: 'destination.deleted',
  NOTE_CREATED: 'note.created',
  QUESTION_ANSWERED: 'question.answered',
} as const;

export type TravelEventName =
  (typeof TRAVEL_EVENTS)[keyof typeof TRAVEL_EVENTS];

// ── Catalogue events ──────────────────────────────────────────────────────────

export interface DestinationCreatedEvent {
  destinationId: number;
  name: string;
}

export interface DestinationDeletedEvent {
  destinationId: number;
  name: string;
  removedNoteIds: number[];
}

export interface NoteCreatedEvent {
  noteId: number;
  destinationId: number;
  content: string;
}

// ── Advisor events ────────────────────────────────────────────────────────────

export interface QuestionAnsweredEvent {
  destinationId: number;
  question: string;
  mode: 'agent' | 'direct';
  chunksUsed: number;
  weatherConsulted: boolean;
}
