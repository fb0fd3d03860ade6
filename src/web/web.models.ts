import type { AskResult } from '../advisor/advisor.types';
import type { DestinationDeletion, DestinationResponse } from '../destinations/destinations.types';
import type { NoteResponse } from '../notes/notes.types';

export type { AskResult, DestinationDeletion, DestinationResponse, NoteResponse };

export type ApiResult<T> =
  | { ok: true; data: T }
  | { ok: false; status: number | null; error: string };

export interface ChatEntry {
  text: string;
  isUser: boolean;
  /** `HH:MM`, local time of the server. */
  timestamp: string;
  weather?: string;
}

export type FlashKind = 'success' | 'error' | 'info';

export interface Flash {
  kind: FlashKind;
  text: string;
}
