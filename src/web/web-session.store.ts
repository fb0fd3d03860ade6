import { Injectable, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import type { ChatEntry, Flash } from './web.models';

interface WebSession {
  transcripts: Map<number, ChatEntry[]>;
  flashes: Flash[];
  lastSeen: number;
}

export const SESSION_TTL_MS = 30 * 60 * 1000; // 30 minutes
export const MAX_TRANSCRIPT = 50;
const SWEEP_INTERVAL_MS = 60_000;

export function clockTime(date: Date): string {
  const hh = String(date.getHours()).padStart(2, '0');
  const mm = String(date.getMinutes()).padStart(2, '0');
  return `${hh}:${mm}`;
}

/**
 * In-memory browser sessions: one chat transcript per destination plus
 * one-shot flash messages. Nothing here is persisted.
 */
@Injectable()
export class WebSessionStore implements OnModuleInit, OnModuleDestroy {
  private readonly sessions = new Map<string, WebSession>();
  private timer: NodeJS.Timeout | null = null;

  onModuleInit(): void {
    this.timer = setInterval(() => this.sweep(), SWEEP_INTERVAL_MS);
    this.timer.unref();
  }

  onModuleDestroy(): void {
    if (this.timer) clearInterval(this.timer);
    this.timer = null;
  }

  get size(): number {
    return this.sessions.size;
  }

  transcript(sessionId: string, destinationId: number, now = Date.now()): ChatEntry[] {
    const session = this.getOrCreate(sessionId, now);
    return [...(session.transcripts.get(destinationId) ?? [])];
  }

  append(
    sessionId: string,
    destinationId: number,
    entry: ChatEntry,
    now = Date.now(),
  ): void {
    const session = this.getOrCreate(sessionId, now);
    const history = session.transcripts.get(destinationId) ?? [];
    history.push(entry);
    // Keep the most recent messages only
    session.transcripts.set(destinationId, history.slice(-MAX_TRANSCRIPT));
  }

  clear(sessionId: string, destinationId: number, now = Date.now()): void {
    this.getOrCreate(sessionId, now).transcripts.delete(destinationId);
  }

  flash(sessionId: string, flash: Flash, now = Date.now()): void {
    this.getOrCreate(sessionId, now).flashes.push(flash);
  }

  /** Returns pending flashes and forgets them. */
  takeFlashes(sessionId: string, now = Date.now()): Flash[] {
    const session = this.getOrCreate(sessionId, now);
    const flashes = session.flashes;
    session.flashes = [];
    return flashes;
  }

  sweep(now = Date.now()): number {
    let removed = 0;
    for (const [id, session] of this.sessions) {
      if (now - session.lastSeen > SESSION_TTL_MS) {
        this.sessions.delete(id);
        removed++;
      }
    }
    return removed;
  }

  private getOrCreate(sessionId: string, now: number): WebSession {
    let session = this.sessions.get(sessionId);
    if (!session || now - session.lastSeen > SESSION_TTL_MS) {
      session = { transcripts: new Map(), flashes: [], lastSeen: now };
      this.sessions.set(sessionId, session);
    }
    session.lastSeen = now;
    return session;
  }
}
