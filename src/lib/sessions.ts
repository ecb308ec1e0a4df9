// src/lib/sessions.ts
import type { Chunk } from "./pdf";

export type SessionState = "EMPTY" | "PROCESSING" | "READY" | "ERROR";

export interface LoadedDocument {
  documentId: string;
  fileName: string;
  chunks: Chunk[];
  uploadedAt: number;
}

export interface SessionContext {
  id: string;
  state: SessionState;
  document: LoadedDocument | null;
  /** Bumped by every upload; an upload only commits if it is still current. */
  generation: number;
  lastError: string | null;
  lastAccessedAt: number;
}

/**
 * Per-session document slots. Each session holds at most one document; a new
 * upload supersedes the previous one.
 */
export class SessionRegistry {
  private sessions = new Map<string, SessionContext>();

  constructor(private now: () => number = Date.now) {}

  get(id: string): SessionContext | null {
    const s = this.sessions.get(id);
    if (s) s.lastAccessedAt = this.now();
    return s ?? null;
  }

  getOrCreate(id: string): SessionContext {
    const existing = this.get(id);
    if (existing) return existing;
    const created: SessionContext = {
      id,
      state: "EMPTY",
      document: null,
      generation: 0,
      lastError: null,
      lastAccessedAt: this.now(),
    };
    this.sessions.set(id, created);
    return created;
  }

  /** Enters PROCESSING and returns the generation the upload must commit under. */
  markProcessing(id: string): number {
    const s = this.getOrCreate(id);
    s.state = "PROCESSING";
    s.lastError = null;
    s.generation += 1;
    return s.generation;
  }

  isCurrent(id: string, generation: number): boolean {
    return this.sessions.get(id)?.generation === generation;
  }

  markReady(id: string, document: LoadedDocument): void {
    const s = this.getOrCreate(id);
    s.state = "READY";
    s.document = document;
    s.lastError = null;
  }

  /** The prior document, if any, has already been superseded by the upload. */
  markFailed(id: string, message: string): void {
    const s = this.getOrCreate(id);
    s.state = "ERROR";
    s.lastError = message;
    s.document = null;
  }

  /** ERROR is transient: reading it once returns the session to EMPTY. */
  takeError(id: string): string | null {
    const s = this.sessions.get(id);
    if (!s || s.state !== "ERROR") return null;
    s.state = "EMPTY";
    return s.lastError;
  }

  clear(id: string): LoadedDocument | null {
    const s = this.sessions.get(id);
    if (!s) return null;
    const previous = s.document;
    s.document = null;
    s.state = "EMPTY";
    return previous;
  }

  /** Removes sessions idle for longer than `ttlMs` and returns them. */
  prune(ttlMs: number): SessionContext[] {
    const cutoff = this.now() - ttlMs;
    const expired: SessionContext[] = [];
    for (const [id, s] of this.sessions) {
      if (s.lastAccessedAt < cutoff && s.state !== "PROCESSING") {
        expired.push(s);
        this.sessions.delete(id);
      }
    }
    return expired;
  }

  size(): number {
    return this.sessions.size;
  }
}
