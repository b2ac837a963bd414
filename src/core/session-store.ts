import { randomUUID } from 'crypto';
import { Transcript } from './transcript';

export interface ChatSession {
  id: string;
  transcript: Transcript;
  createdAt: number;
  // latest deck produced in this session, relative to the workspace
  exportFile: string | null;
}

export interface SessionStore {
  get(id: string): Promise<ChatSession | undefined>;
  put(session: ChatSession): Promise<void>;
  delete(id: string): Promise<boolean>;
}

export function createSession(id: string = randomUUID()): ChatSession {
  return { id, transcript: new Transcript(), createdAt: Date.now(), exportFile: null };
}

/**
 * Writes the result of a turn back, unless the session the turn started from
 * was reset (deleted or replaced by a newer one) while it ran.
 */
export async function commitTurn(store: SessionStore, started: ChatSession, next: ChatSession): Promise<boolean> {
  const current = await store.get(started.id);
  if (!current || current.createdAt !== started.createdAt) return false;
  await store.put(next);
  return true;
}

export class InMemorySessionStore implements SessionStore {
  private sessions = new Map<string, ChatSession>();

  async get(id: string): Promise<ChatSession | undefined> {
    return this.sessions.get(id);
  }

  async put(session: ChatSession): Promise<void> {
    this.sessions.set(session.id, session);
  }

  async delete(id: string): Promise<boolean> {
    return this.sessions.delete(id);
  }

  size(): number {
    return this.sessions.size;
  }
}
