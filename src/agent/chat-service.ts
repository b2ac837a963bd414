import { commitTurn, createSession, type ChatSession, type SessionStore } from '../core/session-store';
import { errorMessage, logger } from '../observability/logger';
import { runStreamed, type RelayFrame } from '../relay/progress-relay';
import type { ChatRequest, ChatTurnRunner } from './chat-agent';

export type ChatServiceOptions = {
  store: SessionStore;
  agent: ChatTurnRunner;
  keepaliveMs: number;
  staleMs: number;
};

export type ChatReplyResult =
  | { ok: true; sessionId: string; response: string; exportFile: string | null }
  | { ok: false; sessionId: string; error: string };

const log = logger.child('chat-service');

/** Session-level entry point shared by the HTTP routes, the WebSocket stream and the CLI. */
export class ChatService {
  private opts: ChatServiceOptions;

  constructor(opts: ChatServiceOptions) {
    this.opts = opts;
  }

  /** Loads a session, or creates and stores an empty one. */
  async openSession(sessionId?: string): Promise<ChatSession> {
    if (sessionId) {
      const existing = await this.opts.store.get(sessionId);
      if (existing) return existing;
    }
    const session = createSession(sessionId || undefined);
    await this.opts.store.put(session);
    log.info('session created', { session: session.id });
    return session;
  }

  async reply(sessionId: string | undefined, request: ChatRequest): Promise<ChatReplyResult> {
    let id = sessionId ?? '';
    try {
      const session = await this.openSession(sessionId);
      id = session.id;
      const transcript = session.transcript.fork();
      const outcome = await this.opts.agent.send(transcript, request);
      if (!outcome.ok) {
        return { ok: false, sessionId: id, error: outcome.error };
      }
      const exportFile = outcome.exportFile ?? session.exportFile;
      if (!(await commitTurn(this.opts.store, session, { ...session, transcript, exportFile }))) {
        log.warn('session reset during the turn, result dropped', { session: id });
      }
      return { ok: true, sessionId: id, response: outcome.text, exportFile: outcome.exportFile };
    } catch (err) {
      log.error('reply failed', { session: id, error: errorMessage(err) });
      return { ok: false, sessionId: id, error: errorMessage(err) };
    }
  }

  stream(sessionId: string, request: ChatRequest): AsyncGenerator<RelayFrame> {
    return runStreamed(this.opts, sessionId, request);
  }

  async reset(sessionId: string): Promise<boolean> {
    const removed = await this.opts.store.delete(sessionId);
    log.info('session reset', { session: sessionId, removed });
    return removed;
  }

  async exportFileFor(sessionId: string): Promise<string | null> {
    const session = await this.opts.store.get(sessionId);
    return session?.exportFile ?? null;
  }
}
