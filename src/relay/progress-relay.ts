import type { ChatOutcome, ChatRequest, ChatTurnRunner } from '../agent/chat-agent';
import { AsyncQueue } from '../core/async-queue';
import type { ProgressEvent } from '../core/events';
import { commitTurn, createSession, type SessionStore } from '../core/session-store';
import { errorMessage, logger } from '../observability/logger';

export type RelayFrame = { type: 'event'; event: ProgressEvent } | { type: 'keepalive' };

export type RelayDeps = {
  store: SessionStore;
  agent: ChatTurnRunner;
  keepaliveMs: number;
  staleMs: number;
};

type QueueItem = { type: 'progress'; event: ProgressEvent } | { type: 'done'; outcome: ChatOutcome };

const log = logger.child('relay');

/**
 * Runs one conversation turn on a detached worker and yields its progress as
 * it happens, closing with exactly one `complete` or `error` event.
 *
 * The worker owns a fork of the session transcript. The fork is written back
 * once the worker settles successfully, whether or not anyone is still
 * reading; the consumer waits for that write before the closing event. A
 * session reset mid-turn is left reset.
 */
export async function* runStreamed(deps: RelayDeps, sessionId: string, request: ChatRequest): AsyncGenerator<RelayFrame> {
  const stored = await deps.store.get(sessionId);
  const session = stored ?? createSession(sessionId);
  if (!stored) await deps.store.put(session);
  const transcript = session.transcript.fork();
  const queue = new AsyncQueue<QueueItem>();
  const worker = { settled: false };

  const run = async (): Promise<ChatOutcome> => {
    let outcome: ChatOutcome = { ok: false, error: 'worker exited without a result' };
    try {
      outcome = await deps.agent.send(transcript, request, (event) => queue.push({ type: 'progress', event }));
      return outcome;
    } catch (err) {
      outcome = { ok: false, error: errorMessage(err) };
      return outcome;
    } finally {
      worker.settled = true;
      queue.push({ type: 'done', outcome });
    }
  };

  // resolves to an error message when the commit did not happen
  const committed: Promise<string | null> = run().then(
    async (outcome) => {
      if (!outcome.ok) return outcome.error;
      const saved = await commitTurn(deps.store, session, {
        ...session,
        transcript,
        exportFile: outcome.exportFile ?? session.exportFile
      });
      if (saved) {
        log.debug('session committed', { session: sessionId, turns: transcript.length });
      } else {
        log.warn('session reset during the turn, result dropped', { session: sessionId });
      }
      return null;
    },
    (err: unknown) => errorMessage(err)
  ).catch((err: unknown) => {
    log.error('session commit failed', { session: sessionId, error: errorMessage(err) });
    return `Failed to save session: ${errorMessage(err)}`;
  });

  while (true) {
    const item = await queue.nextWithin(worker.settled ? deps.staleMs : deps.keepaliveMs);
    if (item === undefined) {
      if (worker.settled && queue.empty()) {
        log.warn('worker settled without a result', { session: sessionId });
        yield { type: 'event', event: { kind: 'error', data: { message: 'Stream ended without a result' } } };
        return;
      }
      yield { type: 'keepalive' };
      continue;
    }

    if (item.type === 'progress') {
      yield { type: 'event', event: item.event };
      continue;
    }

    const failure = await committed;
    if (item.outcome.ok && failure === null) {
      yield {
        type: 'event',
        event: { kind: 'complete', data: { response: item.outcome.text, pptx_file: item.outcome.exportFile } }
      };
    } else {
      yield { type: 'event', event: { kind: 'error', data: { message: failure ?? 'Unknown error' } } };
    }
    return;
  }
}
