import type WebSocket from 'ws';
import { z } from 'zod';
import type { ChatService } from '../agent/chat-service';
import { toWire } from '../core/events';
import { errorMessage, logger } from '../observability/logger';
import { formatIssues } from '../tools/registry';
import { resolveUploads } from './uploads';

const clientMessageSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('chat'),
    session_id: z.string().min(1).optional(),
    message: z.string().trim().min(1, 'message is required'),
    images: z.array(z.string().min(1)).optional()
  }),
  z.object({ type: z.literal('reset') }),
  z.object({ type: z.literal('ping') })
]);

const log = logger.child('ws');

function decode(data: WebSocket.RawData): string {
  if (Buffer.isBuffer(data)) return data.toString('utf8');
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
  return Buffer.from(data).toString('utf8');
}

function errorFrame(message: string) {
  return toWire({ kind: 'error', data: { message } });
}

/** One socket, one session; turns on a socket run one at a time. */
export function chatSocketHandler(socket: WebSocket, service: ChatService, uploadsDir: string) {
  let sessionId: string | null = null;
  let busy = false;

  const sendJson = (payload: object) => {
    if (socket.readyState !== socket.OPEN) return;
    socket.send(JSON.stringify(payload));
  };

  socket.on('message', async (data: WebSocket.RawData) => {
    let raw: unknown;
    try {
      raw = JSON.parse(decode(data));
    } catch {
      sendJson(errorFrame('invalid websocket message'));
      return;
    }
    const parsed = clientMessageSchema.safeParse(raw);
    if (!parsed.success) {
      sendJson(errorFrame(`invalid websocket message: ${formatIssues(parsed.error)}`));
      return;
    }
    const msg = parsed.data;

    if (msg.type === 'ping') {
      sendJson({ type: 'pong', ts_ms: Date.now() });
      return;
    }

    if (msg.type === 'reset') {
      try {
        if (sessionId) await service.reset(sessionId);
        sendJson({ type: 'reset', session_id: sessionId });
        sessionId = null;
      } catch (err) {
        log.error('ws reset failed', { session: sessionId, error: errorMessage(err) });
        sendJson(errorFrame(errorMessage(err)));
      }
      return;
    }

    if (busy) {
      sendJson(errorFrame('a turn is already running on this connection'));
      return;
    }
    let images: string[];
    try {
      images = resolveUploads(uploadsDir, msg.images ?? []);
    } catch (err) {
      sendJson(errorFrame(errorMessage(err)));
      return;
    }
    busy = true;
    try {
      const session = await service.openSession(msg.session_id ?? sessionId ?? undefined);
      sessionId = session.id;
      sendJson({ type: 'ready', session_id: session.id });
      log.info('ws turn start', { session: session.id });

      for await (const frame of service.stream(session.id, { message: msg.message, images })) {
        if (socket.readyState !== socket.OPEN) break;
        // the socket has its own ping/pong; stream keepalives are not forwarded
        if (frame.type === 'event') sendJson(toWire(frame.event));
      }
    } catch (err) {
      log.error('ws handler error', { session: sessionId, error: errorMessage(err) });
      sendJson(errorFrame(errorMessage(err)));
    } finally {
      busy = false;
    }
  });

  socket.on('close', () => {
    log.info('ws close', { session: sessionId });
  });
}
