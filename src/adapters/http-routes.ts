import fs from 'node:fs';
import path from 'node:path';
import type { FastifyInstance, FastifyReply } from 'fastify';
import { z } from 'zod';
import type { ChatService } from '../agent/chat-service';
import { errorMessage, logger } from '../observability/logger';
import { formatIssues } from '../tools/registry';
import { formatSseFrame, SSE_HEADERS } from './sse';
import { readChatBody } from './uploads';

export type HttpRouteDeps = {
  service: ChatService;
  workspaceDir: string;
  uploadsDir: string;
};

const resetBodySchema = z.object({ session_id: z.string().min(1) });
const downloadQuerySchema = z.object({ session_id: z.string().min(1) });

const PPTX_MIME = 'application/vnd.openxmlformats-officedocument.presentationml.presentation';

const log = logger.child('http');

function badRequest(reply: FastifyReply, error: z.ZodError) {
  return reply.code(400).send({ error: formatIssues(error) });
}

export function registerHttpRoutes(server: FastifyInstance, deps: HttpRouteDeps) {
  const { service } = deps;

  server.get('/health', async () => ({ status: 'ok' }));

  server.post('/api/chat', async (request, reply) => {
    const chat = await readChatBody(request, deps.uploadsDir);
    if (!chat.ok) return reply.code(400).send({ error: chat.error });

    const { session_id, message, images } = chat.body;
    const result = await service.reply(session_id, { message, images });
    if (!result.ok) {
      return reply.code(500).send({ error: result.error, session_id: result.sessionId });
    }
    return {
      success: true,
      session_id: result.sessionId,
      response: result.response,
      has_pptx: result.exportFile !== null,
      pptx_filename: result.exportFile ? path.basename(result.exportFile) : null
    };
  });

  server.post('/api/chat/stream', async (request, reply) => {
    const chat = await readChatBody(request, deps.uploadsDir);
    if (!chat.ok) return reply.code(400).send({ error: chat.error });

    const { session_id, message, images } = chat.body;
    const session = await service.openSession(session_id);

    reply.hijack();
    reply.raw.writeHead(200, { ...SSE_HEADERS, 'X-Session-Id': session.id });

    let closed = false;
    reply.raw.on('close', () => {
      closed = true;
    });

    try {
      for await (const frame of service.stream(session.id, { message, images })) {
        if (closed) {
          log.info('stream client went away', { session: session.id });
          break;
        }
        reply.raw.write(formatSseFrame(frame));
      }
    } catch (err) {
      log.error('stream failed', { session: session.id, error: errorMessage(err) });
      reply.raw.write(
        formatSseFrame({ type: 'event', event: { kind: 'error', data: { message: errorMessage(err) } } })
      );
    } finally {
      reply.raw.end();
    }
  });

  server.get('/api/download', async (request, reply) => {
    const query = downloadQuerySchema.safeParse(request.query);
    if (!query.success) return badRequest(reply, query.error);

    const exportFile = await service.exportFileFor(query.data.session_id);
    if (!exportFile) {
      return reply.code(404).send({ error: 'No presentation available for this session' });
    }
    const absPath = path.resolve(deps.workspaceDir, exportFile);
    if (!fs.existsSync(absPath)) {
      return reply.code(404).send({ error: 'Presentation file not found' });
    }
    return reply
      .header('Content-Disposition', `attachment; filename="${path.basename(absPath)}"`)
      .type(PPTX_MIME)
      .send(fs.createReadStream(absPath));
  });

  server.post('/api/reset', async (request, reply) => {
    const body = resetBodySchema.safeParse(request.body);
    if (!body.success) return badRequest(reply, body.error);

    await service.reset(body.data.session_id);
    return { success: true, message: 'Conversation reset' };
  });
}
