import Fastify, { type FastifyError, type FastifyInstance } from 'fastify';
import multipart from '@fastify/multipart';
import websocket from '@fastify/websocket';
import type { ChatService } from './agent/chat-service';
import { createApp, ensureWorkspaceDirs } from './app';
import { registerHttpRoutes } from './adapters/http-routes';
import { chatSocketHandler } from './adapters/ws-handler';
import { config } from './config';
import { errorMessage, logger } from './observability/logger';

export type ServerDeps = {
  service: ChatService;
  workspaceDir: string;
  uploadsDir: string;
};

export type ServerOptions = {
  logger?: boolean;
  maxUploadBytes?: number;
};

export async function buildServer(deps: ServerDeps, opts: ServerOptions = {}): Promise<FastifyInstance> {
  const server = Fastify({ logger: opts.logger ?? true });
  await server.register(websocket);
  await server.register(multipart, {
    limits: { fileSize: opts.maxUploadBytes ?? config.maxUploadBytes, files: 10 }
  });

  server.setErrorHandler<FastifyError>((err, _req, reply) => {
    const status = err.statusCode && err.statusCode >= 400 && err.statusCode < 500 ? err.statusCode : 500;
    if (status === 500) logger.error('request failed', errorMessage(err));
    void reply.code(status).send({ error: err.message });
  });

  registerHttpRoutes(server, deps);

  server.get('/ws/chat', { websocket: true }, (socket, _req) => {
    chatSocketHandler(socket, deps.service, deps.uploadsDir);
  });

  return server;
}

async function start() {
  logger.info('=== slidesmith start ===');
  logger.info('workspace', { dir: config.workspaceDir, model: config.openaiModel });
  await ensureWorkspaceDirs(config);

  const { service } = createApp(config);
  const server = await buildServer({
    service,
    workspaceDir: config.workspaceDir,
    uploadsDir: config.uploadsDir
  });

  await server.listen({ port: config.port, host: config.host });
  logger.info('server listening', { port: config.port, host: config.host });
}

if (require.main === module) {
  start().catch((err) => {
    logger.error('failed to start server', err);
    process.exit(1);
  });
}
