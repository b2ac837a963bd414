import test, { afterEach, beforeEach } from 'node:test';
import assert from 'node:assert/strict';
import fs from 'node:fs/promises';
import path from 'node:path';
import type { FastifyInstance } from 'fastify';
import { ChatService } from '../src/agent/chat-service';
import { InMemorySessionStore } from '../src/core/session-store';
import { formatSseFrame } from '../src/adapters/sse';
import { buildServer } from '../src/server';
import { FakeRunner, makeWorkspace, removeDir } from './helpers';

let dir = '';
let server: FastifyInstance;
let store: InMemorySessionStore;

async function start(runner: FakeRunner, maxUploadBytes?: number) {
  store = new InMemorySessionStore();
  const service = new ChatService({ store, agent: runner, keepaliveMs: 1000, staleMs: 1000 });
  server = await buildServer(
    { service, workspaceDir: dir, uploadsDir: path.join(dir, 'uploads') },
    { logger: false, maxUploadBytes }
  );
}

const BOUNDARY = 'slides-form-boundary';

type FormPart = { name: string; value: string; filename?: string; contentType?: string };

function multipartBody(parts: FormPart[]): string {
  const sections = parts.map((part) => {
    const disposition = part.filename
      ? `Content-Disposition: form-data; name="${part.name}"; filename="${part.filename}"\r\nContent-Type: ${part.contentType ?? 'application/octet-stream'}`
      : `Content-Disposition: form-data; name="${part.name}"`;
    return `--${BOUNDARY}\r\n${disposition}\r\n\r\n${part.value}\r\n`;
  });
  return `${sections.join('')}--${BOUNDARY}--\r\n`;
}

const multipartHeaders = { 'content-type': `multipart/form-data; boundary=${BOUNDARY}` };

beforeEach(async () => {
  dir = await makeWorkspace();
});

afterEach(async () => {
  await server.close();
  await removeDir(dir);
});

test('health check', async () => {
  await start(new FakeRunner());
  const res = await server.inject({ method: 'GET', url: '/health' });
  assert.equal(res.statusCode, 200);
  assert.deepEqual(res.json(), { status: 'ok' });
});

test('chat answers and reports the deck', async () => {
  await start(new FakeRunner({ outcome: { ok: true, text: 'Here it is', exportFile: 'exports/deck.pptx' } }));
  const res = await server.inject({ method: 'POST', url: '/api/chat', payload: { session_id: 's1', message: 'build it' } });

  assert.equal(res.statusCode, 200);
  assert.deepEqual(res.json(), {
    success: true,
    session_id: 's1',
    response: 'Here it is',
    has_pptx: true,
    pptx_filename: 'deck.pptx'
  });
});

test('chat rejects a missing or blank message', async () => {
  await start(new FakeRunner());
  const missing = await server.inject({ method: 'POST', url: '/api/chat', payload: {} });
  assert.equal(missing.statusCode, 400);
  assert.deepEqual(missing.json(), { error: 'message: Required' });

  const blank = await server.inject({ method: 'POST', url: '/api/chat', payload: { message: '   ' } });
  assert.equal(blank.statusCode, 400);
  assert.deepEqual(blank.json(), { error: 'message: message is required' });
});

test('chat refuses image paths outside the uploads folder', async () => {
  const runner = new FakeRunner();
  await start(runner);

  for (const image of ['/tmp/private-photo.png', '../exports/deck.png']) {
    const res = await server.inject({
      method: 'POST',
      url: '/api/chat',
      payload: { session_id: 's1', message: 'use this', images: [image] }
    });
    assert.equal(res.statusCode, 400);
    assert.deepEqual(res.json(), { error: `image path outside the uploads folder: ${image}` });
  }
  const stream = await server.inject({
    method: 'POST',
    url: '/api/chat/stream',
    payload: { session_id: 's1', message: 'use this', images: ['/tmp/private-photo.png'] }
  });
  assert.equal(stream.statusCode, 400);
  assert.equal(runner.requests.length, 0);
});

test('chat resolves uploaded image names inside the uploads folder', async () => {
  const runner = new FakeRunner();
  await start(runner);
  const res = await server.inject({
    method: 'POST',
    url: '/api/chat',
    payload: { session_id: 's1', message: 'use this', images: ['logo.png'] }
  });
  assert.equal(res.statusCode, 200);
  assert.deepEqual(runner.requests[0].images, [path.join(dir, 'uploads', 'logo.png')]);
});

test('multipart chat saves the images it carries and skips other files', async () => {
  const runner = new FakeRunner();
  await start(runner);
  const res = await server.inject({
    method: 'POST',
    url: '/api/chat',
    headers: multipartHeaders,
    payload: multipartBody([
      { name: 'session_id', value: 's1' },
      { name: 'message', value: 'use these colors' },
      { name: 'files[]', value: 'png-bytes', filename: 'logo.png', contentType: 'image/png' },
      { name: 'files[]', value: 'plain notes', filename: 'notes.txt', contentType: 'text/plain' }
    ])
  });

  assert.equal(res.statusCode, 200);
  assert.equal(runner.requests[0].message, 'use these colors');
  const images = runner.requests[0].images ?? [];
  assert.equal(images.length, 1);
  assert.equal(path.dirname(images[0]), path.join(dir, 'uploads'));
  assert.equal(path.extname(images[0]), '.png');
  assert.equal(await fs.readFile(images[0], 'utf8'), 'png-bytes');
  assert.deepEqual(await fs.readdir(path.join(dir, 'uploads')), [path.basename(images[0])]);
});

test('multipart chat still needs a message', async () => {
  const runner = new FakeRunner();
  await start(runner);
  const res = await server.inject({
    method: 'POST',
    url: '/api/chat',
    headers: multipartHeaders,
    payload: multipartBody([{ name: 'session_id', value: 's1' }])
  });
  assert.equal(res.statusCode, 400);
  assert.deepEqual(res.json(), { error: 'message: Required' });
  assert.equal(runner.requests.length, 0);
});

test('an oversized upload is a client error and nothing is kept', async () => {
  const runner = new FakeRunner();
  await start(runner, 8);
  const res = await server.inject({
    method: 'POST',
    url: '/api/chat',
    headers: multipartHeaders,
    payload: multipartBody([
      { name: 'message', value: 'use this' },
      { name: 'files[]', value: 'far more than eight bytes', filename: 'logo.png', contentType: 'image/png' }
    ])
  });
  assert.equal(res.statusCode, 413);
  assert.equal(typeof res.json().error, 'string');
  assert.deepEqual(await fs.readdir(path.join(dir, 'uploads')), []);
  assert.equal(runner.requests.length, 0);
});

test('a malformed JSON body is answered with a 400 error object', async () => {
  await start(new FakeRunner());
  const res = await server.inject({
    method: 'POST',
    url: '/api/chat',
    headers: { 'content-type': 'application/json' },
    payload: '{"message": '
  });
  assert.equal(res.statusCode, 400);
  assert.deepEqual(Object.keys(res.json()), ['error']);
});

test('chat maps a failed turn to a 500', async () => {
  await start(new FakeRunner({ outcome: { ok: false, error: 'model down' } }));
  const res = await server.inject({ method: 'POST', url: '/api/chat', payload: { session_id: 's1', message: 'hi' } });
  assert.equal(res.statusCode, 500);
  assert.deepEqual(res.json(), { error: 'model down', session_id: 's1' });
});

test('the stream endpoint writes one SSE frame per event', async () => {
  await start(new FakeRunner({ events: 2 }));
  const res = await server.inject({ method: 'POST', url: '/api/chat/stream', payload: { session_id: 's1', message: 'hi' } });

  assert.equal(res.statusCode, 200);
  assert.equal(res.headers['content-type'], 'text/event-stream');
  assert.equal(res.headers['x-session-id'], 's1');
  const dispatched = (n: number) =>
    `data: {"event":"tool_dispatched","data":{"session":"conversation","tool":"generate_presentation","call_id":"c${n}","iteration":${n},"is_error":false}}\n\n`;
  assert.equal(
    res.body,
    dispatched(1) + dispatched(2) + 'data: {"event":"complete","data":{"response":"done","pptx_file":null}}\n\n'
  );
  assert.equal((await store.get('s1'))?.transcript.length, 2);
  assert.equal(formatSseFrame({ type: 'keepalive' }), ': keepalive\n\n');
});

test('download serves the latest deck of a session', async () => {
  await start(new FakeRunner({ outcome: { ok: true, text: 'ok', exportFile: 'exports/deck.pptx' } }));
  await fs.writeFile(path.join(dir, 'exports', 'deck.pptx'), 'deck-bytes');
  await server.inject({ method: 'POST', url: '/api/chat', payload: { session_id: 's1', message: 'build it' } });

  const res = await server.inject({ method: 'GET', url: '/api/download?session_id=s1' });
  assert.equal(res.statusCode, 200);
  assert.equal(res.headers['content-disposition'], 'attachment; filename="deck.pptx"');
  assert.equal(res.headers['content-type'], 'application/vnd.openxmlformats-officedocument.presentationml.presentation');
  assert.equal(res.body, 'deck-bytes');
});

test('download is a 404 without a deck', async () => {
  await start(new FakeRunner());
  const none = await server.inject({ method: 'GET', url: '/api/download?session_id=unknown' });
  assert.equal(none.statusCode, 404);
  assert.deepEqual(none.json(), { error: 'No presentation available for this session' });

  const noQuery = await server.inject({ method: 'GET', url: '/api/download' });
  assert.equal(noQuery.statusCode, 400);
});

test('download is a 404 when the deck file is gone', async () => {
  await start(new FakeRunner({ outcome: { ok: true, text: 'ok', exportFile: 'exports/missing.pptx' } }));
  await server.inject({ method: 'POST', url: '/api/chat', payload: { session_id: 's1', message: 'build it' } });
  const res = await server.inject({ method: 'GET', url: '/api/download?session_id=s1' });
  assert.equal(res.statusCode, 404);
  assert.deepEqual(res.json(), { error: 'Presentation file not found' });
});

test('reset drops the session', async () => {
  await start(new FakeRunner());
  await server.inject({ method: 'POST', url: '/api/chat', payload: { session_id: 's1', message: 'hi' } });

  const res = await server.inject({ method: 'POST', url: '/api/reset', payload: { session_id: 's1' } });
  assert.deepEqual(res.json(), { success: true, message: 'Conversation reset' });
  assert.equal(await store.get('s1'), undefined);

  const bad = await server.inject({ method: 'POST', url: '/api/reset', payload: {} });
  assert.equal(bad.statusCode, 400);
});
