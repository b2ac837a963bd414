import test, { after, before } from 'node:test';
import assert from 'node:assert/strict';
import fs from 'node:fs/promises';
import path from 'node:path';
import { buildUserContent, encodeImage, mediaTypeFor } from '../src/llm/images';
import { makeTempDir, removeDir } from './helpers';

let dir = '';

before(async () => {
  dir = await makeTempDir();
  await fs.writeFile(path.join(dir, 'logo.PNG'), Buffer.from([1, 2, 3]));
  await fs.writeFile(path.join(dir, 'notes.txt'), 'not an image');
});

after(async () => {
  await removeDir(dir);
});

test('media types follow the file extension', () => {
  assert.equal(mediaTypeFor('a.jpg'), 'image/jpeg');
  assert.equal(mediaTypeFor('a.JPEG'), 'image/jpeg');
  assert.equal(mediaTypeFor('a.webp'), 'image/webp');
  assert.equal(mediaTypeFor('a.bmp'), undefined);
});

test('an image is encoded as base64 with its media type', async () => {
  assert.deepEqual(await encodeImage(path.join(dir, 'logo.PNG')), { type: 'image', mediaType: 'image/png', data: 'AQID' });
});

test('unsupported and missing files are skipped', async () => {
  assert.equal(await encodeImage(path.join(dir, 'notes.txt')), null);
  assert.equal(await encodeImage(path.join(dir, 'gone.png')), null);
});

test('user content stays plain text without usable images', async () => {
  assert.equal(await buildUserContent('hello', [path.join(dir, 'gone.png')]), 'hello');
});

test('user content puts images before the text', async () => {
  assert.deepEqual(await buildUserContent('hello', [path.join(dir, 'logo.PNG')]), [
    { type: 'image', mediaType: 'image/png', data: 'AQID' },
    { type: 'text', text: 'hello' }
  ]);
});
