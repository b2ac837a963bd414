import { randomUUID } from 'node:crypto';
import fs from 'node:fs/promises';
import path from 'node:path';
import type { FastifyRequest } from 'fastify';
import type { MultipartFile } from '@fastify/multipart';
import { z } from 'zod';
import { mediaTypeFor } from '../llm/images';
import { errorMessage, logger } from '../observability/logger';
import { formatIssues } from '../tools/registry';
import { Workspace } from '../tools/slide-tools';

export const chatBodySchema = z.object({
  session_id: z.string().min(1).optional(),
  message: z.string().trim().min(1, 'message is required'),
  images: z.array(z.string().min(1)).optional()
});

export type ChatBody = {
  session_id?: string;
  message: string;
  // absolute paths inside the uploads folder
  images: string[];
};

export type ChatBodyResult = { ok: true; body: ChatBody } | { ok: false; error: string };

const log = logger.child('uploads');

/**
 * Network clients may only point at files in the uploads folder; names are
 * resolved against it, the same containment rule the slide tools apply.
 */
export function resolveUploads(uploadsDir: string, images: string[]): string[] {
  const uploads = new Workspace(uploadsDir);
  return images.map((image) => {
    try {
      return uploads.resolve(image);
    } catch {
      throw new Error(`image path outside the uploads folder: ${image}`);
    }
  });
}

async function saveUpload(part: MultipartFile, uploadsDir: string): Promise<string | null> {
  const ext = path.extname(part.filename).toLowerCase();
  if (!mediaTypeFor(part.filename)) {
    // drain the stream so the rest of the form can be read
    part.file.resume();
    log.warn('unsupported upload skipped', { filename: part.filename });
    return null;
  }
  const dest = path.join(uploadsDir, `${randomUUID()}${ext}`);
  await fs.writeFile(dest, await part.toBuffer());
  log.info('upload saved', { filename: part.filename, path: dest });
  return dest;
}

async function readMultipart(request: FastifyRequest, uploadsDir: string) {
  const fields: Record<string, string> = {};
  const images: string[] = [];
  for await (const part of request.parts()) {
    if (part.type === 'file') {
      const saved = await saveUpload(part, uploadsDir);
      if (saved) images.push(saved);
    } else if (typeof part.value === 'string') {
      fields[part.fieldname] = part.value;
    }
  }
  return { fields, images };
}

/** JSON bodies name earlier uploads; multipart bodies carry the images themselves. */
export async function readChatBody(request: FastifyRequest, uploadsDir: string): Promise<ChatBodyResult> {
  if (request.isMultipart()) {
    const { fields, images } = await readMultipart(request, uploadsDir);
    const parsed = chatBodySchema.safeParse(fields);
    if (!parsed.success) return { ok: false, error: formatIssues(parsed.error) };
    const { session_id, message } = parsed.data;
    return { ok: true, body: { session_id, message, images } };
  }

  const parsed = chatBodySchema.safeParse(request.body);
  if (!parsed.success) return { ok: false, error: formatIssues(parsed.error) };
  const { session_id, message, images = [] } = parsed.data;
  try {
    return { ok: true, body: { session_id, message, images: resolveUploads(uploadsDir, images) } };
  } catch (err) {
    return { ok: false, error: errorMessage(err) };
  }
}
