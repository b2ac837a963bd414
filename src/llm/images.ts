import fs from 'node:fs/promises';
import path from 'node:path';
import type { ContentPart, ImageMediaType, ImagePart } from '../core/transcript';
import { errorMessage, logger } from '../observability/logger';

const log = logger.child('images');

const mediaTypes: Record<string, ImageMediaType> = {
  '.png': 'image/png',
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.gif': 'image/gif',
  '.webp': 'image/webp'
};

export function mediaTypeFor(filePath: string): ImageMediaType | undefined {
  return mediaTypes[path.extname(filePath).toLowerCase()];
}

export async function encodeImage(filePath: string): Promise<ImagePart | null> {
  const mediaType = mediaTypeFor(filePath);
  if (!mediaType) {
    log.warn('unsupported image format, skipped', { path: filePath });
    return null;
  }
  try {
    const data = await fs.readFile(filePath);
    return { type: 'image', mediaType, data: data.toString('base64') };
  } catch (err) {
    log.warn('image not readable, skipped', { path: filePath, error: errorMessage(err) });
    return null;
  }
}

/** Plain text when there are no usable images, otherwise images first, then the text. */
export async function buildUserContent(text: string, imagePaths: string[] = []): Promise<string | ContentPart[]> {
  const images: ContentPart[] = [];
  for (const imagePath of imagePaths) {
    const part = await encodeImage(imagePath);
    if (part) images.push(part);
  }
  if (images.length === 0) return text;
  return [...images, { type: 'text', text }];
}
