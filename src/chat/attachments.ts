import { readFile, stat } from 'fs/promises';
import { basename, extname } from 'path';
import type { ImagePart } from '../providers/base.js';
import { imagePartFromBytes } from '../providers/content.js';
import { log } from '../utils/logger.js';

export const MAX_ATTACHMENTS = 5;
export const MAX_ATTACHMENT_BYTES = 10 * 1024 * 1024;

const IMAGE_MIME_TYPES: Readonly<Record<string, string>> = {
  '.jpeg': 'image/jpeg',
  '.jpg': 'image/jpeg',
  '.png': 'image/png',
  '.gif': 'image/gif',
  '.webp': 'image/webp',
};

export class AttachmentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'AttachmentError';
  }
}

export function imageMimeType(filePath: string): string | undefined {
  return IMAGE_MIME_TYPES[extname(filePath).toLowerCase()];
}

/**
 * Read image files into image parts, enforcing count, type and size limits.
 */
export async function loadImageAttachments(paths: readonly string[]): Promise<ImagePart[]> {
  if (paths.length > MAX_ATTACHMENTS) {
    throw new AttachmentError(`You can attach a maximum of ${MAX_ATTACHMENTS} files.`);
  }

  const parts: ImagePart[] = [];
  for (const filePath of paths) {
    const mimeType = imageMimeType(filePath);
    if (!mimeType) {
      throw new AttachmentError(
        `${basename(filePath)}: files must be images (jpeg, jpg, png, gif, webp).`
      );
    }

    const { size } = await stat(filePath);
    if (size > MAX_ATTACHMENT_BYTES) {
      throw new AttachmentError(`${basename(filePath)}: each file must be smaller than 10MB.`);
    }

    const bytes = await readFile(filePath);
    parts.push(imagePartFromBytes(mimeType, bytes));

    log.info('Processed image', {
      mime_type: mimeType,
      size,
      original_name: basename(filePath),
    });
  }

  return parts;
}
