import type { ContentPart, ImagePart, TextPart, Turn } from './base.js';

const DATA_URI_PATTERN = /^data:([^;]+);base64,(.+)$/;

export interface InlineImage {
  mimeType: string;
  base64Data: string;
}

/**
 * Split a base64 data URI into its mime type and payload.
 * Returns null for anything else; callers drop such images.
 */
export function parseDataUri(uri: string): InlineImage | null {
  const match = DATA_URI_PATTERN.exec(uri);
  if (!match) {
    return null;
  }
  return { mimeType: match[1], base64Data: match[2] };
}

export function toDataUri(mimeType: string, base64Data: string): string {
  return `data:${mimeType};base64,${base64Data}`;
}

export function textPart(text: string): TextPart {
  return { type: 'text', text };
}

export function imagePart(url: string): ImagePart {
  return { type: 'image', url };
}

export function imagePartFromBytes(mimeType: string, bytes: Uint8Array): ImagePart {
  return imagePart(toDataUri(mimeType, Buffer.from(bytes).toString('base64')));
}

/**
 * View any turn content as a part list.
 */
export function contentParts(content: Turn['content']): ContentPart[] {
  return typeof content === 'string' ? [textPart(content)] : content;
}

export function turnHasImages(turn: Turn): boolean {
  return typeof turn.content !== 'string' && turn.content.some((part) => part.type === 'image');
}

export function messagesHaveImages(turns: readonly Turn[]): boolean {
  return turns.some(turnHasImages);
}

