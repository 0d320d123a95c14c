import path from 'path';
import type { FileTypeResult } from 'file-type';
import { IngestKind } from '@metadata/types';

export type DetectedKind = IngestKind | 'unsupported';

export type Detection = {
  kind: DetectedKind;
  mimeType: string;
};

const EXTENSION_MIME: Record<string, string> = {
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.png': 'image/png',
  '.gif': 'image/gif',
  '.webp': 'image/webp',
  '.mp4': 'video/mp4',
  '.mov': 'video/quicktime',
  '.avi': 'video/x-msvideo',
  '.mkv': 'video/x-matroska',
  '.webm': 'video/webm',
  '.json': 'application/json',
  '.pdf': 'application/pdf',
  '.doc': 'application/msword',
  '.docx': 'application/vnd.openxmlformats-officedocument.wordprocessingml.document',
  '.txt': 'text/plain',
};

const DOCUMENT_MIME = new Set([
  'application/pdf',
  'application/msword',
  'application/vnd.openxmlformats-officedocument.wordprocessingml.document',
  'text/plain',
]);

const GENERIC_MIME = new Set(['application/octet-stream', 'binary/octet-stream']);

/** `text/plain; charset=utf-8` -> `text/plain` */
export const mimeEssence = (mimeType: string) => mimeType.split(';')[0].trim().toLowerCase();

export const kindOfMime = (mimeType: string): DetectedKind => {
  const mime = mimeEssence(mimeType);
  if (mime.startsWith('image/') || mime.startsWith('video/')) return 'media';
  if (mime === 'application/json' || mime.endsWith('+json')) return 'json';
  if (DOCUMENT_MIME.has(mime)) return 'document';
  return 'unsupported';
};

let cachedFileType: ((input: Buffer) => Promise<FileTypeResult | undefined>) | null = null;

const getFileType = async () => {
  if (!cachedFileType) {
    const mod = await import('file-type');
    cachedFileType = mod.fromBuffer;
  }
  return cachedFileType;
};

/**
 * Declared MIME type first, then the extension, then magic bytes. A generic
 * `application/octet-stream` counts as undeclared.
 */
export const detectKind = async (bytes: Buffer, filename: string, mimeType?: string): Promise<Detection> => {
  if (mimeType && !GENERIC_MIME.has(mimeEssence(mimeType))) {
    const kind = kindOfMime(mimeType);
    if (kind !== 'unsupported') return { kind, mimeType: mimeEssence(mimeType) };
  }
  const byExtension = EXTENSION_MIME[path.extname(filename).toLowerCase()];
  if (byExtension) {
    return { kind: kindOfMime(byExtension), mimeType: byExtension };
  }
  const fromBuffer = await getFileType();
  const magic = await fromBuffer(bytes);
  if (magic) {
    return { kind: kindOfMime(magic.mime), mimeType: magic.mime };
  }
  return { kind: 'unsupported', mimeType: mimeType || 'application/octet-stream' };
};
