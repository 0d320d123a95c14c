import { imageSize } from 'image-size';
import { logger } from '@telemetry/index';

export type ImageDimensions = {
  width: number;
  height: number;
  /** Format read from the image header, e.g. `png` or `gif`. */
  format?: string;
};

/** Header-only read; `null` for videos and for images whose header cannot be parsed. */
export const readImageDimensions = (bytes: Buffer, mimeType: string): ImageDimensions | null => {
  if (!mimeType.startsWith('image/')) return null;
  try {
    const { width, height, type } = imageSize(bytes);
    if (width === undefined || height === undefined) return null;
    return type ? { width, height, format: type } : { width, height };
  } catch (err) {
    logger.debug({ err, mimeType }, 'Image header not readable');
    return null;
  }
};

export const formatDimensions = (dimensions: ImageDimensions | null) =>
  dimensions ? `${dimensions.width}x${dimensions.height}` : null;
