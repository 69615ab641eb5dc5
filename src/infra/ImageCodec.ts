import sharp from 'sharp';
import type { ColorMode, ImageDimensions } from '../domain/entities/ImageJob.js';
import { InvalidInputError, describeError } from '../domain/errors.js';

export interface ImageProbe {
  dimensions: ImageDimensions;
  format: string;
  colorMode: ColorMode;
  hasAlpha: boolean;
}

export interface RenderOptions {
  /** Longest edge of the output; smaller images are never enlarged */
  maxDimension: number;
  quality: number;
}

export interface RenderedImage {
  data: Buffer;
  dimensions: ImageDimensions;
  format: 'jpeg';
  colorMode: ColorMode;
}

const WHITE = { r: 255, g: 255, b: 255 };

const CONTENT_TYPES: Record<string, string> = {
  jpeg: 'image/jpeg',
  jpg: 'image/jpeg',
  png: 'image/png',
  webp: 'image/webp',
  gif: 'image/gif',
  avif: 'image/avif',
  tiff: 'image/tiff',
  svg: 'image/svg+xml',
};

export function contentTypeForFormat(format: string): string {
  return CONTENT_TYPES[format.toLowerCase()] ?? 'application/octet-stream';
}

function colorModeOf(channels: number, space: string | undefined): ColorMode {
  if (space === 'cmyk') {
    return 'CMYK';
  }
  switch (channels) {
    case 1:
      return 'L';
    case 2:
      return 'LA';
    case 4:
      return 'RGBA';
    default:
      return 'RGB';
  }
}

/**
 * Image decoding and encoding, delegated to sharp (libvips).
 * Pixel work runs on libvips' own thread pool, off the event loop.
 */
export class ImageCodec {
  /**
   * Reads the header and validates that the bytes are an image sharp can decode
   */
  async probe(bytes: Buffer): Promise<ImageProbe> {
    if (bytes.length === 0) {
      throw new InvalidInputError('Uploaded file is empty');
    }

    let metadata: sharp.Metadata;
    try {
      metadata = await sharp(bytes).metadata();
    } catch (error) {
      throw new InvalidInputError('File could not be decoded as an image', {
        reason: describeError(error),
      });
    }

    if (!metadata.format || !metadata.width || !metadata.height) {
      throw new InvalidInputError('File could not be decoded as an image', {
        reason: 'missing format or dimensions',
      });
    }

    const channels: number = metadata.channels ?? 3;
    return {
      dimensions: { width: metadata.width, height: metadata.height },
      format: metadata.format,
      colorMode: colorModeOf(channels, metadata.space),
      hasAlpha: metadata.hasAlpha ?? (channels === 2 || channels === 4),
    };
  }

  /**
   * Flattens transparency onto white, converts to sRGB, fits inside a
   * maxDimension square keeping the aspect ratio, and encodes an optimized JPEG.
   */
  async render(bytes: Buffer, options: RenderOptions): Promise<RenderedImage> {
    const { data, info } = await sharp(bytes)
      .flatten({ background: WHITE })
      .toColourspace('srgb')
      .resize({
        width: options.maxDimension,
        height: options.maxDimension,
        fit: 'inside',
        withoutEnlargement: true,
        kernel: sharp.kernel.lanczos3,
      })
      .jpeg({ quality: options.quality, mozjpeg: true })
      .toBuffer({ resolveWithObject: true });

    return {
      data,
      dimensions: { width: info.width, height: info.height },
      format: 'jpeg',
      colorMode: colorModeOf(info.channels, undefined),
    };
  }
}
