/**
 * sharp-backed preprocessing: applies EXIF orientation, scales the longer side
 * down to `maxDimension` and re-encodes as JPEG on a white background.
 */

import sharp from 'sharp';
import { InvalidInputError } from '../errors.js';
import type { ImageInput, PreparedImage } from '../types/models.js';
import type { IImageProcessor } from './IImageProcessor.js';

const MAX_DIMENSION = 1024;
const JPEG_QUALITY = 90;
export const UNDECODABLE_IMAGE = 'The image could not be decoded.';

export interface SharpImageProcessorConfig {
  maxDimension?: number;
  quality?: number;
}

export class SharpImageProcessor implements IImageProcessor {
  private readonly maxDimension: number;
  private readonly quality: number;

  constructor(config: SharpImageProcessorConfig = {}) {
    this.maxDimension = config.maxDimension ?? MAX_DIMENSION;
    this.quality = config.quality ?? JPEG_QUALITY;
  }

  async prepare(image: ImageInput): Promise<PreparedImage> {
    try {
      return await this.reencode(image);
    } catch {
      throw new InvalidInputError(UNDECODABLE_IMAGE);
    }
  }

  private async reencode(image: ImageInput): Promise<PreparedImage> {
    const input = Buffer.from(image.bytes.buffer, image.bytes.byteOffset, image.bytes.byteLength);
    const pipeline = sharp(input, { failOn: 'error' });

    const { width: originalWidth, height: originalHeight } = await pipeline.metadata();
    if (!originalWidth || !originalHeight) throw new Error('Image has no dimensions');

    const { data, info } = await pipeline
      .rotate()
      .resize({
        width: this.maxDimension,
        height: this.maxDimension,
        fit: 'inside',
        withoutEnlargement: true,
      })
      .flatten({ background: '#ffffff' })
      .jpeg({ quality: this.quality })
      .toBuffer({ resolveWithObject: true });

    return {
      image: { bytes: data, mediaType: 'image/jpeg' },
      preprocessing: {
        resized: Math.max(originalWidth, originalHeight) > this.maxDimension,
        originalWidth,
        originalHeight,
        width: info.width,
        height: info.height,
        originalBytes: image.bytes.byteLength,
        processedBytes: data.byteLength,
      },
    };
  }
}
