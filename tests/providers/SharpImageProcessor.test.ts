import { describe, it, expect } from 'vitest';
import sharp from 'sharp';
import { InvalidInputError } from '../../src/errors.js';
import { SharpImageProcessor, UNDECODABLE_IMAGE } from '../../src/providers/SharpImageProcessor.js';
import { JPEG_BYTES, PNG_BYTES } from '../fixtures/images.js';

const LEAF_GREEN = { r: 40, g: 140, b: 60, alpha: 1 };

async function jpeg(width: number, height: number): Promise<Uint8Array> {
  return sharp({ create: { width, height, channels: 3, background: LEAF_GREEN } }).jpeg().toBuffer();
}

async function png(width: number, height: number, alpha = 1): Promise<Uint8Array> {
  return sharp({ create: { width, height, channels: 4, background: { ...LEAF_GREEN, alpha } } })
    .png()
    .toBuffer();
}

describe('SharpImageProcessor', () => {
  const processor = new SharpImageProcessor();

  it('should scale the longer side down to 1024 pixels', async () => {
    const bytes = await jpeg(2048, 1536);

    const { image, preprocessing } = await processor.prepare({ bytes, mediaType: 'image/jpeg' });

    expect(preprocessing).toMatchObject({
      resized: true,
      originalWidth: 2048,
      originalHeight: 1536,
      width: 1024,
      height: 768,
      originalBytes: bytes.byteLength,
      processedBytes: image.bytes.byteLength,
    });
    const meta = await sharp(image.bytes).metadata();
    expect(meta.width).toBe(1024);
    expect(meta.height).toBe(768);
  });

  it('should not enlarge a small image', async () => {
    const { preprocessing } = await processor.prepare({ bytes: await jpeg(200, 100), mediaType: 'image/jpeg' });

    expect(preprocessing).toMatchObject({
      resized: false,
      originalWidth: 200,
      originalHeight: 100,
      width: 200,
      height: 100,
    });
  });

  it('should re-encode a transparent PNG as a three-channel JPEG', async () => {
    const { image } = await processor.prepare({ bytes: await png(300, 200, 0.5), mediaType: 'image/png' });

    expect(image.mediaType).toBe('image/jpeg');
    const meta = await sharp(image.bytes).metadata();
    expect(meta.format).toBe('jpeg');
    expect(meta.channels).toBe(3);
    expect(meta.hasAlpha).toBe(false);
  });

  it('should honour a configured maximum dimension', async () => {
    const small = new SharpImageProcessor({ maxDimension: 40 });

    const { preprocessing } = await small.prepare({ bytes: await png(100, 50), mediaType: 'image/png' });

    expect(preprocessing).toMatchObject({ resized: true, width: 40, height: 20 });
  });

  it('should reject bytes that only look like an image', async () => {
    await expect(processor.prepare({ bytes: JPEG_BYTES, mediaType: 'image/jpeg' })).rejects.toMatchObject({
      code: 'INVALID_INPUT',
      statusCode: 400,
      details: { reason: UNDECODABLE_IMAGE },
    });
    await expect(processor.prepare({ bytes: PNG_BYTES, mediaType: 'image/png' })).rejects.toBeInstanceOf(
      InvalidInputError
    );
  });
});
