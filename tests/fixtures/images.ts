/**
 * Minimal byte sequences that pass magic-byte sniffing. Not decodable images:
 * tests that need real pixels generate them with sharp.
 */

import type { ImageInput } from '../../src/types/models.js';

export const JPEG_BYTES = new Uint8Array([0xff, 0xd8, 0xff, 0xe0, 0x00, 0x10, 0x4a, 0x46, 0x49, 0x46]);
export const PNG_BYTES = new Uint8Array([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a, 0x00, 0x00]);
export const WEBP_BYTES = new Uint8Array([
  0x52, 0x49, 0x46, 0x46, 0x24, 0x00, 0x00, 0x00, 0x57, 0x45, 0x42, 0x50, 0x56, 0x50,
]);

export function jpegImage(): ImageInput {
  return { bytes: JPEG_BYTES, mediaType: 'image/jpeg' };
}

export function toBase64(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString('base64');
}
