/**
 * Image intake: base64 decoding, size limits and format sniffing.
 * Everything here runs before any external call.
 */

import { InvalidInputError } from '../errors.js';
import type { ImageInput, ImageMediaType } from '../types/models.js';

const DATA_URI_PREFIX = /^data:[\w/+.-]*(;[\w=-]+)*;base64,/i;
const BASE64_BODY = /^[A-Za-z0-9+/_-]*={0,2}$/;

export function decodeBase64Image(encoded: string, maxBytes: number): ImageInput {
  const body = encoded.trim().replace(DATA_URI_PREFIX, '').replace(/\s+/g, '');
  if (body.length === 0) {
    throw new InvalidInputError('The image is empty.');
  }
  if (!BASE64_BODY.test(body)) {
    throw new InvalidInputError('The image is not valid base64.');
  }
  // Reject on encoded length first so an oversized payload is never decoded.
  if (Math.floor((body.length * 3) / 4) - 2 > maxBytes) {
    throw new InvalidInputError(tooLarge(maxBytes));
  }

  return toImageInput(new Uint8Array(Buffer.from(body, 'base64')), maxBytes);
}

export function toImageInput(bytes: Uint8Array, maxBytes: number): ImageInput {
  if (bytes.length === 0) {
    throw new InvalidInputError('The image is empty.');
  }
  if (bytes.length > maxBytes) {
    throw new InvalidInputError(tooLarge(maxBytes));
  }

  const mediaType = sniffMediaType(bytes);
  if (!mediaType) {
    throw new InvalidInputError('Only JPEG, PNG and WebP photos are supported.');
  }
  return { bytes, mediaType };
}

/** Identify JPEG, PNG or WebP from magic bytes. */
export function sniffMediaType(bytes: Uint8Array): ImageMediaType | null {
  if (startsWith(bytes, [0xff, 0xd8, 0xff])) return 'image/jpeg';
  if (startsWith(bytes, [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a])) return 'image/png';
  // RIFF....WEBP
  if (startsWith(bytes, [0x52, 0x49, 0x46, 0x46]) && startsWith(bytes.subarray(8), [0x57, 0x45, 0x42, 0x50])) {
    return 'image/webp';
  }
  return null;
}

export function extensionFor(mediaType: ImageMediaType): string {
  switch (mediaType) {
    case 'image/jpeg':
      return 'jpg';
    case 'image/png':
      return 'png';
    case 'image/webp':
      return 'webp';
  }
}

function startsWith(bytes: Uint8Array, magic: number[]): boolean {
  return bytes.length >= magic.length && magic.every((b, i) => bytes[i] === b);
}

function tooLarge(maxBytes: number): string {
  return `The image is larger than ${Math.round(maxBytes / (1024 * 1024))} MB.`;
}
