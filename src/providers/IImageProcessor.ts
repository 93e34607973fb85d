/**
 * Image preprocessing interface. Runs before any analyzer stage sees an upload.
 */

import type { ImageInput, PreparedImage } from '../types/models.js';

export interface IImageProcessor {
  /** Normalize and re-encode an upload. Rejects with InvalidInputError when it cannot be decoded. */
  prepare(image: ImageInput): Promise<PreparedImage>;
}
