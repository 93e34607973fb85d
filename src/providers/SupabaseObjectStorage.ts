/**
 * Supabase Storage implementation of IObjectStorage.
 * References are `<bucket>/<key>`.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import { StorageError } from '../errors.js';
import type { IObjectStorage } from './IObjectStorage.js';

export class SupabaseObjectStorage implements IObjectStorage {
  constructor(
    private readonly db: SupabaseClient,
    private readonly bucket: string
  ) {}

  async put(key: string, bytes: Uint8Array, contentType: string): Promise<string> {
    const { data, error } = await this.db.storage
      .from(this.bucket)
      .upload(key, bytes, { contentType, upsert: true });

    if (error) throw new StorageError(`Failed to upload ${key}: ${error.message}`, { cause: error });
    return `${this.bucket}/${data.path}`;
  }

  async signedUrl(ref: string, ttlSeconds: number): Promise<string> {
    const prefix = `${this.bucket}/`;
    if (!ref.startsWith(prefix)) {
      throw new StorageError(`Reference ${ref} is not in bucket ${this.bucket}`);
    }

    const { data, error } = await this.db.storage
      .from(this.bucket)
      .createSignedUrl(ref.slice(prefix.length), ttlSeconds);

    if (error) throw new StorageError(`Failed to sign ${ref}: ${error.message}`, { cause: error });
    return data.signedUrl;
  }
}
