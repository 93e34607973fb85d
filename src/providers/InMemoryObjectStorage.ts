/**
 * Object storage held in a Map. Used in tests and local runs without
 * Supabase credentials; signed URLs use the memory:// scheme.
 */

import { StorageError } from '../errors.js';
import type { IObjectStorage } from './IObjectStorage.js';

export class InMemoryObjectStorage implements IObjectStorage {
  readonly objects = new Map<string, { bytes: Uint8Array; contentType: string }>();

  async put(key: string, bytes: Uint8Array, contentType: string): Promise<string> {
    this.objects.set(key, { bytes, contentType });
    return key;
  }

  async signedUrl(ref: string, ttlSeconds: number): Promise<string> {
    if (!this.objects.has(ref)) throw new StorageError(`No object at ${ref}`);
    return `memory://${ref}?expires=${ttlSeconds}`;
  }
}
