/**
 * In-memory object storage with failure switches.
 */

import { StorageError } from '../../src/errors.js';
import { InMemoryObjectStorage } from '../../src/providers/InMemoryObjectStorage.js';
import { untilAborted } from './hang.js';

export class MockObjectStorage extends InMemoryObjectStorage {
  /** Fail uploads whose key starts with this prefix ('' fails all). */
  public failPutPrefix: string | null = null;
  /** Never answer uploads whose key starts with this prefix. */
  public hangPutPrefix: string | null = null;
  public failSigning = false;
  public hangSigning = false;

  async put(key: string, bytes: Uint8Array, contentType: string): Promise<string> {
    if (this.failPutPrefix !== null && key.startsWith(this.failPutPrefix)) {
      throw new StorageError(`Upload of ${key} rejected`);
    }
    if (this.hangPutPrefix !== null && key.startsWith(this.hangPutPrefix)) {
      return untilAborted();
    }
    return super.put(key, bytes, contentType);
  }

  async signedUrl(ref: string, ttlSeconds: number): Promise<string> {
    if (this.failSigning) throw new StorageError(`Signing of ${ref} rejected`);
    if (this.hangSigning) return untilAborted();
    return super.signedUrl(ref, ttlSeconds);
  }
}
