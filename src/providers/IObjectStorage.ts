/**
 * Object storage interface for archived images and synthesized audio.
 */

export interface IObjectStorage {
  /** Store bytes under `key`. Returns a reference usable with signedUrl(). Rejects with StorageError. */
  put(key: string, bytes: Uint8Array, contentType: string): Promise<string>;

  /** Time-limited URL for a stored object. Rejects with StorageError. */
  signedUrl(ref: string, ttlSeconds: number): Promise<string>;
}
