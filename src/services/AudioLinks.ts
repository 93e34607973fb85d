import { errorMessage } from '../errors.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { IObjectStorage } from '../providers/IObjectStorage.js';
import type { ScanRecord } from '../types/models.js';
import { withTimeout } from '../utils/timeout.js';

export interface AudioLinkOptions {
  ttlSeconds: number;
  timeoutMs: number;
}

/**
 * Signs links to stored voice replies. Scans keep only the storage reference,
 * so every response carries a link that is valid for the full TTL.
 */
export class AudioLinks {
  constructor(
    private readonly storage: IObjectStorage | undefined,
    private readonly options: AudioLinkOptions,
    private readonly logProvider: ILogProvider
  ) {}

  /** Null when the scan has no audio or signing failed. */
  async urlFor(scan: ScanRecord): Promise<string | null> {
    const ref = scan.result.audioRef;
    const { storage } = this;
    if (!ref || !storage) return null;

    try {
      return await withTimeout(
        () => storage.signedUrl(ref, this.options.ttlSeconds),
        this.options.timeoutMs,
        'audio signing'
      );
    } catch (err) {
      this.logProvider.warn('Audio link unavailable', {
        scanId: scan.scanId,
        error: errorMessage(err),
      });
      return null;
    }
  }
}
