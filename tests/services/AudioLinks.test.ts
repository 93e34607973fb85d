import { describe, it, expect, beforeEach } from 'vitest';
import { AudioLinks } from '../../src/services/AudioLinks.js';
import { ConsoleLogProvider } from '../../src/providers/ConsoleLogProvider.js';
import { MockObjectStorage } from '../mocks/MockObjectStorage.js';
import { makeScan } from '../fixtures/scans.js';

describe('AudioLinks', () => {
  let storage: MockObjectStorage;
  let logs: ConsoleLogProvider;

  beforeEach(() => {
    storage = new MockObjectStorage();
    logs = new ConsoleLogProvider();
  });

  it('should sign the stored reference with the configured TTL', async () => {
    const scan = makeScan({ scanId: 'voiced' });
    scan.result.audioRef = 'audio/voiced.mp3';

    const links = new AudioLinks(storage, { ttlSeconds: 120, timeoutMs: 1000 }, logs);

    expect(await links.urlFor(scan)).toBe('memory://audio/voiced.mp3?expires=120');
  });

  it('should return null for a scan without audio', async () => {
    storage.failSigning = true;
    const links = new AudioLinks(storage, { ttlSeconds: 120, timeoutMs: 1000 }, logs);

    expect(await links.urlFor(makeScan())).toBeNull();
    expect(logs.events).toEqual([]);
  });

  it('should return null when no storage is configured', async () => {
    const scan = makeScan();
    scan.result.audioRef = 'audio/x.mp3';

    expect(await new AudioLinks(undefined, { ttlSeconds: 120, timeoutMs: 1000 }, logs).urlFor(scan)).toBeNull();
  });

  it('should give up on signing that exceeds its timeout', async () => {
    const scan = makeScan({ scanId: 'slow' });
    scan.result.audioRef = 'audio/slow.mp3';
    storage.hangSigning = true;

    const links = new AudioLinks(storage, { ttlSeconds: 120, timeoutMs: 20 }, logs);

    expect(await links.urlFor(scan)).toBeNull();
    expect(logs.events[0]).toMatchObject({
      level: 'warn',
      message: 'Audio link unavailable',
      fields: { scanId: 'slow', error: 'audio signing timed out after 20ms' },
    });
  });
});
