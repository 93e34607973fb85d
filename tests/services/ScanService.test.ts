import { describe, it, expect, beforeEach } from 'vitest';
import { ScanService, STATS_UNAVAILABLE_NOTE } from '../../src/services/ScanService.js';
import { DiseaseCatalog } from '../../src/catalog/DiseaseCatalog.js';
import { ConsoleLogProvider } from '../../src/providers/ConsoleLogProvider.js';
import { NotFoundError, ValidationError } from '../../src/errors.js';
import { AudioLinks } from '../../src/services/AudioLinks.js';
import { MockScanRepository } from '../mocks/MockScanRepository.js';
import { MockObjectStorage } from '../mocks/MockObjectStorage.js';
import { makeScan } from '../fixtures/scans.js';
import type { ScanRecord } from '../../src/types/models.js';

function withAudio(scan: ScanRecord): ScanRecord {
  scan.result.audioRef = `audio/${scan.scanId}.mp3`;
  return scan;
}

describe('ScanService', () => {
  let repo: MockScanRepository;
  let logs: ConsoleLogProvider;
  let storage: MockObjectStorage;
  let service: ScanService;

  beforeEach(() => {
    repo = new MockScanRepository();
    logs = new ConsoleLogProvider();
    storage = new MockObjectStorage();
    const audioLinks = new AudioLinks(storage, { ttlSeconds: 900, timeoutMs: 1000 }, logs);
    service = new ScanService(repo, DiseaseCatalog.load(), logs, audioLinks);
  });

  // --- list ---

  it('should list recent scans with ISO timestamps', async () => {
    await repo.put(makeScan({ scanId: 'a', createdAt: new Date('2026-05-01T10:00:00.000Z') }));
    await repo.put(makeScan({ scanId: 'b', createdAt: new Date('2026-05-02T10:00:00.000Z') }));

    const { scans, count } = await service.list();
    expect(count).toBe(2);
    expect(scans.map((s) => s.scanId)).toEqual(['b', 'a']);
    expect(scans[0].createdAt).toBe('2026-05-02T10:00:00.000Z');
  });

  it('should list a single requester', async () => {
    await repo.put(makeScan({ scanId: 'a', requesterId: 'farmer-1' }));
    await repo.put(makeScan({ scanId: 'b', requesterId: 'farmer-2' }));

    const { scans } = await service.list({ requesterId: 'farmer-2' });
    expect(scans.map((s) => s.scanId)).toEqual(['b']);
  });

  it('should reject limits outside 1 to 100', async () => {
    await expect(service.list({ limit: 0 })).rejects.toThrow(ValidationError);
    await expect(service.list({ limit: 101 })).rejects.toThrow('limit must be an integer between 1 and 100');
  });

  // --- getById ---

  it('should return a scan by id or throw NotFoundError', async () => {
    await repo.put(makeScan({ scanId: 'known' }));
    expect((await service.getById('known')).scanId).toBe('known');
    await expect(service.getById('missing')).rejects.toThrow(NotFoundError);
  });

  // --- audio links ---

  it('should sign a fresh audio link each time a scan is served', async () => {
    await repo.put(withAudio(makeScan({ scanId: 'voiced' })));
    await repo.put(makeScan({ scanId: 'silent', createdAt: new Date('2026-05-03T00:00:00.000Z') }));

    expect((await service.getById('voiced')).audioUrl).toBe('memory://audio/voiced.mp3?expires=900');
    expect((await service.getById('silent')).audioUrl).toBeNull();

    const { scans } = await service.list();
    expect(scans.map((s) => s.audioUrl)).toEqual([null, 'memory://audio/voiced.mp3?expires=900']);
    expect((await repo.findById('voiced'))?.result.audioRef).toBe('audio/voiced.mp3');
  });

  it('should serve the scan without a link when signing fails', async () => {
    await repo.put(withAudio(makeScan({ scanId: 'voiced' })));
    storage.failSigning = true;

    const scan = await service.getById('voiced');

    expect(scan.diseaseName).toBe('Early Blight');
    expect(scan.audioUrl).toBeNull();
    expect(logs.events[0]).toMatchObject({
      level: 'warn',
      message: 'Audio link unavailable',
      fields: { scanId: 'voiced', error: 'Signing of audio/voiced.mp3 rejected' },
    });
  });

  // --- dashboardStats ---

  it('should rank diseases, leaving out unknown and healthy results', async () => {
    await repo.put(makeScan({}, { crop: 'rice', diseaseKey: 'rice_blast' }));
    await repo.put(makeScan({}, { crop: 'rice', diseaseKey: 'rice_blast' }));
    await repo.put(makeScan({}, { diseaseKey: 'tomato_early_blight' }));
    await repo.put(makeScan({}, { diseaseKey: null }));
    await repo.put(makeScan({}, { crop: 'general', diseaseKey: 'healthy', severity: 'none' }));

    const stats = await service.dashboardStats();
    expect(stats.total).toBe(5);
    expect(stats.byDisease.unknown).toBe(1);
    expect(stats.topDiseases).toEqual([
      { diseaseKey: 'rice_blast', displayName: 'Rice Blast', count: 2 },
      { diseaseKey: 'tomato_early_blight', displayName: 'Early Blight', count: 1 },
    ]);
    expect(stats.recentScans).toHaveLength(5);
    expect(stats.recentScans[0].audioUrl).toBeNull();
    expect(stats.note).toBeUndefined();
  });

  it('should return empty statistics with a note when the store is down', async () => {
    repo.failReads = true;

    const stats = await service.dashboardStats();
    expect(stats.total).toBe(0);
    expect(stats.topDiseases).toEqual([]);
    expect(stats.note).toBe(STATS_UNAVAILABLE_NOTE);
    expect(logs.events[0]).toMatchObject({ level: 'error', message: 'Dashboard stats unavailable' });
  });
});
