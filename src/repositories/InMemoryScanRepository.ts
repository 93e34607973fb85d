/**
 * In-memory implementation of IScanRepository.
 * Used when Supabase is not configured, and by tests.
 */

import type { IScanRepository } from './IScanRepository.js';
import type { ScanAggregates, ScanRecord } from '../types/models.js';
import { aggregateScans } from './aggregate.js';

export class InMemoryScanRepository implements IScanRepository {
  private scans = new Map<string, ScanRecord>();

  async put(scan: ScanRecord): Promise<void> {
    this.scans.set(scan.scanId, structuredClone(scan));
  }

  async findById(scanId: string): Promise<ScanRecord | null> {
    const scan = this.scans.get(scanId);
    return scan ? structuredClone(scan) : null;
  }

  async getRecent(limit: number): Promise<ScanRecord[]> {
    return this.newestFirst()
      .slice(0, limit)
      .map((s) => structuredClone(s));
  }

  async findByRequester(requesterId: string, limit: number): Promise<ScanRecord[]> {
    return this.newestFirst()
      .filter((s) => s.requesterId === requesterId)
      .slice(0, limit)
      .map((s) => structuredClone(s));
  }

  async aggregateCounts(): Promise<ScanAggregates> {
    return aggregateScans(
      [...this.scans.values()].map(({ result: { analysis } }) => ({
        crop: analysis.crop,
        diseaseKey: analysis.diseaseKey,
        severity: analysis.severity,
        sourceEngine: analysis.sourceEngine,
        confidence: analysis.confidence,
      }))
    );
  }

  get size(): number {
    return this.scans.size;
  }

  private newestFirst(): ScanRecord[] {
    return [...this.scans.values()].sort(
      (a, b) => b.createdAt.getTime() - a.createdAt.getTime()
    );
  }
}
