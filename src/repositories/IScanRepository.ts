/**
 * Scan history data access interface.
 */

import type { ScanAggregates, ScanRecord } from '../types/models.js';

export interface IScanRepository {
  /** Insert or replace a scan. Rejects with StoreError. */
  put(scan: ScanRecord, signal?: AbortSignal): Promise<void>;

  findById(scanId: string): Promise<ScanRecord | null>;

  /** Most recent scans first. */
  getRecent(limit: number): Promise<ScanRecord[]>;

  /** A requester's scans, most recent first. */
  findByRequester(requesterId: string, limit: number): Promise<ScanRecord[]>;

  aggregateCounts(): Promise<ScanAggregates>;
}
