/**
 * Supabase implementation of IScanRepository.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import { StoreError } from '../errors.js';
import type { IScanRepository } from './IScanRepository.js';
import type { ScanRow } from '../types/database.js';
import type { ScanAggregates, ScanRecord } from '../types/models.js';
import { parseScanStats } from './aggregate.js';

export class SupabaseScanRepository implements IScanRepository {
  constructor(private readonly db: SupabaseClient) {}

  async put(scan: ScanRecord, signal?: AbortSignal): Promise<void> {
    const query = this.db.from('scans').upsert(toRow(scan), { onConflict: 'scan_id' });
    const { error } = await (signal ? query.abortSignal(signal) : query);

    if (error) throw new StoreError(`Failed to store scan: ${error.message}`, { cause: error });
  }

  async findById(scanId: string): Promise<ScanRecord | null> {
    const { data, error } = await this.db
      .from('scans')
      .select('*')
      .eq('scan_id', scanId)
      .maybeSingle();

    if (error) throw new StoreError(`Failed to find scan: ${error.message}`, { cause: error });
    return data ? toRecord(data as ScanRow) : null;
  }

  async getRecent(limit: number): Promise<ScanRecord[]> {
    const { data, error } = await this.db
      .from('scans')
      .select('*')
      .order('created_at', { ascending: false })
      .limit(limit);

    if (error) throw new StoreError(`Failed to list scans: ${error.message}`, { cause: error });
    return (data as ScanRow[]).map(toRecord);
  }

  async findByRequester(requesterId: string, limit: number): Promise<ScanRecord[]> {
    const { data, error } = await this.db
      .from('scans')
      .select('*')
      .eq('requester_id', requesterId)
      .order('created_at', { ascending: false })
      .limit(limit);

    if (error) throw new StoreError(`Failed to list requester scans: ${error.message}`, { cause: error });
    return (data as ScanRow[]).map(toRecord);
  }

  /** Counts are computed by the `scan_stats()` function so they cover every row. */
  async aggregateCounts(): Promise<ScanAggregates> {
    const { data, error } = await this.db.rpc('scan_stats');

    if (error) throw new StoreError(`Failed to aggregate scans: ${error.message}`, { cause: error });
    return parseScanStats(data);
  }
}

function toRow(scan: ScanRecord): ScanRow {
  const { analysis } = scan.result;
  return {
    scan_id: scan.scanId,
    requester_id: scan.requesterId,
    image_ref: scan.imageRef,
    language: scan.language,
    crop: analysis.crop,
    disease_key: analysis.diseaseKey,
    severity: analysis.severity,
    source_engine: analysis.sourceEngine,
    confidence: analysis.confidence,
    result: scan.result,
    created_at: scan.createdAt.toISOString(),
  };
}

function toRecord(row: ScanRow): ScanRecord {
  return {
    scanId: row.scan_id,
    requesterId: row.requester_id,
    imageRef: row.image_ref,
    language: row.language,
    result: row.result,
    createdAt: new Date(row.created_at),
  };
}
