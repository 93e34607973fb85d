import { z } from 'zod';
import { StoreError } from '../errors.js';
import type { ScanAggregates, Severity, SourceEngine } from '../types/models.js';

export interface ScanSummary {
  crop: string;
  diseaseKey: string | null;
  severity: Severity;
  sourceEngine: SourceEngine;
  confidence: number;
}

/** Unknown diseases are counted under this key. */
export const UNKNOWN_DISEASE_KEY = 'unknown';

export function aggregateScans(scans: Iterable<ScanSummary>): ScanAggregates {
  const bySeverity: Record<Severity, number> = { none: 0, mild: 0, moderate: 0, severe: 0 };
  const byEngine: Record<SourceEngine, number> = {
    primary_vision: 0,
    secondary_labels: 0,
    demo_fallback: 0,
  };
  // Keys are caller data; a Map keeps names like "__proto__" ordinary.
  const byCrop = new Map<string, number>();
  const byDisease = new Map<string, number>();

  let total = 0;
  let confidenceSum = 0;

  for (const scan of scans) {
    total++;
    confidenceSum += scan.confidence;
    byCrop.set(scan.crop, (byCrop.get(scan.crop) ?? 0) + 1);
    const disease = scan.diseaseKey ?? UNKNOWN_DISEASE_KEY;
    byDisease.set(disease, (byDisease.get(disease) ?? 0) + 1);
    bySeverity[scan.severity]++;
    byEngine[scan.sourceEngine]++;
  }

  return {
    total,
    byCrop: Object.fromEntries(byCrop),
    byDisease: Object.fromEntries(byDisease),
    bySeverity,
    byEngine,
    averageConfidence: total === 0 ? 0 : Math.round((confidenceSum / total) * 1000) / 1000,
  };
}

const count = z.number().int().nonnegative();
const keyedCounts = z.array(z.object({ key: z.string(), count }));

/** Shape returned by the `scan_stats()` database function. */
const scanStatsSchema = z.object({
  total: count,
  average_confidence: z.number().min(0).max(1),
  by_crop: keyedCounts,
  by_disease: keyedCounts,
  by_severity: z.object({
    none: count.default(0),
    mild: count.default(0),
    moderate: count.default(0),
    severe: count.default(0),
  }),
  by_engine: z.object({
    primary_vision: count.default(0),
    secondary_labels: count.default(0),
    demo_fallback: count.default(0),
  }),
});

export function parseScanStats(data: unknown): ScanAggregates {
  const parsed = scanStatsSchema.safeParse(data);
  if (!parsed.success) {
    throw new StoreError(`Unexpected scan_stats result: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
  }

  const stats = parsed.data;
  return {
    total: stats.total,
    byCrop: Object.fromEntries(stats.by_crop.map((c) => [c.key, c.count])),
    byDisease: Object.fromEntries(stats.by_disease.map((d) => [d.key, d.count])),
    bySeverity: stats.by_severity,
    byEngine: stats.by_engine,
    averageConfidence: stats.average_confidence,
  };
}
