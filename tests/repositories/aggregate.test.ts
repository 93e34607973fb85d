import { describe, it, expect } from 'vitest';
import { StoreError } from '../../src/errors.js';
import {
  aggregateScans,
  parseScanStats,
  type ScanSummary,
} from '../../src/repositories/aggregate.js';

function summary(overrides: Partial<ScanSummary> = {}): ScanSummary {
  return {
    crop: 'tomato',
    diseaseKey: 'tomato_early_blight',
    severity: 'moderate',
    sourceEngine: 'primary_vision',
    confidence: 0.9,
    ...overrides,
  };
}

describe('aggregateScans', () => {
  it('should return zeroed counts for no scans', () => {
    expect(aggregateScans([])).toEqual({
      total: 0,
      byCrop: {},
      byDisease: {},
      bySeverity: { none: 0, mild: 0, moderate: 0, severe: 0 },
      byEngine: { primary_vision: 0, secondary_labels: 0, demo_fallback: 0 },
      averageConfidence: 0,
    });
  });

  it('should count by crop, disease, severity and engine', () => {
    const result = aggregateScans([
      summary(),
      summary({ confidence: 0.7 }),
      summary({
        crop: 'rice',
        diseaseKey: 'rice_blast',
        severity: 'severe',
        sourceEngine: 'secondary_labels',
        confidence: 0.6,
      }),
      summary({ crop: 'wheat', diseaseKey: null, severity: 'mild', sourceEngine: 'demo_fallback', confidence: 0.6 }),
    ]);

    expect(result.total).toBe(4);
    expect(result.byCrop).toEqual({ tomato: 2, rice: 1, wheat: 1 });
    expect(result.byDisease).toEqual({ tomato_early_blight: 2, rice_blast: 1, unknown: 1 });
    expect(result.bySeverity).toEqual({ none: 0, mild: 1, moderate: 2, severe: 1 });
    expect(result.byEngine).toEqual({ primary_vision: 2, secondary_labels: 1, demo_fallback: 1 });
    expect(result.averageConfidence).toBe(0.7);
  });

  it('should keep crop names that match Object.prototype members as plain keys', () => {
    const result = aggregateScans([
      summary({ crop: 'constructor' }),
      summary({ crop: '__proto__', diseaseKey: 'toString' }),
      summary({ crop: '__proto__' }),
    ]);

    expect(Object.entries(result.byCrop)).toEqual([
      ['constructor', 1],
      ['__proto__', 2],
    ]);
    expect(Object.entries(result.byDisease)).toEqual([
      ['tomato_early_blight', 2],
      ['toString', 1],
    ]);
    expect(Object.getPrototypeOf(result.byCrop)).toBe(Object.prototype);
  });
});

describe('parseScanStats', () => {
  it('should map the database function result to aggregates', () => {
    const result = parseScanStats({
      total: 3,
      average_confidence: 0.733,
      by_crop: [
        { key: 'rice', count: 1 },
        { key: 'tomato', count: 2 },
      ],
      by_disease: [
        { key: 'rice_blast', count: 1 },
        { key: 'unknown', count: 2 },
      ],
      by_severity: { moderate: 2, severe: 1 },
      by_engine: { primary_vision: 3 },
    });

    expect(result).toEqual({
      total: 3,
      byCrop: { rice: 1, tomato: 2 },
      byDisease: { rice_blast: 1, unknown: 2 },
      bySeverity: { none: 0, mild: 0, moderate: 2, severe: 1 },
      byEngine: { primary_vision: 3, secondary_labels: 0, demo_fallback: 0 },
      averageConfidence: 0.733,
    });
  });

  it('should return zeroed counts for an empty table', () => {
    expect(
      parseScanStats({
        total: 0,
        average_confidence: 0,
        by_crop: [],
        by_disease: [],
        by_severity: {},
        by_engine: {},
      })
    ).toEqual(aggregateScans([]));
  });

  it('should keep a "__proto__" crop as an own key', () => {
    const result = parseScanStats({
      total: 1,
      average_confidence: 0.5,
      by_crop: [{ key: '__proto__', count: 1 }],
      by_disease: [{ key: 'unknown', count: 1 }],
      by_severity: { mild: 1 },
      by_engine: { demo_fallback: 1 },
    });

    expect(Object.entries(result.byCrop)).toEqual([['__proto__', 1]]);
  });

  it('should reject a malformed result with StoreError', () => {
    expect(() => parseScanStats({ total: 'many' })).toThrow(StoreError);
    expect(() => parseScanStats(null)).toThrow(StoreError);
  });
});
