import { describe, it, expect } from 'vitest';
import { InMemoryMetricsProvider } from '../../src/providers/InMemoryMetricsProvider.js';

describe('InMemoryMetricsProvider', () => {
  it('should total values by name and dimensions', () => {
    const metrics = new InMemoryMetricsProvider();
    metrics.put({ name: 'AnalyzerFailures', value: 1, unit: 'Count', dimensions: { engine: 'primary_vision' } });
    metrics.put({ name: 'AnalyzerFailures', value: 1, unit: 'Count', dimensions: { engine: 'secondary_labels' } });
    metrics.put({ name: 'AnalyzerFailures', value: 1, unit: 'Count', dimensions: { engine: 'primary_vision' } });

    expect(metrics.total('AnalyzerFailures')).toBe(3);
    expect(metrics.total('AnalyzerFailures', { engine: 'primary_vision' })).toBe(2);
    expect(metrics.total('ScanCompleted')).toBe(0);
  });

  it('should stamp data points and clear them', () => {
    const metrics = new InMemoryMetricsProvider();
    metrics.put({ name: 'ScanCompleted', value: 1, unit: 'Count' });
    expect(metrics.data[0].timestamp).toBeInstanceOf(Date);

    metrics.clear();
    expect(metrics.data).toHaveLength(0);
  });
});
