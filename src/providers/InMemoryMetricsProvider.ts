/**
 * Keeps data points in memory. Used in tests and when no metrics namespace
 * is configured.
 */

import type { IMetricsProvider, MetricDatum } from './IMetricsProvider.js';

export class InMemoryMetricsProvider implements IMetricsProvider {
  readonly data: MetricDatum[] = [];

  put(datum: MetricDatum): void {
    this.data.push({ ...datum, timestamp: datum.timestamp ?? new Date() });
  }

  async flush(): Promise<void> {}

  /** Sum of all values recorded under `name`, optionally filtered by dimensions. */
  total(name: string, dimensions?: Record<string, string>): number {
    return this.data
      .filter((d) => d.name === name)
      .filter((d) =>
        Object.entries(dimensions ?? {}).every(([k, v]) => d.dimensions?.[k] === v)
      )
      .reduce((sum, d) => sum + d.value, 0);
  }

  clear(): void {
    this.data.length = 0;
  }
}
