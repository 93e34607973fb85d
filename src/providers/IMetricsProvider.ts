/**
 * Metrics provider interface.
 * Counters and timings emitted by the analysis pipeline.
 */

export type MetricUnit = 'Count' | 'Milliseconds';

export interface MetricDatum {
  name: string;
  value: number;
  unit: MetricUnit;
  dimensions?: Record<string, string>;
  timestamp?: Date;
}

export interface IMetricsProvider {
  /** Record one data point. Non-blocking. */
  put(datum: MetricDatum): void;

  /** Deliver buffered data points. Never rejects. */
  flush(): Promise<void>;
}
