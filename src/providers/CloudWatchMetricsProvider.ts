/**
 * CloudWatch metrics provider.
 * Buffers data points and sends them with PutMetricData, at most 20 per call.
 * Failed batches are logged and dropped: metrics are best-effort.
 */

import { CloudWatchClient, PutMetricDataCommand } from '@aws-sdk/client-cloudwatch';
import type { ILogProvider } from './ILogProvider.js';
import type { IMetricsProvider, MetricDatum } from './IMetricsProvider.js';

export type MetricsClient = Pick<CloudWatchClient, 'send'>;

const MAX_BATCH = 20;

export interface CloudWatchMetricsProviderOptions {
  namespace: string;
  region?: string;
  /** Auto-flush interval in ms. Default: 60_000. 0 disables. */
  flushIntervalMs?: number;
  client?: MetricsClient;
}

export class CloudWatchMetricsProvider implements IMetricsProvider {
  private buffer: MetricDatum[] = [];
  private readonly namespace: string;
  private readonly client: MetricsClient;
  private flushTimer: ReturnType<typeof setInterval> | null = null;

  constructor(
    options: CloudWatchMetricsProviderOptions,
    private readonly logProvider: ILogProvider
  ) {
    this.namespace = options.namespace;
    this.client = options.client ?? new CloudWatchClient({ region: options.region });

    const interval = options.flushIntervalMs ?? 60_000;
    if (interval > 0) {
      this.flushTimer = setInterval(() => {
        void this.flush();
      }, interval);
      this.flushTimer.unref();
    }
  }

  put(datum: MetricDatum): void {
    this.buffer.push({ ...datum, timestamp: datum.timestamp ?? new Date() });
  }

  async flush(): Promise<void> {
    const pending = this.buffer.splice(0, this.buffer.length);

    for (let i = 0; i < pending.length; i += MAX_BATCH) {
      const batch = pending.slice(i, i + MAX_BATCH);
      try {
        await this.client.send(
          new PutMetricDataCommand({
            Namespace: this.namespace,
            MetricData: batch.map((d) => ({
              MetricName: d.name,
              Value: d.value,
              Unit: d.unit,
              Timestamp: d.timestamp,
              Dimensions: Object.entries(d.dimensions ?? {}).map(([Name, Value]) => ({ Name, Value })),
            })),
          })
        );
      } catch (err) {
        this.logProvider.warn('Metrics flush failed', {
          namespace: this.namespace,
          dropped: batch.length,
          error: err instanceof Error ? err.message : String(err),
        });
      }
    }
  }

  async dispose(): Promise<void> {
    if (this.flushTimer) {
      clearInterval(this.flushTimer);
      this.flushTimer = null;
    }
    await this.flush();
  }
}
