/**
 * CloudWatch Logs provider.
 * Buffers events and ships them in batches with PutLogEvents.
 * Non-blocking: at most one flush is in flight, and a failed send puts its
 * events back at the front of the buffer for the next attempt.
 * Degrades to a no-op when no log group is configured.
 */

import {
  CloudWatchLogsClient,
  CreateLogStreamCommand,
  PutLogEventsCommand,
} from '@aws-sdk/client-cloudwatch-logs';
import type { ILogProvider, LogEvent } from './ILogProvider.js';

export type LogsClient = Pick<CloudWatchLogsClient, 'send'>;

export interface CloudWatchLogProviderOptions {
  /** Log group name. Empty string disables sending. */
  logGroupName: string;
  /** Log stream name. Default: `api-<ISO date>-<pid>`. */
  logStreamName?: string;
  region?: string;
  /** Flush after this many buffered events. Default: 50. */
  flushThreshold?: number;
  /** Auto-flush interval in ms. Default: 10_000 (10s). 0 disables. */
  flushIntervalMs?: number;
  /** Events above this count are dropped oldest-first while sending keeps failing. */
  maxBuffered?: number;
  client?: LogsClient;
}

export class CloudWatchLogProvider implements ILogProvider {
  private buffer: LogEvent[] = [];
  private readonly logGroupName: string;
  private readonly logStreamName: string;
  private readonly flushThreshold: number;
  private readonly flushIntervalMs: number;
  private readonly maxBuffered: number;
  private readonly client: LogsClient;
  private flushTimer: ReturnType<typeof setInterval> | null = null;
  private streamReady = false;
  private flushing: Promise<void> | null = null;
  private readonly enabled: boolean;

  constructor(options: CloudWatchLogProviderOptions) {
    this.logGroupName = options.logGroupName;
    this.logStreamName =
      options.logStreamName ?? `api-${new Date().toISOString().slice(0, 10)}-${process.pid}`;
    this.flushThreshold = options.flushThreshold ?? 50;
    this.flushIntervalMs = options.flushIntervalMs ?? 10_000;
    this.maxBuffered = options.maxBuffered ?? 5_000;
    this.client = options.client ?? new CloudWatchLogsClient({ region: options.region });
    this.enabled = Boolean(this.logGroupName);

    if (this.enabled && this.flushIntervalMs > 0) {
      this.flushTimer = setInterval(() => {
        void this.flush();
      }, this.flushIntervalMs);
      // Don't hold the process open for the timer
      this.flushTimer.unref();
    }
  }

  log(event: LogEvent): void {
    if (!this.enabled) return;

    const stamped: LogEvent = {
      ...event,
      timestamp: event.timestamp ?? new Date().toISOString(),
    };
    this.buffer.push(stamped);
    this.trim();

    if (this.buffer.length >= this.flushThreshold) {
      void this.flush();
    }
  }

  /**
   * Ship everything buffered. A flush already in flight is shared rather than
   * started twice; it keeps draining until the buffer is empty or a send fails.
   */
  flush(): Promise<void> {
    if (this.flushing) return this.flushing;
    if (!this.enabled || this.buffer.length === 0) return Promise.resolve();

    this.flushing = this.drain().finally(() => {
      this.flushing = null;
    });
    return this.flushing;
  }

  private async drain(): Promise<void> {
    while (this.buffer.length > 0) {
      // Taken out before sending so trimming in log() only touches unsent events
      const batch = this.buffer.splice(0, this.buffer.length);

      try {
        await this.ensureStream();
        await this.client.send(
          new PutLogEventsCommand({
            logGroupName: this.logGroupName,
            logStreamName: this.logStreamName,
            logEvents: batch.map((e) => ({
              timestamp: Date.parse(e.timestamp ?? '') || Date.now(),
              message: JSON.stringify(e),
            })),
          })
        );
      } catch (err) {
        this.buffer.unshift(...batch);
        this.trim();
        // stderr is the only place left to report.
        console.error(
          `CloudWatch log flush failed (${batch.length} events kept): ${
            err instanceof Error ? err.message : String(err)
          }`
        );
        return;
      }
    }
  }

  /** Stop the auto-flush timer and flush remaining events. */
  async dispose(): Promise<void> {
    if (this.flushTimer) {
      clearInterval(this.flushTimer);
      this.flushTimer = null;
    }
    await this.flush();
  }

  info(message: string, fields?: Record<string, unknown>): void {
    this.log({ level: 'info', message, fields });
  }

  warn(message: string, fields?: Record<string, unknown>): void {
    this.log({ level: 'warn', message, fields });
  }

  error(message: string, fields?: Record<string, unknown>): void {
    this.log({ level: 'error', message, fields });
  }

  debug(message: string, fields?: Record<string, unknown>): void {
    this.log({ level: 'debug', message, fields });
  }

  /** Drop the oldest events beyond maxBuffered. */
  private trim(): void {
    if (this.buffer.length > this.maxBuffered) {
      this.buffer.splice(0, this.buffer.length - this.maxBuffered);
    }
  }

  private async ensureStream(): Promise<void> {
    if (this.streamReady) return;
    try {
      await this.client.send(
        new CreateLogStreamCommand({
          logGroupName: this.logGroupName,
          logStreamName: this.logStreamName,
        })
      );
    } catch (err) {
      if (!(err instanceof Error && err.name === 'ResourceAlreadyExistsException')) {
        throw err;
      }
    }
    this.streamReady = true;
  }
}
