/**
 * Circuit breaker around an analyzer.
 * After `threshold` consecutive failures the breaker opens and every call
 * fails immediately, so the chain moves on to the next stage without paying
 * the stage timeout. After `resetAfterMs` one call is let through again.
 */

import { AnalyzerError } from '../errors.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { AnalysisResult, ImageInput, SourceEngine } from '../types/models.js';
import type { IAnalyzer } from './IAnalyzer.js';

export interface CircuitBreakerOptions {
  /** Consecutive failures before opening. Default: 2. */
  threshold?: number;
  /** How long the breaker stays open. Default: 300_000 (5 min). */
  resetAfterMs?: number;
  /** Clock, injectable for tests. */
  now?: () => number;
}

export type CircuitState = 'closed' | 'open' | 'half-open';

export class CircuitBreakerAnalyzer implements IAnalyzer {
  readonly engine: SourceEngine;

  private failures = 0;
  private openedAt: number | null = null;
  private readonly threshold: number;
  private readonly resetAfterMs: number;
  private readonly now: () => number;

  constructor(
    private readonly inner: IAnalyzer,
    private readonly logProvider: ILogProvider,
    options?: CircuitBreakerOptions
  ) {
    this.engine = inner.engine;
    this.threshold = options?.threshold ?? 2;
    this.resetAfterMs = options?.resetAfterMs ?? 300_000;
    this.now = options?.now ?? Date.now;
  }

  get state(): CircuitState {
    if (this.openedAt === null) return 'closed';
    return this.now() - this.openedAt >= this.resetAfterMs ? 'half-open' : 'open';
  }

  async infer(image: ImageInput, signal: AbortSignal): Promise<AnalysisResult> {
    if (this.state === 'open') {
      throw new AnalyzerError(this.engine, 'Circuit open; skipping stage');
    }

    try {
      const result = await this.inner.infer(image, signal);
      if (this.openedAt !== null) {
        this.logProvider.info('Circuit closed', { engine: this.engine });
      }
      this.failures = 0;
      this.openedAt = null;
      return result;
    } catch (err) {
      this.recordFailure();
      throw err;
    }
  }

  private recordFailure(): void {
    this.failures++;
    if (this.failures >= this.threshold) {
      // A failed half-open trial call restarts the open period.
      this.openedAt = this.now();
      this.logProvider.warn('Circuit opened', {
        engine: this.engine,
        failures: this.failures,
        resetAfterMs: this.resetAfterMs,
      });
    }
  }
}
