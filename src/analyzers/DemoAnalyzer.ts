/**
 * Tertiary analyzer: canned demo result drawn from the catalog.
 * Never looks at the image. Results are tagged demo_fallback and flagged
 * non-authoritative everywhere downstream.
 */

import { AnalyzerError } from '../errors.js';
import type { DiseaseCatalog } from '../catalog/DiseaseCatalog.js';
import type { AnalysisResult, ImageInput } from '../types/models.js';
import type { IAnalyzer } from './IAnalyzer.js';

/** Returns a number in [0, 1). Injected so tests can pin the selection. */
export type RandomSource = () => number;

export interface DemoAnalyzerOptions {
  random?: RandomSource;
  confidenceRange?: { min: number; max: number };
}

export const DEMO_NOTE =
  'Demo mode: no diagnosis service was reachable. This disease was picked from the catalog for demonstration and does not describe your photo.';

export class DemoAnalyzer implements IAnalyzer {
  readonly engine = 'demo_fallback' as const;

  private readonly random: RandomSource;
  private readonly min: number;
  private readonly max: number;

  constructor(
    private readonly catalog: DiseaseCatalog,
    opts?: DemoAnalyzerOptions
  ) {
    this.random = opts?.random ?? Math.random;
    this.min = opts?.confidenceRange?.min ?? 0.6;
    this.max = opts?.confidenceRange?.max ?? 0.9;
  }

  async infer(_image?: ImageInput, _signal?: AbortSignal): Promise<AnalysisResult> {
    const records = this.catalog.diseases();
    if (records.length === 0) {
      throw new AnalyzerError(this.engine, 'Catalog has no diseases to demo');
    }

    const index = Math.min(records.length - 1, Math.floor(this.random() * records.length));
    const record = records[index];
    const confidence = this.min + this.random() * (this.max - this.min);

    return {
      crop: record.crop,
      diseaseKey: record.key,
      confidence: Math.round(confidence * 100) / 100,
      severity: record.typicalSeverity,
      observedSymptoms: record.symptoms.slice(0, 3),
      sourceEngine: this.engine,
      notes: DEMO_NOTE,
    };
  }
}
