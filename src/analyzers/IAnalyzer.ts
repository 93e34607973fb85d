/**
 * Analyzer capability interface.
 * Every stage of the fallback chain implements it; the orchestrator iterates
 * an ordered list of stages without knowing which vendor sits behind each one.
 */

import type { AnalysisResult, ImageInput, SourceEngine } from '../types/models.js';

export interface IAnalyzer {
  /** Engine tag stamped on every result this analyzer produces. */
  readonly engine: SourceEngine;

  /**
   * Diagnose an image. Rejects with AnalyzerError on transport, timeout,
   * authorization or parse failures.
   */
  infer(image: ImageInput, signal: AbortSignal): Promise<AnalysisResult>;
}

/** One position in the fallback chain. */
export interface AnalyzerStage {
  analyzer: IAnalyzer;
  timeoutMs: number;
  /** Results below this confidence count as a failed stage. Default 0. */
  minConfidence?: number;
}
