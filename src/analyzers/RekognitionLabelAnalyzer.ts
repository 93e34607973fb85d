/**
 * Secondary analyzer: Amazon Rekognition label detection.
 * Lower fidelity than the vision model: it only sees generic labels, which
 * are keyword-matched against the catalog (see label-matching.ts).
 */

import { DetectLabelsCommand, RekognitionClient } from '@aws-sdk/client-rekognition';
import { AnalyzerError } from '../errors.js';
import type { DiseaseCatalog } from '../catalog/DiseaseCatalog.js';
import type { AnalysisResult, ImageInput } from '../types/models.js';
import type { IAnalyzer } from './IAnalyzer.js';
import { matchLabels, type DetectedLabel } from './label-matching.js';

const MAX_LABELS = 25;
const MIN_LABEL_CONFIDENCE = 50;

export type LabelClient = Pick<RekognitionClient, 'send'>;

export class RekognitionLabelAnalyzer implements IAnalyzer {
  readonly engine = 'secondary_labels' as const;

  private client: LabelClient;

  constructor(
    private readonly catalog: DiseaseCatalog,
    opts?: { region?: string; client?: LabelClient }
  ) {
    this.client = opts?.client ?? new RekognitionClient({ region: opts?.region, maxAttempts: 1 });
  }

  async infer(image: ImageInput, signal: AbortSignal): Promise<AnalysisResult> {
    let labels: DetectedLabel[];
    try {
      const response = await this.client.send(
        new DetectLabelsCommand({
          Image: { Bytes: image.bytes },
          MaxLabels: MAX_LABELS,
          MinConfidence: MIN_LABEL_CONFIDENCE,
        }),
        { abortSignal: signal }
      );
      labels = (response.Labels ?? []).flatMap((l) =>
        l.Name ? [{ name: l.Name, confidence: l.Confidence ?? 0 }] : []
      );
    } catch (err) {
      throw new AnalyzerError(
        this.engine,
        `Label detection failed: ${err instanceof Error ? err.message : String(err)}`,
        { cause: err }
      );
    }

    if (labels.length === 0) {
      throw new AnalyzerError(this.engine, 'No labels detected in image');
    }

    const match = matchLabels(labels, this.catalog);
    const top = labels
      .slice()
      .sort((a, b) => b.confidence - a.confidence)
      .slice(0, 8)
      .map((l) => l.name.toLowerCase());

    return {
      crop: match.crop,
      diseaseKey: match.diseaseKey,
      confidence: match.confidence,
      severity: match.severity,
      observedSymptoms: match.indicators,
      sourceEngine: this.engine,
      notes: `Identified from image labels: ${top.join(', ')}`,
    };
  }
}
