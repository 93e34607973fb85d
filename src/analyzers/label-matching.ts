/**
 * Maps generic image labels ("Leaf", "Blight", "Tomato") onto a catalog
 * crop and disease.
 *
 * Rules:
 *   - labels are considered strongest first;
 *   - the crop is the first label containing a catalog crop keyword;
 *   - generic labels and crop labels never identify a disease;
 *   - a disease matches when the label appears as a whole word in its
 *     display name or image keywords, restricted to the matched crop if any;
 *   - confidence is the strongest label used × LABEL_CONFIDENCE_DISCOUNT,
 *     so it never exceeds what the label service reported.
 */

import type { DiseaseCatalog } from '../catalog/DiseaseCatalog.js';
import type { DiseaseRecord, Severity } from '../types/models.js';

export interface DetectedLabel {
  name: string;
  /** 0–100, as reported by the label service. */
  confidence: number;
}

export interface LabelMatch {
  crop: string;
  diseaseKey: string | null;
  /** In [0, 1]. */
  confidence: number;
  severity: Severity;
  /** Non-generic labels that describe the plant's condition. */
  indicators: string[];
}

export const LABEL_CONFIDENCE_DISCOUNT = 0.8;

/** Labels a detector attaches to almost any plant photo. */
const GENERIC_LABELS = new Set([
  'leaf',
  'leaves',
  'plant',
  'vegetation',
  'flora',
  'green',
  'nature',
  'outdoors',
  'tree',
  'grass',
  'produce',
  'food',
  'vegetable',
  'fruit',
  'flower',
  'garden',
  'field',
  'agriculture',
  'land',
  'soil',
  'person',
  'hand',
]);

export function matchLabels(labels: DetectedLabel[], catalog: DiseaseCatalog): LabelMatch {
  const ordered = labels
    .map((l) => ({ name: l.name.trim().toLowerCase(), confidence: l.confidence }))
    .filter((l) => l.name.length > 0)
    .sort((a, b) => b.confidence - a.confidence);

  let crop: { name: string; confidence: number } | null = null;
  const cropLabels = new Set<string>();

  for (const label of ordered) {
    const hit = catalog.crops().find((c) => c.keywords.some((kw) => label.name.includes(kw)));
    if (hit) {
      cropLabels.add(label.name);
      crop ??= { name: hit.name, confidence: label.confidence };
    }
  }

  const indicators = ordered.filter(
    (l) => !GENERIC_LABELS.has(l.name) && !cropLabels.has(l.name)
  );

  const candidates = crop ? catalog.forCrop(crop.name) : catalog.diseases();
  const diseased = candidates.filter((r) => r.typicalSeverity !== 'none');

  for (const label of indicators) {
    const record = diseased.find((r) => mentions(r, label.name));
    if (!record) continue;

    const used = crop ? Math.min(crop.confidence, label.confidence) : label.confidence;
    return {
      crop: crop?.name ?? record.crop,
      diseaseKey: record.key,
      confidence: discount(used),
      severity: record.typicalSeverity,
      indicators: indicators.map((l) => l.name),
    };
  }

  return {
    crop: crop?.name ?? 'unknown',
    diseaseKey: null,
    confidence: 0,
    severity: 'moderate',
    indicators: indicators.map((l) => l.name),
  };
}

function mentions(record: DiseaseRecord, label: string): boolean {
  const pattern = new RegExp(`\\b${escapeRegExp(label)}\\b`);
  const haystack = [record.displayName, ...record.imageKeywords].join(' | ').toLowerCase();
  return pattern.test(haystack);
}

function discount(labelConfidence: number): number {
  const fraction = Math.min(100, Math.max(0, labelConfidence)) / 100;
  return Math.round(fraction * LABEL_CONFIDENCE_DISCOUNT * 1000) / 1000;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
