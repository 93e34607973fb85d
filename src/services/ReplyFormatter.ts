/**
 * Chat-style text replies and speech scripts for a completed scan.
 * Section labels come from data/reply-labels.json; a language without its
 * own label falls back to the English one.
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { dataFile } from '../data-path.js';
import type { ScanRecord, Severity } from '../types/models.js';

const labelSetSchema = z.object({
  header: z.string(),
  disease: z.string(),
  severity: z.string(),
  confidence: z.string(),
  description: z.string(),
  treatment: z.string(),
  dosage: z.string(),
  method: z.string(),
  cost: z.string(),
  perAcre: z.string(),
  organic: z.string(),
  prevention: z.string(),
  footer: z.string(),
  demoNotice: z.string(),
  lowFidelityNotice: z.string(),
  unknownDisease: z.string(),
});

const labelFileSchema = z
  .object({ en: labelSetSchema })
  .catchall(labelSetSchema.partial());

export type ReplyLabels = z.infer<typeof labelSetSchema>;

export const SEVERITY_MARKERS: Record<Severity, string> = {
  none: '🟢',
  mild: '🟡',
  moderate: '🟠',
  severe: '🔴',
};

const MAX_TREATMENTS = 2;
const MAX_ORGANIC = 2;
const MAX_PREVENTION = 3;

export class ReplyFormatter {
  private readonly byLanguage: Map<string, ReplyLabels>;

  constructor(raw: unknown) {
    const parsed = labelFileSchema.safeParse(raw);
    if (!parsed.success) {
      throw new Error(`Invalid reply labels: ${parsed.error.issues[0]?.message ?? 'unknown'}`);
    }
    const { en, ...others } = parsed.data;
    this.byLanguage = new Map([['en', en]]);
    for (const [lang, partial] of Object.entries(others)) {
      this.byLanguage.set(lang, { ...en, ...partial });
    }
  }

  static load(path = dataFile('reply-labels.json')): ReplyFormatter {
    return new ReplyFormatter(JSON.parse(readFileSync(path, 'utf8')));
  }

  labels(language: string): ReplyLabels {
    return this.byLanguage.get(language) ?? this.english();
  }

  formatReply(scan: ScanRecord): string {
    const L = this.labels(scan.language);
    const r = scan.result;
    const { severity, confidence } = r.analysis;
    const lines: string[] = [L.header, ''];

    if (r.nonAuthoritative) {
      lines.push(L.demoNotice, '');
    } else if (r.lowFidelity) {
      lines.push(L.lowFidelityNotice, '');
    }

    lines.push(`${L.disease} ${r.diseaseName}`);
    if (r.disease && r.disease.localizedName && r.disease.localizedName !== r.diseaseName) {
      lines.push(`   _${r.disease.localizedName}_`);
    }
    lines.push(
      '',
      `${SEVERITY_MARKERS[severity]} ${L.severity} ${severity.toUpperCase()}`,
      `${L.confidence} ${Math.round(confidence * 100)}%`
    );

    const d = r.disease;
    if (d) {
      lines.push('', L.description, d.description);

      const treatments = d.treatments.slice(0, MAX_TREATMENTS);
      if (treatments.length > 0) {
        lines.push('', L.treatment);
        treatments.forEach((t, i) => {
          lines.push(
            `${i + 1}. *${t.productName}*`,
            `   └ ${L.dosage}: ${t.dosage}`,
            `   └ ${L.method}: ${t.applicationMethod}`,
            `   └ ${L.cost}: ₹${t.approximateCostPerAcre}${L.perAcre}`
          );
        });
      }

      const organic = d.organicTreatments.slice(0, MAX_ORGANIC);
      if (organic.length > 0) {
        lines.push('', L.organic, ...organic.map((o) => `• ${o}`));
      }

      const prevention = d.preventionTips.slice(0, MAX_PREVENTION);
      if (prevention.length > 0) {
        lines.push('', L.prevention, ...prevention.map((p) => `• ${p}`));
      }
    }

    lines.push('', L.footer);
    return lines.join('\n');
  }

  /** Plain sentences for speech synthesis: no markup, no emoji. */
  speechText(scan: ScanRecord): string {
    const L = this.labels(scan.language);
    const r = scan.result;
    const parts: string[] = [];

    if (r.nonAuthoritative) parts.push(plain(L.demoNotice));
    parts.push(`${plain(L.disease)} ${r.diseaseName}.`);
    parts.push(`${plain(L.severity)} ${r.analysis.severity}.`);

    const d = r.disease;
    if (d) {
      if (d.description) parts.push(d.description);
      const first = d.treatments[0];
      if (first) parts.push(`${plain(L.treatment)} ${first.productName}, ${first.dosage}.`);
    }

    return parts.join(' ');
  }

  private english(): ReplyLabels {
    const en = this.byLanguage.get('en');
    if (!en) throw new Error('Reply labels have no English set');
    return en;
  }
}

/** "🔍 *Disease:*" → "Disease:" */
export function plain(label: string): string {
  return label.replace(/\*/g, '').replace(/^[^\p{L}\p{N}]+/u, '').trim();
}
