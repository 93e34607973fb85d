/**
 * Batched translation of a scan's human-readable text.
 *
 * Every translatable string is visited in a fixed order by `mapTexts`, so
 * collecting and re-applying translations is the same walk with a different
 * callback. Keys, confidence and severity are never visited.
 */

import { TranslationError } from '../errors.js';
import { MAX_TRANSLATE_CHARS } from '../providers/AwsTranslateProvider.js';
import type { ITranslationProvider } from '../providers/ITranslationProvider.js';
import type { DiseaseDetails } from '../types/models.js';

export interface LocalizableText {
  diseaseName: string;
  disease: DiseaseDetails | null;
  observedSymptoms: string[];
}

export interface MapTextsOptions {
  /** Already in the target language (taken from the catalog). */
  skipName?: boolean;
  skipDescription?: boolean;
}

export function mapTexts(
  input: LocalizableText,
  fn: (text: string) => string,
  opts: MapTextsOptions = {}
): LocalizableText {
  const keep = (text: string) => text;
  const name = opts.skipName ? keep : fn;
  const description = opts.skipDescription ? keep : fn;

  const diseaseName = name(input.diseaseName);
  const d = input.disease;
  const disease: DiseaseDetails | null = d && {
    ...d,
    description: description(d.description),
    symptoms: d.symptoms.map(fn),
    treatments: d.treatments.map((t) => ({
      ...t,
      dosage: fn(t.dosage),
      applicationMethod: fn(t.applicationMethod),
      frequency: fn(t.frequency),
    })),
    organicTreatments: d.organicTreatments.map(fn),
    preventionTips: d.preventionTips.map(fn),
    favorableConditions: fn(d.favorableConditions),
  };

  return { diseaseName, disease, observedSymptoms: input.observedSymptoms.map(fn) };
}

export async function localizeTexts(
  input: LocalizableText,
  translator: ITranslationProvider,
  targetLanguage: string,
  opts: MapTextsOptions = {},
  signal?: AbortSignal
): Promise<LocalizableText> {
  const texts: string[] = [];
  mapTexts(
    input,
    (t) => {
      texts.push(t);
      return t;
    },
    opts
  );

  const translated = await translateBatch(translator, texts, targetLanguage, signal);
  let i = 0;
  return mapTexts(input, () => translated[i++], opts);
}

/**
 * Translate many strings with as few calls as possible: newline-joined
 * chunks of at most MAX_TRANSLATE_CHARS, split back by line.
 * Empty strings are passed through untouched.
 */
export async function translateBatch(
  translator: ITranslationProvider,
  texts: string[],
  targetLanguage: string,
  signal?: AbortSignal
): Promise<string[]> {
  const out = [...texts];
  const pending = texts
    .map((text, index) => ({ index, line: text.replace(/\s*[\r\n]+\s*/g, ' ').trim() }))
    .filter((p) => p.line.length > 0);

  for (const chunk of chunkByLength(pending, MAX_TRANSLATE_CHARS)) {
    const joined = chunk.map((p) => p.line).join('\n');
    const lines = (await translator.translate(joined, targetLanguage, signal)).split('\n');
    if (lines.length !== chunk.length) {
      throw new TranslationError(
        `Translation returned ${lines.length} lines for ${chunk.length} texts`
      );
    }
    chunk.forEach((p, k) => {
      out[p.index] = lines[k].trim();
    });
  }

  return out;
}

function chunkByLength<T extends { line: string }>(items: T[], maxChars: number): T[][] {
  const chunks: T[][] = [];
  let current: T[] = [];
  let size = 0;

  for (const item of items) {
    const added = item.line.length + (current.length > 0 ? 1 : 0);
    if (current.length > 0 && size + added > maxChars) {
      chunks.push(current);
      current = [];
      size = 0;
    }
    current.push(item);
    size += item.line.length + (current.length > 1 ? 1 : 0);
  }
  if (current.length > 0) chunks.push(current);
  return chunks;
}
