/**
 * Static disease catalog.
 * Loaded once at startup from data/diseases.json and frozen; lookups do no I/O.
 * A malformed file or a duplicate key is fatal at startup.
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { dataFile } from '../data-path.js';
import { CatalogError } from '../errors.js';
import type { CropRecord, DiseaseRecord } from '../types/models.js';

const treatmentSchema = z.object({
  productName: z.string().min(1),
  dosage: z.string(),
  applicationMethod: z.string(),
  frequency: z.string(),
  approximateCostPerAcre: z.number().nonnegative(),
});

const diseaseSchema = z.object({
  key: z.string().regex(/^[a-z0-9_]+$/, 'key must be lower_snake_case'),
  crop: z.string().min(1),
  displayName: z.string().min(1),
  localizedName: z.string(),
  localizedLanguage: z.string().min(2),
  scientificName: z.string(),
  category: z.string(),
  typicalSeverity: z.enum(['none', 'mild', 'moderate', 'severe']),
  description: z.string(),
  localizedDescription: z.string(),
  symptoms: z.array(z.string()),
  treatments: z.array(treatmentSchema),
  organicTreatments: z.array(z.string()),
  preventionTips: z.array(z.string()),
  favorableConditions: z.string(),
  imageKeywords: z.array(z.string()),
});

const cropSchema = z.object({
  name: z.string().min(1),
  localizedName: z.string(),
  keywords: z.array(z.string().min(1)).min(1),
});

const catalogFileSchema = z.object({
  version: z.literal(1),
  crops: z.array(cropSchema),
  diseases: z.array(diseaseSchema).min(1),
});

export class DiseaseCatalog {
  private readonly byKey = new Map<string, DiseaseRecord>();
  private readonly records: readonly DiseaseRecord[];
  private readonly cropList: readonly CropRecord[];

  constructor(records: DiseaseRecord[], crops: CropRecord[] = []) {
    for (const record of records) {
      if (this.byKey.has(record.key)) {
        throw new CatalogError(`Duplicate disease key in catalog: "${record.key}"`);
      }
      this.byKey.set(record.key, deepFreeze(structuredClone(record)));
    }

    this.records = Object.freeze([...this.byKey.values()]);
    this.cropList = Object.freeze(
      crops.map((c) => deepFreeze({ ...c, keywords: c.keywords.map((k) => k.toLowerCase()) }))
    );
  }

  /** Parse and validate a catalog document. */
  static fromJson(raw: unknown): DiseaseCatalog {
    const parsed = catalogFileSchema.safeParse(raw);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((i) => `${i.path.join('.')}: ${i.message}`)
        .join('; ');
      throw new CatalogError(`Invalid disease catalog: ${issues}`);
    }
    return new DiseaseCatalog(parsed.data.diseases, parsed.data.crops);
  }

  static load(path: string = dataFile('diseases.json')): DiseaseCatalog {
    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(path, 'utf8'));
    } catch (err) {
      throw new CatalogError(
        `Cannot read disease catalog at ${path}: ${err instanceof Error ? err.message : String(err)}`
      );
    }
    return DiseaseCatalog.fromJson(raw);
  }

  lookup(key: string): DiseaseRecord | null {
    return this.byKey.get(key) ?? null;
  }

  all(): readonly DiseaseRecord[] {
    return this.records;
  }

  /** Records describing an actual disease (excludes the healthy-plant entry). */
  diseases(): DiseaseRecord[] {
    return this.records.filter((r) => r.typicalSeverity !== 'none');
  }

  crops(): readonly CropRecord[] {
    return this.cropList;
  }

  forCrop(crop: string): DiseaseRecord[] {
    const needle = crop.toLowerCase();
    return this.records.filter((r) => r.crop === needle);
  }

  keys(): string[] {
    return [...this.byKey.keys()];
  }

  get size(): number {
    return this.byKey.size;
  }
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === 'object') {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}
