/**
 * Normalization of the vision model's free-form answer into an AnalysisResult.
 * Models wrap JSON in markdown fences or prose and may report confidence as a
 * percentage or an unknown severity. Nothing un-normalized leaves this module.
 */

import { z } from 'zod';
import type { AnalysisResult, Severity } from '../types/models.js';
import { SEVERITIES } from '../types/models.js';

const UNKNOWN_KEYS = new Set(['', 'unknown', 'unknown_disease', 'none', 'n/a']);

const visionPayloadSchema = z.object({
  crop: z.string().trim().toLowerCase().catch('unknown'),
  disease_key: z.unknown().optional(),
  is_healthy: z.boolean().optional(),
  confidence: z.union([z.number(), z.string().regex(/^\s*\d+(\.\d+)?\s*%?\s*$/)]),
  severity: z.unknown().optional(),
  symptoms_observed: z.array(z.unknown()).catch([]),
  additional_notes: z.string().optional().catch(undefined),
});

export type VisionPayload = z.infer<typeof visionPayloadSchema>;

export interface ParsedVision {
  result: Omit<AnalysisResult, 'sourceEngine'>;
  warnings: string[];
}

/** Thrown when the reply cannot be turned into a result at all. */
export class VisionParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'VisionParseError';
  }
}

export function parseVisionResponse(text: string): ParsedVision {
  const json = extractJson(text);
  if (json === null) {
    throw new VisionParseError('No JSON object found in model reply');
  }

  const parsed = visionPayloadSchema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new VisionParseError(`Model reply does not match the expected shape: ${issues}`);
  }

  const payload = parsed.data;
  const warnings: string[] = [];

  const severity = normalizeSeverity(payload.severity);
  if (severity.warning) warnings.push(severity.warning);

  const confidence = normalizeConfidence(payload.confidence);
  if (confidence.warning) warnings.push(confidence.warning);

  let diseaseKey = normalizeDiseaseKey(payload.disease_key);
  if (payload.is_healthy === true && diseaseKey === null) {
    diseaseKey = 'healthy';
  }

  return {
    result: {
      crop: payload.crop || 'unknown',
      diseaseKey,
      confidence: confidence.value,
      severity: severity.value,
      observedSymptoms: payload.symptoms_observed
        .filter((s): s is string => typeof s === 'string')
        .map((s) => s.trim())
        .filter((s) => s.length > 0),
      ...(payload.additional_notes && { notes: payload.additional_notes }),
    },
    warnings,
  };
}

/**
 * Pull the first JSON object out of a model reply.
 * Handles bare JSON, ```json fences and objects embedded in prose.
 */
export function extractJson(text: string): unknown {
  let body = text.trim();
  if (body.startsWith('```')) {
    body = body.replace(/^```(?:json)?\s*/i, '').replace(/\s*```$/, '');
  }

  const direct = tryParse(body);
  if (direct !== undefined) return direct;

  // Balanced-brace scan; braces inside strings are tracked so they don't count.
  let depth = 0;
  let start = -1;
  let inString = false;
  let escaped = false;

  for (let i = 0; i < body.length; i++) {
    const ch = body[i];

    if (inString) {
      if (escaped) escaped = false;
      else if (ch === '\\') escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }

    if (ch === '"') {
      inString = depth > 0;
    } else if (ch === '{') {
      if (depth === 0) start = i;
      depth++;
    } else if (ch === '}' && depth > 0) {
      depth--;
      if (depth === 0 && start >= 0) {
        const candidate = tryParse(body.slice(start, i + 1));
        if (candidate !== undefined) return candidate;
        start = -1;
      }
    }
  }

  return null;
}

function tryParse(text: string): unknown {
  try {
    const value: unknown = JSON.parse(text);
    return value !== null && typeof value === 'object' && !Array.isArray(value) ? value : undefined;
  } catch {
    return undefined;
  }
}

export function normalizeSeverity(raw: unknown): { value: Severity; warning?: string } {
  if (typeof raw === 'string') {
    const lowered = raw.trim().toLowerCase();
    const match = SEVERITIES.find((s) => s === lowered);
    if (match) return { value: match };
  }
  return {
    value: 'moderate',
    warning: `Unrecognized severity ${JSON.stringify(raw ?? null)}; using "moderate"`,
  };
}

export function normalizeConfidence(raw: number | string): { value: number; warning?: string } {
  const numeric = typeof raw === 'number' ? raw : Number.parseFloat(raw);
  if (!Number.isFinite(numeric)) {
    return { value: 0, warning: `Non-numeric confidence ${JSON.stringify(raw)}; using 0` };
  }

  // Models asked for [0, 1] still answer 87 for 87%.
  const scaled = numeric > 1 && numeric <= 100 ? numeric / 100 : numeric;
  if (scaled < 0 || scaled > 1) {
    const clamped = Math.min(1, Math.max(0, scaled));
    return { value: clamped, warning: `Confidence ${numeric} out of range; clamped to ${clamped}` };
  }
  return { value: scaled };
}

export function normalizeDiseaseKey(raw: unknown): string | null {
  if (typeof raw !== 'string') return null;
  const key = raw.trim().toLowerCase();
  return UNKNOWN_KEYS.has(key) ? null : key;
}
