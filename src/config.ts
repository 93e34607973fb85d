/**
 * Runtime configuration, parsed from environment variables.
 * Invalid values fail startup with one line per offending variable.
 */

import { z } from 'zod';

const DEFAULT_MAX_IMAGE_BYTES = 10 * 1024 * 1024;

/** "true"/"1"/"yes" and "false"/"0"/"no", case-insensitive. */
const booleanFlag = (fallback: boolean) =>
  z
    .string()
    .trim()
    .toLowerCase()
    .optional()
    .transform((v, ctx) => {
      if (v === undefined || v === '') return fallback;
      if (['true', '1', 'yes'].includes(v)) return true;
      if (['false', '0', 'no'].includes(v)) return false;
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `expected a boolean, got "${v}"` });
      return z.NEVER;
    });

const optionalString = z
  .string()
  .trim()
  .optional()
  .transform((v) => (v ? v : undefined));

const languageCode = z.string().regex(/^[a-z]{2}$/, 'expected a two-letter language code');

const fraction = z.coerce.number().min(0).max(1);

export const configSchema = z
  .object({
    PORT: z.coerce.number().int().min(1).max(65535).default(8000),
    LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
    LOG_FORMAT: z.enum(['text', 'json']).default('text'),

    DEFAULT_LANGUAGE: languageCode.default('en'),
    SUPPORTED_LANGUAGES: z
      .string()
      .default('en,hi,ta,te,kn,mr,bn,gu,pa')
      .transform((v) => v.split(',').map((s) => s.trim().toLowerCase()).filter(Boolean))
      .pipe(z.array(languageCode).min(1)),

    MAX_IMAGE_BYTES: z.coerce.number().int().positive().default(DEFAULT_MAX_IMAGE_BYTES),
    PRIMARY_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
    SECONDARY_TIMEOUT_MS: z.coerce.number().int().positive().default(8_000),
    TRANSLATE_TIMEOUT_MS: z.coerce.number().int().positive().default(5_000),
    SPEECH_TIMEOUT_MS: z.coerce.number().int().positive().default(8_000),
    STORAGE_TIMEOUT_MS: z.coerce.number().int().positive().default(5_000),
    STORE_TIMEOUT_MS: z.coerce.number().int().positive().default(5_000),
    PRIMARY_MIN_CONFIDENCE: fraction.default(0.5),
    DEMO_FALLBACK_ENABLED: booleanFlag(true),
    DEMO_CONFIDENCE_MIN: fraction.default(0.6),
    DEMO_CONFIDENCE_MAX: fraction.default(0.9),
    VOICE_REPLIES: booleanFlag(false),
    AUDIO_URL_TTL_SECONDS: z.coerce.number().int().positive().default(3600),

    OPENAI_API_KEY: optionalString,
    OPENAI_VISION_MODEL: z.string().default('gpt-4o-mini'),

    AWS_REGION: z.string().default('ap-south-1'),
    REKOGNITION_ENABLED: booleanFlag(false),
    TRANSLATE_ENABLED: booleanFlag(false),
    POLLY_ENABLED: booleanFlag(false),

    SUPABASE_URL: optionalString.pipe(z.string().url().optional()),
    SUPABASE_SERVICE_ROLE_KEY: optionalString,
    STORAGE_BUCKET: z.string().default('scans'),

    CLOUDWATCH_LOG_GROUP: optionalString,
    METRICS_NAMESPACE: optionalString,
  })
  .refine((c) => c.DEMO_CONFIDENCE_MIN <= c.DEMO_CONFIDENCE_MAX, {
    message: 'DEMO_CONFIDENCE_MIN must not exceed DEMO_CONFIDENCE_MAX',
    path: ['DEMO_CONFIDENCE_MIN'],
  })
  .refine((c) => c.SUPPORTED_LANGUAGES.includes(c.DEFAULT_LANGUAGE), {
    message: 'DEFAULT_LANGUAGE must be one of SUPPORTED_LANGUAGES',
    path: ['DEFAULT_LANGUAGE'],
  })
  .refine((c) => Boolean(c.SUPABASE_URL) === Boolean(c.SUPABASE_SERVICE_ROLE_KEY), {
    message: 'SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY must be set together',
    path: ['SUPABASE_URL'],
  });

export type Config = z.infer<typeof configSchema>;

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration:\n  ${issues.join('\n  ')}`);
    this.name = 'ConfigError';
  }
}

export function loadConfig(env: Record<string, string | undefined> = process.env): Config {
  const parsed = configSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
    );
  }
  return parsed.data;
}

/** Largest request body that can carry a MAX_IMAGE_BYTES image as base64 JSON or multipart. */
export function maxBodyBytes(config: Pick<Config, 'MAX_IMAGE_BYTES'>): number {
  return Math.ceil((config.MAX_IMAGE_BYTES * 4) / 3) + 64 * 1024;
}
