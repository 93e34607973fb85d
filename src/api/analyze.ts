/**
 * Diagnosis endpoints.
 * POST /api/v1/analyze         — multipart upload: image, language, requesterId, voice
 * POST /api/v1/analyze/base64  — JSON: { imageBase64, language?, requesterId?, voice? }
 */

import { annotate, pipeline, errorHandler } from '../middleware/index.js';
import { validateBody } from '../middleware/validate-body.js';
import type { Handler, HandlerContext } from '../middleware/pipeline.js';
import type { Container } from '../container.js';
import { InvalidInputError, ValidationError } from '../errors.js';
import type { AnalysisOutcome } from '../services/AnalysisService.js';
import { decodeBase64Image, toImageInput } from '../services/image-input.js';
import { toScanResponse } from '../services/scan-response.js';
import type { AnalyzeResponse } from '../types/api.js';
import type { BodySchema } from '../types/common.js';

const MAX_REQUESTER_ID = 128;
const MAX_LANGUAGE = 10;

const base64Schema: BodySchema = {
  imageBase64: { type: 'string', required: true, minLength: 1 },
  language: { type: 'string', required: false, maxLength: MAX_LANGUAGE },
  requesterId: { type: 'string', required: false, maxLength: MAX_REQUESTER_ID },
  voice: { type: 'boolean', required: false },
};

export function createAnalyzeHandlers(container: Container) {
  const { maxImageBytes } = container.limits;

  const upload: Handler = pipeline(
    container.logging,
    errorHandler,
    container.bodyLimit
  )(async (req, ctx) => {
    let form: FormData;
    try {
      form = await req.formData();
    } catch {
      throw new ValidationError('Request body must be multipart/form-data with an "image" file');
    }

    const file = form.get('image');
    if (file === null || typeof file === 'string') {
      throw new InvalidInputError('No image file was attached.');
    }

    const requesterId = optionalField(form, 'requesterId', MAX_REQUESTER_ID);
    const language = optionalField(form, 'language', MAX_LANGUAGE);
    const image = toImageInput(new Uint8Array(await file.arrayBuffer()), maxImageBytes);

    const outcome = await container.analysisService.analyze({
      image,
      language,
      requesterId,
      voice: parseFlag(form.get('voice')),
    });
    return analyzed(container, outcome, ctx);
  });

  const base64: Handler = pipeline(
    container.logging,
    errorHandler,
    container.bodyLimit,
    validateBody(base64Schema)
  )(async (req, ctx) => {
    const body: unknown = await req.json();
    if (typeof body !== 'object' || body === null) {
      throw new ValidationError('Request body must be a JSON object');
    }
    const fields = new Map(Object.entries(body));
    const text = (key: string) => {
      const value = fields.get(key);
      return typeof value === 'string' ? value : undefined;
    };

    const image = decodeBase64Image(text('imageBase64') ?? '', maxImageBytes);
    const outcome = await container.analysisService.analyze({
      image,
      language: text('language'),
      requesterId: text('requesterId'),
      voice: fields.get('voice') === true,
    });
    return analyzed(container, outcome, ctx);
  });

  return { upload, base64 };
}

function analyzed(container: Container, outcome: AnalysisOutcome, ctx: HandlerContext): Response {
  const { scan } = outcome;
  annotate(ctx, {
    scanId: scan.scanId,
    engine: scan.result.analysis.sourceEngine,
    diseaseKey: scan.result.analysis.diseaseKey,
    persisted: outcome.persisted,
  });

  const body: AnalyzeResponse = {
    ...toScanResponse(outcome.scan, outcome.audioUrl),
    reply: container.formatter.formatReply(outcome.scan),
    persisted: outcome.persisted,
    warnings: outcome.warnings,
  };

  return new Response(JSON.stringify(body), {
    status: 200,
    headers: { 'Content-Type': 'application/json' },
  });
}

function optionalField(form: FormData, name: string, maxLength: number): string | undefined {
  const value = form.get(name);
  if (value === null) return undefined;
  if (typeof value !== 'string') {
    throw new ValidationError(`${name} must be a text field`, { field: name });
  }
  if (value.length > maxLength) {
    throw new ValidationError(`${name} must be ${maxLength} characters or less`, { field: name });
  }
  return value;
}

function parseFlag(value: ReturnType<FormData['get']>): boolean {
  return typeof value === 'string' && ['true', '1', 'yes', 'on'].includes(value.trim().toLowerCase());
}
