/**
 * Primary analyzer: OpenAI multimodal chat model.
 * Sends the photo with a structured prompt constrained to the catalog's
 * disease keys and parses the JSON answer.
 */

import OpenAI from 'openai';
import { AnalyzerError } from '../errors.js';
import type { DiseaseCatalog } from '../catalog/DiseaseCatalog.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { AnalysisResult, ImageInput } from '../types/models.js';
import type { IAnalyzer } from './IAnalyzer.js';
import { parseVisionResponse, VisionParseError } from './parse-vision-response.js';

const DEFAULT_MODEL = 'gpt-4o-mini';
const MAX_TOKENS = 800;

export class OpenAIVisionAnalyzer implements IAnalyzer {
  readonly engine = 'primary_vision' as const;

  private client: OpenAI;
  private model: string;
  private prompt: string;

  constructor(
    catalog: DiseaseCatalog,
    private readonly logProvider: ILogProvider,
    opts?: {
      apiKey?: string;
      model?: string;
    }
  ) {
    this.client = new OpenAI({
      apiKey: opts?.apiKey ?? process.env.OPENAI_API_KEY,
      // The orchestrator owns the timeout; a retry here would blow the stage budget.
      maxRetries: 0,
    });
    this.model = opts?.model ?? DEFAULT_MODEL;
    this.prompt = buildDiagnosisPrompt(catalog);
  }

  async infer(image: ImageInput, signal: AbortSignal): Promise<AnalysisResult> {
    const dataUrl = `data:${image.mediaType};base64,${Buffer.from(image.bytes).toString('base64')}`;

    let content: string | null | undefined;
    try {
      const response = await this.client.chat.completions.create(
        {
          model: this.model,
          max_tokens: MAX_TOKENS,
          temperature: 0.1,
          response_format: { type: 'json_object' },
          messages: [
            {
              role: 'user',
              content: [
                { type: 'text', text: this.prompt },
                { type: 'image_url', image_url: { url: dataUrl, detail: 'high' } },
              ],
            },
          ],
        },
        { signal }
      );
      content = response.choices[0]?.message?.content;
    } catch (err) {
      throw new AnalyzerError(this.engine, `Vision request failed: ${describe(err)}`, { cause: err });
    }

    if (!content) {
      throw new AnalyzerError(this.engine, 'Vision model returned an empty reply');
    }

    try {
      const { result, warnings } = parseVisionResponse(content);
      for (const warning of warnings) {
        this.logProvider.warn('Vision reply normalized', { warning, model: this.model });
      }
      return { ...result, sourceEngine: this.engine };
    } catch (err) {
      if (err instanceof VisionParseError) {
        throw new AnalyzerError(this.engine, err.message, { cause: err });
      }
      throw err;
    }
  }
}

function describe(err: unknown): string {
  if (err instanceof OpenAI.APIError) {
    return `${err.status ?? 'no status'} ${err.message}`;
  }
  return err instanceof Error ? err.message : String(err);
}

export function buildDiagnosisPrompt(catalog: DiseaseCatalog): string {
  const keys = catalog.keys().join(', ');
  const crops = catalog.crops().map((c) => c.name).join(', ');

  return `You are an agricultural plant pathologist diagnosing crop diseases common on Indian farms.

Analyze the photo in four steps:
1. Identify the crop from leaf shape, colour, stem structure and any fruit or flower. Known crops: ${crops}.
2. Decide whether the plant is healthy or diseased and list the symptoms you can actually see.
3. Pick the most likely disease. Use exactly one of these keys: ${keys}.
   If none of them fits, use "unknown_disease".
4. Rate severity: "none" (healthy), "mild" (<20% of leaf area), "moderate" (20-50%), "severe" (>50%).

Respond with a single JSON object and nothing else:
{
  "crop": "crop name, lowercase",
  "is_healthy": false,
  "disease_key": "one of the keys above",
  "confidence": 0.87,
  "severity": "none | mild | moderate | severe",
  "symptoms_observed": ["symptom visible in the photo"],
  "additional_notes": "anything else worth telling the farmer"
}

"confidence" is a number between 0 and 1.`;
}
