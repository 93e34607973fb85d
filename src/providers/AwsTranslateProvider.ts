/**
 * Amazon Translate implementation of ITranslationProvider.
 */

import { TranslateClient, TranslateTextCommand } from '@aws-sdk/client-translate';
import { TranslationError } from '../errors.js';
import type { ITranslationProvider } from './ITranslationProvider.js';

export type TranslateSender = Pick<TranslateClient, 'send'>;

/** TranslateText rejects longer inputs. */
export const MAX_TRANSLATE_CHARS = 5000;

export class AwsTranslateProvider implements ITranslationProvider {
  private client: TranslateSender;
  private sourceLanguage: string;

  constructor(opts?: { region?: string; sourceLanguage?: string; client?: TranslateSender }) {
    this.client = opts?.client ?? new TranslateClient({ region: opts?.region });
    this.sourceLanguage = opts?.sourceLanguage ?? 'en';
  }

  async translate(text: string, targetLanguage: string, signal?: AbortSignal): Promise<string> {
    if (targetLanguage === this.sourceLanguage || text.trim() === '') return text;

    try {
      const response = await this.client.send(
        new TranslateTextCommand({
          Text: text.slice(0, MAX_TRANSLATE_CHARS),
          SourceLanguageCode: this.sourceLanguage,
          TargetLanguageCode: targetLanguage,
        }),
        { abortSignal: signal }
      );
      if (response.TranslatedText === undefined) {
        throw new TranslationError('Translate returned no text');
      }
      return response.TranslatedText;
    } catch (err) {
      if (err instanceof TranslationError) throw err;
      throw new TranslationError(
        `Translation to ${targetLanguage} failed: ${err instanceof Error ? err.message : String(err)}`,
        { cause: err }
      );
    }
  }
}
