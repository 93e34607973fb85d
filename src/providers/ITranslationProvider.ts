/**
 * Machine translation provider interface.
 */

export interface ITranslationProvider {
  /**
   * Translate English `text` into `targetLanguage` (ISO 639-1).
   * Rejects with TranslationError. An aborted `signal` cancels the request.
   */
  translate(text: string, targetLanguage: string, signal?: AbortSignal): Promise<string>;
}
