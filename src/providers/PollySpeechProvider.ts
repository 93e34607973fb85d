/**
 * Amazon Polly implementation of ISpeechProvider.
 * Polly has no voice for most Indian languages, so each language maps to the
 * Hindi or Indian-English neural voice that reads it best.
 */

import {
  PollyClient,
  SynthesizeSpeechCommand,
  type LanguageCode,
  type VoiceId,
} from '@aws-sdk/client-polly';
import { SynthesisError } from '../errors.js';
import type { ISpeechProvider, SynthesizedAudio } from './ISpeechProvider.js';

export type SpeechSender = Pick<PollyClient, 'send'>;

interface VoiceChoice {
  voiceId: VoiceId;
  languageCode: LanguageCode;
}

const HINDI: VoiceChoice = { voiceId: 'Kajal', languageCode: 'hi-IN' };
const INDIAN_ENGLISH: VoiceChoice = { voiceId: 'Kajal', languageCode: 'en-IN' };

export const VOICES: Record<string, VoiceChoice> = {
  hi: HINDI,
  mr: HINDI,
  gu: HINDI,
  pa: HINDI,
  en: INDIAN_ENGLISH,
  ta: INDIAN_ENGLISH,
  te: INDIAN_ENGLISH,
  kn: INDIAN_ENGLISH,
  bn: INDIAN_ENGLISH,
};

export const MAX_SPEECH_CHARS = 3000;

export function voiceFor(language: string): VoiceChoice {
  return VOICES[language] ?? INDIAN_ENGLISH;
}

/** Cut at the last sentence end before the limit, or hard-cut when there is none. */
export function truncateForSpeech(text: string, max = MAX_SPEECH_CHARS): string {
  if (text.length <= max) return text;
  const head = text.slice(0, max);
  const lastStop = Math.max(head.lastIndexOf('. '), head.lastIndexOf('। '));
  return lastStop > 0 ? head.slice(0, lastStop + 1) : head;
}

export class PollySpeechProvider implements ISpeechProvider {
  private client: SpeechSender;

  constructor(opts?: { region?: string; client?: SpeechSender }) {
    this.client = opts?.client ?? new PollyClient({ region: opts?.region });
  }

  async synthesize(text: string, language: string, signal?: AbortSignal): Promise<SynthesizedAudio> {
    const voice = voiceFor(language);

    let bytes: Uint8Array | undefined;
    try {
      const response = await this.client.send(
        new SynthesizeSpeechCommand({
          Text: truncateForSpeech(text),
          VoiceId: voice.voiceId,
          LanguageCode: voice.languageCode,
          Engine: 'neural',
          OutputFormat: 'mp3',
        }),
        { abortSignal: signal }
      );
      bytes = await response.AudioStream?.transformToByteArray();
    } catch (err) {
      throw new SynthesisError(
        `Speech synthesis failed: ${err instanceof Error ? err.message : String(err)}`,
        { cause: err }
      );
    }

    if (!bytes || bytes.length === 0) {
      throw new SynthesisError('Speech synthesis returned no audio');
    }
    return { bytes, contentType: 'audio/mpeg' };
  }
}
