/**
 * Text-to-speech provider interface.
 */

export interface SynthesizedAudio {
  bytes: Uint8Array;
  contentType: string;
}

export interface ISpeechProvider {
  /** Rejects with SynthesisError. An aborted `signal` cancels the request. */
  synthesize(text: string, language: string, signal?: AbortSignal): Promise<SynthesizedAudio>;
}
