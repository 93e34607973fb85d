import { describe, it, expect } from 'vitest';
import { ConfigError, loadConfig, maxBodyBytes } from '../src/config.js';

function issuesOf(env: Record<string, string>): string[] {
  try {
    loadConfig(env);
  } catch (err) {
    if (err instanceof ConfigError) return err.issues;
    throw err;
  }
  return [];
}

describe('loadConfig', () => {
  it('should apply defaults to an empty environment', () => {
    const config = loadConfig({});
    expect(config.PORT).toBe(8000);
    expect(config.DEFAULT_LANGUAGE).toBe('en');
    expect(config.SUPPORTED_LANGUAGES).toEqual(['en', 'hi', 'ta', 'te', 'kn', 'mr', 'bn', 'gu', 'pa']);
    expect(config.MAX_IMAGE_BYTES).toBe(10 * 1024 * 1024);
    expect(config.PRIMARY_MIN_CONFIDENCE).toBe(0.5);
    expect(config.DEMO_FALLBACK_ENABLED).toBe(true);
    expect(config.VOICE_REPLIES).toBe(false);
    expect(config.OPENAI_API_KEY).toBeUndefined();
    expect(config.SUPABASE_URL).toBeUndefined();
  });

  it('should coerce numbers and boolean flags', () => {
    const config = loadConfig({
      PORT: '9000',
      PRIMARY_TIMEOUT_MS: '2500',
      VOICE_REPLIES: 'Yes',
      DEMO_FALLBACK_ENABLED: '0',
    });
    expect(config.PORT).toBe(9000);
    expect(config.PRIMARY_TIMEOUT_MS).toBe(2500);
    expect(config.VOICE_REPLIES).toBe(true);
    expect(config.DEMO_FALLBACK_ENABLED).toBe(false);
  });

  it('should default and override collaborator deadlines', () => {
    const defaults = loadConfig({});
    expect([
      defaults.TRANSLATE_TIMEOUT_MS,
      defaults.SPEECH_TIMEOUT_MS,
      defaults.STORAGE_TIMEOUT_MS,
      defaults.STORE_TIMEOUT_MS,
    ]).toEqual([5_000, 8_000, 5_000, 5_000]);

    expect(loadConfig({ STORE_TIMEOUT_MS: '750' }).STORE_TIMEOUT_MS).toBe(750);
    expect(issuesOf({ SPEECH_TIMEOUT_MS: '0' })).toHaveLength(1);
  });

  it('should normalize the language list', () => {
    const config = loadConfig({ SUPPORTED_LANGUAGES: ' EN, hi ,,ta', DEFAULT_LANGUAGE: 'hi' });
    expect(config.SUPPORTED_LANGUAGES).toEqual(['en', 'hi', 'ta']);
    expect(config.DEFAULT_LANGUAGE).toBe('hi');
  });

  it('should treat blank optional strings as unset', () => {
    expect(loadConfig({ OPENAI_API_KEY: '  ' }).OPENAI_API_KEY).toBeUndefined();
  });

  it('should reject an unparseable flag', () => {
    expect(issuesOf({ VOICE_REPLIES: 'maybe' })).toEqual(['VOICE_REPLIES: expected a boolean, got "maybe"']);
  });

  it('should reject a default language outside the supported list', () => {
    expect(issuesOf({ SUPPORTED_LANGUAGES: 'en,hi', DEFAULT_LANGUAGE: 'ta' })).toContain(
      'DEFAULT_LANGUAGE: DEFAULT_LANGUAGE must be one of SUPPORTED_LANGUAGES'
    );
  });

  it('should reject an inverted demo confidence range', () => {
    expect(issuesOf({ DEMO_CONFIDENCE_MIN: '0.95' })).toContain(
      'DEMO_CONFIDENCE_MIN: DEMO_CONFIDENCE_MIN must not exceed DEMO_CONFIDENCE_MAX'
    );
  });

  it('should require both Supabase settings together', () => {
    expect(issuesOf({ SUPABASE_URL: 'https://example.supabase.co' })).toContain(
      'SUPABASE_URL: SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY must be set together'
    );
    expect(
      loadConfig({ SUPABASE_URL: 'https://example.supabase.co', SUPABASE_SERVICE_ROLE_KEY: 'test-key' }).SUPABASE_URL
    ).toBe('https://example.supabase.co');
  });

  it('should list every invalid variable in the error message', () => {
    expect(() => loadConfig({ PORT: '0' })).toThrow(/^Invalid configuration:\n {2}PORT: /);
  });
});

describe('maxBodyBytes', () => {
  it('should leave room for base64 expansion and form overhead', () => {
    expect(maxBodyBytes({ MAX_IMAGE_BYTES: 3 })).toBe(4 + 65536);
  });
});
