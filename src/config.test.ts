import { describe, expect, it } from 'vitest';
import { preferredLanguageCode, resolveConfig, silenceDetectorConfiguration, validateConfig } from './config';

describe('resolveConfig', () => {
  it('applies defaults for an empty environment', () => {
    const config = resolveConfig({});

    expect(config.hotkey).toBe('Option+Space');
    expect(config.apiKey).toBeUndefined();
    expect(config.apiBaseUrl).toBe('https://api.openai.com/v1');
    expect(config.model).toBe('gpt-4o-mini-transcribe');
    expect(config.languageMode).toBe('auto');
    expect(config.displayLanguage).toBe('en');
    expect(config.autoPaste).toBe(false);
    expect(config.pasteDelayMs).toBe(80);
    expect(config.minRecordingMs).toBe(200);
    expect(config.retryAttempts).toBe(3);
    expect(validateConfig(config)).toEqual([]);
  });

  it('prefers the app-specific key and trims blanks', () => {
    expect(resolveConfig({ PUSHSCRIBE_API_KEY: ' test-secret ', OPENAI_API_KEY: 'other' }).apiKey).toBe(
      'test-secret'
    );
    expect(resolveConfig({ PUSHSCRIBE_API_KEY: '   ', OPENAI_API_KEY: 'test-secret' }).apiKey).toBe('test-secret');
  });

  it('reads overrides and falls back on unknown values', () => {
    const config = resolveConfig({
      PUSHSCRIBE_MODEL: 'gpt-4o-transcribe',
      PUSHSCRIBE_LANGUAGE: 'zh',
      PUSHSCRIBE_API_BASE_URL: 'http://localhost:8080/v1//',
      PUSHSCRIBE_AUTO_STOP: 'FALSE',
      PUSHSCRIBE_SILENCE_THRESHOLD_DB: '-50.5',
      PUSHSCRIBE_RETRY_ATTEMPTS: 'many',
      PUSHSCRIBE_LOG_LEVEL: 'verbose',
      LANG: 'zh_CN.UTF-8'
    });

    expect(config.model).toBe('gpt-4o-transcribe');
    expect(config.apiBaseUrl).toBe('http://localhost:8080/v1');
    expect(config.autoStopOnSilence).toBe(false);
    expect(config.silenceThresholdDB).toBe(-50.5);
    expect(config.retryAttempts).toBe(3);
    expect(config.logLevel).toBe('info');
    expect(config.displayLanguage).toBe('zh');
    expect(preferredLanguageCode(config)).toBe('zh');
  });

  it('maps auto-stop settings onto the detector configuration', () => {
    const config = resolveConfig({ PUSHSCRIBE_AUTO_STOP_GUARD_MS: '500', PUSHSCRIBE_EMA_ALPHA: '0.5' });

    expect(silenceDetectorConfiguration(config)).toEqual({
      silenceThresholdDB: -45,
      silenceDurationMs: 1000,
      startGuardMs: 500,
      requireSpeechBeforeAutoStop: true,
      speechActivateDB: -32,
      emaAlpha: 0.5
    });
    expect(preferredLanguageCode(config)).toBeUndefined();
  });
});

describe('validateConfig', () => {
  it('lists every problem at once', () => {
    const config = {
      ...resolveConfig({}),
      hotkey: ' ',
      apiBaseUrl: 'ftp://example.test',
      emaAlpha: 0,
      minRecordingMs: 900,
      maxRecordingSeconds: 0
    };

    expect(validateConfig(config)).toEqual([
      'PUSHSCRIBE_HOTKEY must not be empty.',
      'PUSHSCRIBE_API_BASE_URL must be an http(s) URL.',
      'PUSHSCRIBE_EMA_ALPHA must be greater than 0 and at most 1.',
      'PUSHSCRIBE_MAX_RECORDING_SECONDS must be between 1 and 1800 seconds.',
      'Recording limits must satisfy: MIN_RECORDING_MS < MAX_RECORDING_SECONDS. Check PUSHSCRIBE_*_RECORDING_* values.'
    ]);
  });

  it('rejects out-of-range decibel thresholds', () => {
    const config = { ...resolveConfig({}), silenceThresholdDB: 3, speechActivateDB: -130 };

    expect(validateConfig(config)).toEqual([
      'PUSHSCRIBE_SILENCE_THRESHOLD_DB must be between -120 and 0 dB.',
      'PUSHSCRIBE_SPEECH_ACTIVATE_DB must be between -120 and 0 dB.'
    ]);
  });
});
