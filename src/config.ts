import os from 'node:os';
import path from 'node:path';
import { DEFAULT_SILENCE_DETECTOR } from './core/SilenceAutoStopDetector';
import type {
  AppConfig,
  DisplayLanguage,
  LanguageMode,
  LogLevel,
  SilenceDetectorConfiguration,
  TranscriptionModel
} from './types';

type Env = Record<string, string | undefined>;

const parseIntOrDefault = (value: string | undefined, fallback: number): number => {
  if (!value) {
    return fallback;
  }

  const parsed = Number.parseInt(value, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
};

const parseFloatOrDefault = (value: string | undefined, fallback: number): number => {
  if (!value) {
    return fallback;
  }

  const parsed = Number.parseFloat(value);
  return Number.isFinite(parsed) ? parsed : fallback;
};

const parseBoolOrDefault = (value: string | undefined, fallback: boolean): boolean => {
  if (value === undefined) {
    return fallback;
  }

  return value.toLowerCase() === 'true';
};

const resolveModel = (value: string | undefined): TranscriptionModel => {
  if (value === 'gpt-4o-transcribe') {
    return 'gpt-4o-transcribe';
  }

  return 'gpt-4o-mini-transcribe';
};

const resolveLanguageMode = (value: string | undefined): LanguageMode => {
  if (value === 'zh' || value === 'en' || value === 'auto') {
    return value;
  }

  return 'auto';
};

const resolveDisplayLanguage = (value: string | undefined, locale: string | undefined): DisplayLanguage => {
  if (value === 'zh' || value === 'en') {
    return value;
  }

  return locale?.toLowerCase().startsWith('zh') ? 'zh' : 'en';
};

const resolveLogLevel = (value: string | undefined): LogLevel => {
  if (value === 'debug' || value === 'info' || value === 'warn' || value === 'error') {
    return value;
  }

  return 'info';
};

const nonEmpty = (value: string | undefined): string | undefined => {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
};

export const resolveConfig = (env: Env = process.env): AppConfig => ({
  hotkey: env.PUSHSCRIBE_HOTKEY ?? 'Option+Space',
  apiKey: nonEmpty(env.PUSHSCRIBE_API_KEY) ?? nonEmpty(env.OPENAI_API_KEY),
  apiBaseUrl: (env.PUSHSCRIBE_API_BASE_URL ?? 'https://api.openai.com/v1').replace(/\/+$/, ''),
  model: resolveModel(env.PUSHSCRIBE_MODEL),
  prompt: env.PUSHSCRIBE_PROMPT ?? '',
  promptEnabled: parseBoolOrDefault(env.PUSHSCRIBE_PROMPT_ENABLED, true),
  promptMinDurationSeconds: parseFloatOrDefault(env.PUSHSCRIBE_PROMPT_MIN_SECONDS, 1.0),
  languageMode: resolveLanguageMode(env.PUSHSCRIBE_LANGUAGE),
  displayLanguage: resolveDisplayLanguage(env.PUSHSCRIBE_DISPLAY_LANGUAGE, env.LANG),
  autoPaste: parseBoolOrDefault(env.PUSHSCRIBE_AUTO_PASTE, false),
  pasteDelayMs: parseIntOrDefault(env.PUSHSCRIBE_PASTE_DELAY_MS, 80),
  enableVadTrim: parseBoolOrDefault(env.PUSHSCRIBE_VAD_TRIM, true),
  autoStopOnSilence: parseBoolOrDefault(env.PUSHSCRIBE_AUTO_STOP, true),
  silenceThresholdDB: parseFloatOrDefault(
    env.PUSHSCRIBE_SILENCE_THRESHOLD_DB,
    DEFAULT_SILENCE_DETECTOR.silenceThresholdDB
  ),
  silenceDurationMs: parseIntOrDefault(
    env.PUSHSCRIBE_SILENCE_DURATION_MS,
    DEFAULT_SILENCE_DETECTOR.silenceDurationMs
  ),
  autoStopGuardMs: parseIntOrDefault(env.PUSHSCRIBE_AUTO_STOP_GUARD_MS, DEFAULT_SILENCE_DETECTOR.startGuardMs),
  requireSpeechBeforeAutoStop: parseBoolOrDefault(
    env.PUSHSCRIBE_REQUIRE_SPEECH,
    DEFAULT_SILENCE_DETECTOR.requireSpeechBeforeAutoStop
  ),
  speechActivateDB: parseFloatOrDefault(
    env.PUSHSCRIBE_SPEECH_ACTIVATE_DB,
    DEFAULT_SILENCE_DETECTOR.speechActivateDB
  ),
  emaAlpha: parseFloatOrDefault(env.PUSHSCRIBE_EMA_ALPHA, DEFAULT_SILENCE_DETECTOR.emaAlpha),
  autoStopDebugLogs: parseBoolOrDefault(env.PUSHSCRIBE_AUTO_STOP_DEBUG, false),
  minRecordingMs: parseIntOrDefault(env.PUSHSCRIBE_MIN_RECORDING_MS, 200),
  maxRecordingSeconds: parseIntOrDefault(env.PUSHSCRIBE_MAX_RECORDING_SECONDS, 120),
  retryAttempts: parseIntOrDefault(env.PUSHSCRIBE_RETRY_ATTEMPTS, 3),
  retryDelayMs: parseIntOrDefault(env.PUSHSCRIBE_RETRY_DELAY_MS, 400),
  requestTimeoutMs: parseIntOrDefault(env.PUSHSCRIBE_REQUEST_TIMEOUT_MS, 45000),
  ffmpegInputFormat: env.PUSHSCRIBE_FFMPEG_FORMAT ?? 'avfoundation',
  ffmpegInputDevice: env.PUSHSCRIBE_FFMPEG_INPUT ?? ':0',
  dataDir: env.PUSHSCRIBE_DATA_DIR ?? path.join(os.homedir(), '.pushscribe'),
  logLevel: resolveLogLevel(env.PUSHSCRIBE_LOG_LEVEL)
});

export const silenceDetectorConfiguration = (config: AppConfig): SilenceDetectorConfiguration => ({
  silenceThresholdDB: config.silenceThresholdDB,
  silenceDurationMs: config.silenceDurationMs,
  startGuardMs: config.autoStopGuardMs,
  requireSpeechBeforeAutoStop: config.requireSpeechBeforeAutoStop,
  speechActivateDB: config.speechActivateDB,
  emaAlpha: config.emaAlpha
});

export const preferredLanguageCode = (config: AppConfig): string | undefined =>
  config.languageMode === 'auto' ? undefined : config.languageMode;

const isDecibel = (value: number): boolean => value >= -120 && value <= 0;

export const validateConfig = (config: AppConfig): string[] => {
  const errors: string[] = [];

  if (!config.hotkey.trim()) {
    errors.push('PUSHSCRIBE_HOTKEY must not be empty.');
  }

  if (!/^https?:\/\//.test(config.apiBaseUrl)) {
    errors.push('PUSHSCRIBE_API_BASE_URL must be an http(s) URL.');
  }

  if (config.promptMinDurationSeconds < 0 || config.promptMinDurationSeconds > 60) {
    errors.push('PUSHSCRIBE_PROMPT_MIN_SECONDS must be between 0 and 60 seconds.');
  }

  if (config.pasteDelayMs < 0 || config.pasteDelayMs > 2000) {
    errors.push('PUSHSCRIBE_PASTE_DELAY_MS must be between 0 and 2000 milliseconds.');
  }

  if (!isDecibel(config.silenceThresholdDB)) {
    errors.push('PUSHSCRIBE_SILENCE_THRESHOLD_DB must be between -120 and 0 dB.');
  }

  if (!isDecibel(config.speechActivateDB)) {
    errors.push('PUSHSCRIBE_SPEECH_ACTIVATE_DB must be between -120 and 0 dB.');
  }

  if (config.silenceDurationMs < 100 || config.silenceDurationMs > 10000) {
    errors.push('PUSHSCRIBE_SILENCE_DURATION_MS must be between 100 and 10000 milliseconds.');
  }

  if (config.autoStopGuardMs < 0 || config.autoStopGuardMs > 10000) {
    errors.push('PUSHSCRIBE_AUTO_STOP_GUARD_MS must be between 0 and 10000 milliseconds.');
  }

  if (!(config.emaAlpha > 0 && config.emaAlpha <= 1)) {
    errors.push('PUSHSCRIBE_EMA_ALPHA must be greater than 0 and at most 1.');
  }

  if (config.minRecordingMs < 0 || config.minRecordingMs > 5000) {
    errors.push('PUSHSCRIBE_MIN_RECORDING_MS must be between 0 and 5000 milliseconds.');
  }

  if (config.maxRecordingSeconds < 1 || config.maxRecordingSeconds > 1800) {
    errors.push('PUSHSCRIBE_MAX_RECORDING_SECONDS must be between 1 and 1800 seconds.');
  }

  if (config.maxRecordingSeconds * 1000 <= config.minRecordingMs) {
    errors.push(
      'Recording limits must satisfy: MIN_RECORDING_MS < MAX_RECORDING_SECONDS. Check PUSHSCRIBE_*_RECORDING_* values.'
    );
  }

  if (config.retryAttempts < 1 || config.retryAttempts > 8) {
    errors.push('PUSHSCRIBE_RETRY_ATTEMPTS must be between 1 and 8.');
  }

  if (config.retryDelayMs < 0 || config.retryDelayMs > 10000) {
    errors.push('PUSHSCRIBE_RETRY_DELAY_MS must be between 0 and 10000 milliseconds.');
  }

  if (config.requestTimeoutMs < 1000 || config.requestTimeoutMs > 600000) {
    errors.push('PUSHSCRIBE_REQUEST_TIMEOUT_MS must be between 1000 and 600000 milliseconds.');
  }

  if (!config.ffmpegInputFormat.trim()) {
    errors.push('PUSHSCRIBE_FFMPEG_FORMAT must not be empty.');
  }

  if (!config.dataDir.trim()) {
    errors.push('PUSHSCRIBE_DATA_DIR must not be empty.');
  }

  return errors;
};
