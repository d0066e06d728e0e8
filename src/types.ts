export type SessionPhase = 'idle' | 'listening' | 'transcribing';
export type StopTrigger = 'manualRelease' | 'autoSilence' | 'maxDuration';
export type TranscriptionModel = 'gpt-4o-mini-transcribe' | 'gpt-4o-transcribe';
export type LanguageMode = 'auto' | 'zh' | 'en';
export type DisplayLanguage = 'en' | 'zh';
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface MeterSample {
  rms: number;
  instantaneousDecibels: number;
  frameDurationMs: number;
}

export interface SilenceDetectorConfiguration {
  silenceThresholdDB: number;
  silenceDurationMs: number;
  startGuardMs: number;
  requireSpeechBeforeAutoStop: boolean;
  speechActivateDB: number;
  emaAlpha: number;
}

export interface AutoStopDebugInfo {
  instantaneousDecibels: number;
  smoothedDB: number;
  frameDurationMs: number;
  recordingElapsedMs: number;
  consecutiveSilenceMs: number;
  hasDetectedSpeech: boolean;
  shouldAutoStop: boolean;
}

export interface AutoStopDecision {
  shouldAutoStop: boolean;
  debugInfo?: AutoStopDebugInfo;
}

export interface TranscriptionRequestOptions {
  enableVadTrim: boolean;
  model: TranscriptionModel;
  prompt?: string;
  languageCode?: string;
}

export interface RecordedAudio {
  filePath: string;
  durationSeconds: number;
}

export type SessionFeedback =
  | { kind: 'none' }
  | { kind: 'success'; text: string }
  | { kind: 'warning'; hint: string }
  | { kind: 'error'; hint: string };

export interface AppConfig {
  hotkey: string;
  apiKey?: string;
  apiBaseUrl: string;
  model: TranscriptionModel;
  prompt: string;
  promptEnabled: boolean;
  promptMinDurationSeconds: number;
  languageMode: LanguageMode;
  displayLanguage: DisplayLanguage;
  autoPaste: boolean;
  pasteDelayMs: number;
  enableVadTrim: boolean;
  autoStopOnSilence: boolean;
  silenceThresholdDB: number;
  silenceDurationMs: number;
  autoStopGuardMs: number;
  requireSpeechBeforeAutoStop: boolean;
  speechActivateDB: number;
  emaAlpha: number;
  autoStopDebugLogs: boolean;
  minRecordingMs: number;
  maxRecordingSeconds: number;
  retryAttempts: number;
  retryDelayMs: number;
  requestTimeoutMs: number;
  ffmpegInputFormat: string;
  ffmpegInputDevice: string;
  dataDir: string;
  logLevel: LogLevel;
}
