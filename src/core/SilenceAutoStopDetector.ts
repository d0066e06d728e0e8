import type { AutoStopDebugInfo, SilenceDetectorConfiguration } from '../types';

export interface SilenceVerdict {
  shouldAutoStop: boolean;
  debugInfo: AutoStopDebugInfo;
}

export const DEFAULT_SILENCE_DETECTOR: SilenceDetectorConfiguration = {
  silenceThresholdDB: -45,
  silenceDurationMs: 1000,
  startGuardMs: 300,
  requireSpeechBeforeAutoStop: true,
  speechActivateDB: -32,
  emaAlpha: 0.2
};

const MIN_EMA_ALPHA = 0.01;
const MAX_EMA_ALPHA = 1;

/**
 * Decides when a recording has gone quiet for long enough to end it. Loudness is smoothed
 * with an exponential moving average; silence is only counted once the start guard has
 * passed and, when required, speech has been heard at least once.
 */
export class SilenceAutoStopDetector {
  private smoothedDB = -120;
  private initialized = false;
  private speechDetected = false;
  private silenceMs = 0;

  public constructor(private configuration: SilenceDetectorConfiguration = DEFAULT_SILENCE_DETECTOR) {}

  public getConfiguration(): SilenceDetectorConfiguration {
    return this.configuration;
  }

  public hasDetectedSpeech(): boolean {
    return this.speechDetected;
  }

  public updateConfiguration(configuration: SilenceDetectorConfiguration): void {
    this.configuration = configuration;
  }

  public reset(): void {
    this.smoothedDB = -120;
    this.initialized = false;
    this.speechDetected = false;
    this.silenceMs = 0;
  }

  public ingest(instantaneousDecibels: number, frameDurationMs: number, recordingElapsedMs: number): SilenceVerdict {
    const config = this.configuration;
    const alpha = Math.max(MIN_EMA_ALPHA, Math.min(MAX_EMA_ALPHA, config.emaAlpha));

    if (this.initialized) {
      this.smoothedDB = alpha * instantaneousDecibels + (1 - alpha) * this.smoothedDB;
    } else {
      this.smoothedDB = instantaneousDecibels;
      this.initialized = true;
    }

    if (this.smoothedDB >= config.speechActivateDB) {
      this.speechDetected = true;
    }

    const guardPassed = recordingElapsedMs >= config.startGuardMs;
    const speechReady = !config.requireSpeechBeforeAutoStop || this.speechDetected;
    const eligible = guardPassed && speechReady;

    if (eligible && this.smoothedDB < config.silenceThresholdDB) {
      this.silenceMs += frameDurationMs;
    } else {
      this.silenceMs = 0;
    }

    const shouldAutoStop = eligible && this.silenceMs >= config.silenceDurationMs;

    return {
      shouldAutoStop,
      debugInfo: {
        instantaneousDecibels,
        smoothedDB: this.smoothedDB,
        frameDurationMs,
        recordingElapsedMs,
        consecutiveSilenceMs: this.silenceMs,
        hasDetectedSpeech: this.speechDetected,
        shouldAutoStop
      }
    };
  }
}
