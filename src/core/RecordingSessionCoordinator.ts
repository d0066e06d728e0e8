import { performance } from 'node:perf_hooks';
import { SilenceAutoStopDetector } from './SilenceAutoStopDetector';
import type { AutoStopDecision, MeterSample, SilenceDetectorConfiguration, StopTrigger } from '../types';

export type TimeSource = () => number;

interface ActiveSession {
  detector: SilenceAutoStopDetector;
  startedAtMs: number;
  lastReadingMs: number;
}

/**
 * Owns per-recording auto-stop state and the one-shot stop gate. Only the caller whose
 * `beginStop` wins may run the stop path for a session.
 */
export class RecordingSessionCoordinator {
  private session: ActiveSession | undefined;
  private stopping = false;
  private autoStopFired = false;

  public constructor(private readonly now: TimeSource = () => performance.now()) {}

  public beginSession(configuration: SilenceDetectorConfiguration): void {
    const startedAtMs = this.now();
    this.session = {
      detector: new SilenceAutoStopDetector(configuration),
      startedAtMs,
      lastReadingMs: startedAtMs
    };
    this.stopping = false;
    this.autoStopFired = false;
  }

  public hasActiveSession(): boolean {
    return this.session !== undefined;
  }

  public isStopping(): boolean {
    return this.stopping;
  }

  public beginStop(trigger: StopTrigger): boolean {
    if (this.stopping) {
      return false;
    }

    if (trigger === 'autoSilence') {
      if (this.autoStopFired) {
        return false;
      }

      this.autoStopFired = true;
    }

    this.stopping = true;
    return true;
  }

  public abortStop(): void {
    this.stopping = false;
  }

  public finishStop(): void {
    this.stopping = false;
    this.session = undefined;
  }

  public evaluateAutoStop(
    sample: MeterSample,
    isEnabled: boolean,
    configuration: SilenceDetectorConfiguration
  ): AutoStopDecision {
    const session = this.session;
    if (!isEnabled || this.stopping || !session) {
      return { shouldAutoStop: false };
    }

    session.detector.updateConfiguration(configuration);

    // The clock is not trusted to be monotonic.
    session.lastReadingMs = Math.max(session.lastReadingMs, this.now());
    const elapsedMs = Math.max(0, session.lastReadingMs - session.startedAtMs);

    const verdict = session.detector.ingest(sample.instantaneousDecibels, sample.frameDurationMs, elapsedMs);
    return { shouldAutoStop: verdict.shouldAutoStop, debugInfo: verdict.debugInfo };
  }
}
