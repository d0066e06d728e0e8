import { EventEmitter } from 'node:events';
import { silenceDetectorConfiguration, preferredLanguageCode } from '../config';
import type { StructuredLogger } from '../logging/StructuredLogger';
import type { AudioCapture } from '../services/capture/AudioRecorder';
import type { ClipboardService } from '../services/clipboard/ClipboardService';
import type { HotkeySource } from '../services/hotkey/HotkeySource';
import type { HudPresenter } from '../ui/HudPresenter';
import type {
  AppConfig,
  AutoStopDebugInfo,
  MeterSample,
  RecordedAudio,
  SessionFeedback,
  SessionPhase,
  StopTrigger,
  TranscriptionRequestOptions
} from '../types';
import {
  DEFAULT_AUTO_DISMISS_POLICY,
  errorDelaySeconds,
  successDelaySeconds,
  type AutoDismissPolicy
} from './AutoDismissPolicy';
import { hotkeyRegistrationFailed, hotkeyUpdated, shortError, shortWarning } from './MessageFormatter';
import { RecordingSessionCoordinator } from './RecordingSessionCoordinator';
import type { TranscribeParams } from './TranscriptionCoordinator';
import { MicrophonePermissionError, MissingApiKeyError, TranscriptionCancelledError } from './errors';
import { sleep, type Sleeper } from './wait';

const AUTO_STOP_CONFIRM_MS = 80;
const AUTO_STOP_DEBUG_INTERVAL_MS = 150;

export interface TranscriptionRunner {
  transcribe(params: TranscribeParams): Promise<string>;
  discard(filePath: string): Promise<void>;
  keepWarm(): void;
}

export interface UsageRecorder {
  record(seconds: number): void;
}

export interface PushScribeDependencies {
  hotkeys: HotkeySource;
  recorder: AudioCapture;
  transcription: TranscriptionRunner;
  hud: HudPresenter;
  clipboard: ClipboardService;
  usage?: UsageRecorder;
  sessions?: RecordingSessionCoordinator;
  dismissPolicy?: AutoDismissPolicy;
  sleep?: Sleeper;
  now?: () => number;
}

export declare interface PushScribeApp {
  on(event: 'phaseChanged', listener: (phase: SessionPhase, previous: SessionPhase) => void): this;
  on(event: 'feedbackChanged', listener: (feedback: SessionFeedback) => void): this;
}

/**
 * Top-level push-to-talk state machine. Observed phases always run
 * idle → listening → transcribing → idle, or idle → listening → idle when a recording is
 * discarded.
 */
export class PushScribeApp extends EventEmitter {
  private phase: SessionPhase = 'idle';
  private feedback: SessionFeedback = { kind: 'none' };
  private activeHotkey: string;
  private readonly sessions: RecordingSessionCoordinator;
  private readonly dismissPolicy: AutoDismissPolicy;
  private readonly sleep: Sleeper;
  private readonly now: () => number;

  // Bumped whenever a session starts or is abandoned; stale callbacks compare against it.
  private generation = 0;
  private starting = false;
  private releaseRequestedWhileStarting = false;
  private transcriptionController: AbortController | undefined;
  private transcriptionTask: Promise<void> | undefined;
  private maxDurationTimer: NodeJS.Timeout | undefined;
  private autoStopTimer: NodeJS.Timeout | undefined;
  private dismissTimer: NodeJS.Timeout | undefined;
  private lastDebugLogAt = Number.NEGATIVE_INFINITY;

  public constructor(
    private readonly deps: PushScribeDependencies,
    private readonly config: AppConfig,
    private readonly logger?: StructuredLogger
  ) {
    super();
    this.activeHotkey = config.hotkey;
    this.sessions = deps.sessions ?? new RecordingSessionCoordinator();
    this.dismissPolicy = deps.dismissPolicy ?? DEFAULT_AUTO_DISMISS_POLICY;
    this.sleep = deps.sleep ?? sleep;
    this.now = deps.now ?? (() => Date.now());
  }

  public getPhase(): SessionPhase {
    return this.phase;
  }

  public getFeedback(): SessionFeedback {
    return this.feedback;
  }

  public getActiveHotkey(): string {
    return this.activeHotkey;
  }

  public async start(): Promise<void> {
    this.deps.hotkeys.bind({
      onPress: () => this.handlePushToTalkPressed(),
      onRelease: () => this.handlePushToTalkReleased()
    });

    await this.deps.hotkeys.register(this.activeHotkey);
    this.logger?.info('Push-to-talk ready', { hotkey: this.activeHotkey });
  }

  /** Never throws; on failure the previous shortcut stays registered. */
  public async updateHotkeyShortcut(next: string): Promise<string> {
    const previous = this.activeHotkey;

    try {
      await this.deps.hotkeys.register(next);
      this.activeHotkey = next;
      this.logger?.info('Hotkey updated', { previous, hotkey: next });
      return hotkeyUpdated(next, this.config.displayLanguage);
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      this.logger?.warn('Hotkey registration failed; restoring previous shortcut', {
        requested: next,
        previous,
        detail
      });

      await this.deps.hotkeys.register(previous).catch((restoreError: unknown) => {
        const restoreDetail = restoreError instanceof Error ? restoreError.message : String(restoreError);
        this.logger?.error('Failed to restore previous hotkey', { previous, detail: restoreDetail });
      });

      return hotkeyRegistrationFailed(this.config.displayLanguage);
    }
  }

  public async handlePushToTalkPressed(): Promise<void> {
    if (this.phase === 'transcribing') {
      this.cancelTranscription();
      return;
    }

    if (this.phase === 'listening' || this.starting) {
      return;
    }

    await this.startListening();
  }

  public async handlePushToTalkReleased(): Promise<void> {
    if (this.starting) {
      this.releaseRequestedWhileStarting = true;
      return;
    }

    if (this.phase !== 'listening') {
      return;
    }

    await this.stopRecording('manualRelease');
  }

  /** Press-to-start, press-to-stop control for surfaces without key-up events. */
  public async toggleRecording(): Promise<void> {
    if (this.phase === 'listening') {
      await this.handlePushToTalkReleased();
      return;
    }

    await this.handlePushToTalkPressed();
  }

  /** Resolves once no transcription task is outstanding. */
  public async whenIdle(): Promise<void> {
    while (this.transcriptionTask) {
      await this.transcriptionTask;
    }
  }

  public async shutdown(): Promise<void> {
    this.generation += 1;
    this.transcriptionController?.abort();
    this.transcriptionController = undefined;
    this.clearRecordingTimers();
    this.clearDismissTimer();

    if (this.deps.recorder.isRecording()) {
      try {
        const recorded = await this.deps.recorder.stopRecording();
        await this.deps.transcription.discard(recorded.filePath);
      } catch (error) {
        const detail = error instanceof Error ? error.message : String(error);
        this.logger?.warn('Failed to stop recording during shutdown', { detail });
      }
    }

    this.sessions.finishStop();
    await this.whenIdle();
    this.setPhase('idle');
    this.logger?.info('Push-to-talk shut down');
  }

  private async startListening(): Promise<void> {
    this.starting = true;
    this.releaseRequestedWhileStarting = false;
    this.clearDismissTimer();
    this.setFeedback({ kind: 'none' });

    this.generation += 1;
    const generation = this.generation;

    try {
      const granted = await this.deps.recorder.requestPermission();
      if (!granted) {
        throw new MicrophonePermissionError();
      }

      this.sessions.beginSession(silenceDetectorConfiguration(this.config));
      const filePath = await this.deps.recorder.startRecording({
        onMeterSample: (sample) => this.handleMeterSample(sample, generation)
      });
      this.logger?.info('Recording started', { filePath });
    } catch (error) {
      this.starting = false;
      this.sessions.finishStop();
      this.showFailure(error, 'Failed to start recording');
      return;
    }

    this.starting = false;
    this.setPhase('listening');
    this.deps.hud.showListening();
    this.armMaxDurationTimer();
    this.deps.transcription.keepWarm();

    if (this.releaseRequestedWhileStarting) {
      this.releaseRequestedWhileStarting = false;
      await this.stopRecording('manualRelease');
    }
  }

  private handleMeterSample(sample: MeterSample, generation: number): void {
    if (generation !== this.generation || this.phase !== 'listening') {
      return;
    }

    this.deps.hud.updateLevel(sample.rms);

    const decision = this.sessions.evaluateAutoStop(
      sample,
      this.config.autoStopOnSilence,
      silenceDetectorConfiguration(this.config)
    );

    if (decision.debugInfo && this.config.autoStopDebugLogs) {
      this.logAutoStopDebug(decision.debugInfo);
    }

    if (!decision.shouldAutoStop || this.autoStopTimer) {
      return;
    }

    this.autoStopTimer = setTimeout(() => {
      this.autoStopTimer = undefined;
      this.runDetached(this.stopRecording('autoSilence'), 'Auto-stop');
    }, AUTO_STOP_CONFIRM_MS);
  }

  private logAutoStopDebug(info: AutoStopDebugInfo): void {
    const now = this.now();
    if (now - this.lastDebugLogAt < AUTO_STOP_DEBUG_INTERVAL_MS && !info.shouldAutoStop) {
      return;
    }

    this.lastDebugLogAt = now;
    this.logger?.debug('Auto-stop evaluation', {
      db: Number(info.instantaneousDecibels.toFixed(1)),
      ema: Number(info.smoothedDB.toFixed(1)),
      silenceMs: Math.round(info.consecutiveSilenceMs),
      spoken: info.hasDetectedSpeech,
      elapsedMs: Math.round(info.recordingElapsedMs),
      trigger: info.shouldAutoStop
    });
  }

  private async stopRecording(trigger: StopTrigger): Promise<void> {
    if (this.phase !== 'listening' || !this.sessions.beginStop(trigger)) {
      return;
    }

    this.clearRecordingTimers();

    let recorded: RecordedAudio;
    try {
      recorded = await this.deps.recorder.stopRecording();
    } catch (error) {
      this.sessions.finishStop();
      this.setPhase('idle');
      this.showFailure(error, 'Failed to stop recording');
      return;
    }

    if (recorded.durationSeconds * 1000 < this.config.minRecordingMs) {
      this.sessions.abortStop();
      this.generation += 1;
      this.setPhase('idle');
      this.deps.hud.dismiss();
      this.logger?.info('Recording discarded as too short', {
        trigger,
        durationSeconds: recorded.durationSeconds
      });
      await this.deps.transcription.discard(recorded.filePath);
      return;
    }

    this.sessions.finishStop();
    this.setPhase('transcribing');
    this.deps.hud.showTranscribing();
    this.logger?.info('Recording stopped', { trigger, durationSeconds: recorded.durationSeconds });
    this.launchTranscription(recorded);
  }

  private launchTranscription(recorded: RecordedAudio): void {
    const controller = new AbortController();
    this.transcriptionController = controller;

    const task = this.runTranscription(recorded, this.generation, controller.signal).finally(() => {
      if (this.transcriptionTask === task) {
        this.transcriptionTask = undefined;
      }
    });
    this.transcriptionTask = task;
  }

  private async runTranscription(recorded: RecordedAudio, generation: number, signal: AbortSignal): Promise<void> {
    const isCurrent = (): boolean => generation === this.generation && !signal.aborted;

    try {
      const apiKey = this.config.apiKey;
      if (!apiKey) {
        await this.deps.transcription.discard(recorded.filePath);
        throw new MissingApiKeyError();
      }

      const startedAt = this.now();
      const text = await this.deps.transcription.transcribe({
        sourcePath: recorded.filePath,
        recordedSeconds: recorded.durationSeconds,
        options: this.requestOptions(recorded.durationSeconds),
        apiKey,
        signal,
        onDelta: (partial) => {
          if (isCurrent()) {
            this.deps.hud.updateTranscribingPreview(partial);
          }
        }
      });

      if (!isCurrent()) {
        this.logger?.info('Discarding transcription result from an abandoned session');
        return;
      }

      this.logger?.info('Transcription completed', {
        elapsedMs: this.now() - startedAt,
        textLength: text.length
      });
      await this.deliver(text, recorded.durationSeconds, isCurrent);
    } catch (error) {
      if (error instanceof TranscriptionCancelledError || !isCurrent()) {
        this.logger?.info('Transcription cancelled');
        return;
      }

      this.transcriptionController = undefined;
      this.setPhase('idle');
      this.showFailure(error, 'Transcription failed');
    }
  }

  private async deliver(text: string, recordedSeconds: number, isCurrent: () => boolean): Promise<void> {
    await this.deps.clipboard.copy(text);

    let pasteFailure: string | undefined;
    if (this.config.autoPaste) {
      // Paste only once the copy has settled.
      await this.sleep(this.config.pasteDelayMs);
      if (!isCurrent()) {
        return;
      }

      try {
        await this.deps.clipboard.autoPaste();
      } catch (error) {
        pasteFailure = error instanceof Error ? error.message : String(error);
        this.logger?.warn('Auto paste failed; text left on clipboard', { detail: pasteFailure });
      }
    }

    this.deps.usage?.record(recordedSeconds);

    if (!isCurrent()) {
      return;
    }

    this.transcriptionController = undefined;
    this.setPhase('idle');

    if (pasteFailure !== undefined) {
      const hint = shortWarning(pasteFailure, this.config.displayLanguage);
      this.setFeedback({ kind: 'warning', hint });
      this.deps.hud.showWarning(hint);
      this.scheduleDismiss(errorDelaySeconds(this.dismissPolicy));
      return;
    }

    this.setFeedback({ kind: 'success', text });
    this.deps.hud.showSuccess(text);
    this.scheduleDismiss(successDelaySeconds(text, this.dismissPolicy));
  }

  private requestOptions(recordedSeconds: number): TranscriptionRequestOptions {
    const prompt = this.config.prompt.trim();
    const sendPrompt =
      this.config.promptEnabled && prompt.length > 0 && recordedSeconds >= this.config.promptMinDurationSeconds;

    return {
      enableVadTrim: this.config.enableVadTrim,
      model: this.config.model,
      prompt: sendPrompt ? prompt : undefined,
      languageCode: preferredLanguageCode(this.config)
    };
  }

  private cancelTranscription(): void {
    this.generation += 1;
    this.transcriptionController?.abort();
    this.transcriptionController = undefined;
    this.clearDismissTimer();
    this.setFeedback({ kind: 'none' });
    this.setPhase('idle');
    this.deps.hud.dismiss();
    this.logger?.info('Transcription cancelled by a new push-to-talk press');
  }

  private showFailure(error: unknown, message: string): void {
    const detail = error instanceof Error ? error.message : String(error);
    this.logger?.error(message, { detail });

    const hint = shortError(error, this.config.displayLanguage);
    this.setFeedback({ kind: 'error', hint });
    this.deps.hud.showError(hint);
    this.scheduleDismiss(errorDelaySeconds(this.dismissPolicy));
  }

  private armMaxDurationTimer(): void {
    this.maxDurationTimer = setTimeout(() => {
      this.maxDurationTimer = undefined;
      this.runDetached(this.stopRecording('maxDuration'), 'Max-duration stop');
    }, this.config.maxRecordingSeconds * 1000);
  }

  private scheduleDismiss(seconds: number): void {
    this.clearDismissTimer();
    this.dismissTimer = setTimeout(() => {
      this.dismissTimer = undefined;
      this.deps.hud.dismiss();
    }, seconds * 1000);
  }

  private clearRecordingTimers(): void {
    if (this.maxDurationTimer) {
      clearTimeout(this.maxDurationTimer);
      this.maxDurationTimer = undefined;
    }

    if (this.autoStopTimer) {
      clearTimeout(this.autoStopTimer);
      this.autoStopTimer = undefined;
    }
  }

  private clearDismissTimer(): void {
    if (this.dismissTimer) {
      clearTimeout(this.dismissTimer);
      this.dismissTimer = undefined;
    }
  }

  private setPhase(next: SessionPhase): void {
    if (next === this.phase) {
      return;
    }

    const previous = this.phase;
    this.phase = next;
    this.emit('phaseChanged', next, previous);
    this.logger?.info('Session phase changed', { from: previous, to: next });
  }

  private setFeedback(feedback: SessionFeedback): void {
    this.feedback = feedback;
    this.emit('feedbackChanged', feedback);
  }

  private runDetached(task: Promise<void>, label: string): void {
    task.catch((error: unknown) => {
      const detail = error instanceof Error ? error.message : String(error);
      this.logger?.error(`${label} failed`, { detail });
    });
  }
}
