import { describe, expect, it } from 'vitest';
import { RecordingSessionCoordinator } from './RecordingSessionCoordinator';
import type { MeterSample, SilenceDetectorConfiguration } from '../types';

const quickStop: SilenceDetectorConfiguration = {
  silenceThresholdDB: -45,
  silenceDurationMs: 50,
  startGuardMs: 0,
  requireSpeechBeforeAutoStop: false,
  speechActivateDB: -32,
  emaAlpha: 1
};

const silent: MeterSample = { rms: 0.0001, instantaneousDecibels: -80, frameDurationMs: 50 };

const sequenceClock = (readings: number[]): (() => number) => {
  let index = 0;
  return () => {
    const reading = readings[Math.min(index, readings.length - 1)] ?? 0;
    index += 1;
    return reading;
  };
};

describe('RecordingSessionCoordinator', () => {
  it('lets exactly one stop trigger win', () => {
    const coordinator = new RecordingSessionCoordinator(() => 0);
    coordinator.beginSession(quickStop);

    expect(coordinator.beginStop('manualRelease')).toBe(true);
    expect(coordinator.beginStop('autoSilence')).toBe(false);
    expect(coordinator.beginStop('manualRelease')).toBe(false);
  });

  it('re-arms the gate after abortStop', () => {
    const coordinator = new RecordingSessionCoordinator(() => 0);
    coordinator.beginSession(quickStop);

    expect(coordinator.beginStop('manualRelease')).toBe(true);
    coordinator.abortStop();
    expect(coordinator.beginStop('manualRelease')).toBe(true);
  });

  it('allows an auto-silence stop only once per session', () => {
    const coordinator = new RecordingSessionCoordinator(() => 0);
    coordinator.beginSession(quickStop);

    expect(coordinator.beginStop('autoSilence')).toBe(true);
    coordinator.abortStop();
    expect(coordinator.beginStop('autoSilence')).toBe(false);
    expect(coordinator.beginStop('maxDuration')).toBe(true);

    coordinator.finishStop();
    coordinator.beginSession(quickStop);
    expect(coordinator.beginStop('autoSilence')).toBe(true);
  });

  it('returns no debug info when disabled, stopping or without a session', () => {
    const coordinator = new RecordingSessionCoordinator(() => 0);
    expect(coordinator.evaluateAutoStop(silent, true, quickStop)).toEqual({ shouldAutoStop: false });

    coordinator.beginSession(quickStop);
    expect(coordinator.evaluateAutoStop(silent, false, quickStop)).toEqual({ shouldAutoStop: false });

    coordinator.beginStop('manualRelease');
    expect(coordinator.evaluateAutoStop(silent, true, quickStop)).toEqual({ shouldAutoStop: false });

    coordinator.finishStop();
    expect(coordinator.hasActiveSession()).toBe(false);
    expect(coordinator.evaluateAutoStop(silent, true, quickStop)).toEqual({ shouldAutoStop: false });
  });

  it('clamps elapsed time when the clock jumps backwards', () => {
    const coordinator = new RecordingSessionCoordinator(sequenceClock([100, 98]));
    coordinator.beginSession(quickStop);

    const decision = coordinator.evaluateAutoStop(silent, true, quickStop);
    expect(decision.shouldAutoStop).toBe(true);
    expect(decision.debugInfo?.recordingElapsedMs).toBe(0);
  });

  it('never lets elapsed time decrease across readings', () => {
    const coordinator = new RecordingSessionCoordinator(sequenceClock([0, 500, 300, 700]));
    const slow: SilenceDetectorConfiguration = { ...quickStop, silenceDurationMs: 10000 };
    coordinator.beginSession(slow);

    const elapsed = [1, 2, 3].map(() => coordinator.evaluateAutoStop(silent, true, slow).debugInfo?.recordingElapsedMs);
    expect(elapsed).toEqual([500, 500, 700]);
  });

  it('applies the configuration passed with each evaluation', () => {
    const coordinator = new RecordingSessionCoordinator(() => 1000);
    coordinator.beginSession({ ...quickStop, silenceDurationMs: 10000 });

    expect(coordinator.evaluateAutoStop(silent, true, { ...quickStop, silenceDurationMs: 10000 }).shouldAutoStop).toBe(
      false
    );
    expect(coordinator.evaluateAutoStop(silent, true, quickStop).shouldAutoStop).toBe(true);
  });
});
