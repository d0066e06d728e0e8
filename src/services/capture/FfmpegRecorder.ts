import { randomUUID } from 'node:crypto';
import { ChildProcess, spawn } from 'node:child_process';
import os from 'node:os';
import path from 'node:path';
import { MicrophonePermissionError } from '../../core/errors';
import type { StructuredLogger } from '../../logging/StructuredLogger';
import type { MeterSample, RecordedAudio } from '../../types';
import type { AudioCapture, RecordingStartOptions } from './AudioRecorder';
import { BYTES_PER_SAMPLE, SAMPLE_RATE, measurePcmFrame } from './meter';

const START_STABILITY_DELAY_MS = 300;
const METER_FRAME_MS = 50;
const METER_FRAME_BYTES = (SAMPLE_RATE * BYTES_PER_SAMPLE * METER_FRAME_MS) / 1000;

const PERMISSION_PATTERN = /Operation not permitted|not authorized|Permission denied/i;

const normalizeMicError = (raw: string): Error => {
  const detail = raw.trim();

  if (PERMISSION_PATTERN.test(detail)) {
    return new MicrophonePermissionError(
      'Microphone permission denied. Grant microphone access to your terminal in System Settings > Privacy & Security > Microphone.'
    );
  }

  if (/Input\/output error|No such file|device not found|could not find/i.test(detail)) {
    return new Error('Microphone input device is unavailable. Verify PUSHSCRIBE_FFMPEG_INPUT.');
  }

  if (detail) {
    return new Error(`Microphone capture failed: ${detail}`);
  }

  return new Error('Microphone capture failed. Verify ffmpeg availability and microphone permissions.');
};

export interface FfmpegRecorderOptions {
  inputFormat: string;
  inputDevice: string;
  outputDir?: string;
}

interface ActiveRecording {
  process: ChildProcess;
  filePath: string;
  startedAtMs: number;
}

/**
 * Records 16 kHz mono WAV through ffmpeg. A second raw PCM output on stdout feeds ~50 ms
 * meter frames while the file is written.
 */
export class FfmpegRecorder implements AudioCapture {
  private active: ActiveRecording | undefined;
  private pendingChunks: Buffer[] = [];
  private pendingChunkOffset = 0;
  private pendingBytes = 0;
  private capturedBytes = 0;
  private onMeterSample: ((sample: MeterSample) => void) | undefined;

  public constructor(
    private readonly options: FfmpegRecorderOptions,
    private readonly logger?: StructuredLogger
  ) {}

  public isRecording(): boolean {
    return Boolean(this.active);
  }

  /** macOS asks for microphone access on first capture; denial surfaces from `startRecording`. */
  public async requestPermission(): Promise<boolean> {
    return true;
  }

  public async startRecording(options: RecordingStartOptions): Promise<string> {
    if (this.active) {
      throw new Error('Recorder is already active');
    }

    this.onMeterSample = options.onMeterSample;
    this.pendingChunks = [];
    this.pendingChunkOffset = 0;
    this.pendingBytes = 0;
    this.capturedBytes = 0;

    const filePath = path.join(this.options.outputDir ?? os.tmpdir(), `pushscribe-${randomUUID()}.wav`);
    const args = [
      '-hide_banner',
      '-loglevel',
      'error',
      '-f',
      this.options.inputFormat,
      '-i',
      this.options.inputDevice,
      '-ac',
      '1',
      '-ar',
      String(SAMPLE_RATE),
      '-acodec',
      'pcm_s16le',
      '-y',
      filePath,
      '-ac',
      '1',
      '-ar',
      String(SAMPLE_RATE),
      '-f',
      's16le',
      '-acodec',
      'pcm_s16le',
      'pipe:1'
    ];

    const ffmpeg = spawn('ffmpeg', args, { stdio: ['ignore', 'pipe', 'pipe'] });
    let stderrLog = '';
    let settled = false;

    ffmpeg.on('close', () => {
      if (this.active?.process === ffmpeg) {
        this.active = undefined;
      }
    });

    ffmpeg.stderr.on('data', (chunk) => {
      stderrLog += chunk.toString();
    });

    ffmpeg.stdout.on('data', (chunk) => {
      this.handleAudioData(Buffer.from(chunk));
    });

    await new Promise<void>((resolve, reject) => {
      ffmpeg.once('error', (error) => {
        if (settled) {
          return;
        }

        settled = true;
        reject(error);
      });

      ffmpeg.once('spawn', () => {
        setTimeout(() => {
          if (settled) {
            return;
          }

          if (ffmpeg.exitCode !== null) {
            settled = true;
            reject(normalizeMicError(stderrLog));
            return;
          }

          this.active = { process: ffmpeg, filePath, startedAtMs: Date.now() };
          settled = true;
          resolve();
        }, START_STABILITY_DELAY_MS);
      });

      ffmpeg.once('close', (code) => {
        if (settled) {
          return;
        }

        settled = true;
        reject(normalizeMicError(`${stderrLog}\nexit code=${code}`));
      });
    });

    this.logger?.info('Recorder started', {
      inputFormat: this.options.inputFormat,
      inputDevice: this.options.inputDevice,
      sampleRate: SAMPLE_RATE,
      filePath
    });

    return filePath;
  }

  public async stopRecording(): Promise<RecordedAudio> {
    const current = this.active;
    if (!current) {
      throw new Error('Recorder is not active');
    }

    await new Promise<void>((resolve, reject) => {
      current.process.once('close', (code) => {
        this.active = undefined;
        if (code === 0 || code === 255) {
          resolve();
          return;
        }

        reject(new Error(`ffmpeg exited with code ${code}`));
      });

      current.process.once('error', (error) => {
        this.active = undefined;
        reject(error);
      });

      // SIGINT lets ffmpeg finalize the WAV header.
      current.process.kill('SIGINT');
    });

    const wallClockSeconds = (Date.now() - current.startedAtMs) / 1000;
    const capturedSeconds = this.capturedBytes / (SAMPLE_RATE * BYTES_PER_SAMPLE);
    const durationSeconds = capturedSeconds > 0 ? capturedSeconds : wallClockSeconds;

    this.pendingChunks = [];
    this.pendingChunkOffset = 0;
    this.pendingBytes = 0;
    this.onMeterSample = undefined;

    this.logger?.info('Recorder stopped', {
      filePath: current.filePath,
      durationSeconds: Number(durationSeconds.toFixed(3))
    });

    return { filePath: current.filePath, durationSeconds };
  }

  private handleAudioData(chunk: Buffer): void {
    if (!this.onMeterSample || chunk.length === 0) {
      return;
    }

    this.capturedBytes += chunk.length;
    this.pendingChunks.push(chunk);
    this.pendingBytes += chunk.length;

    while (this.pendingBytes >= METER_FRAME_BYTES) {
      const frame = this.readPendingBytes(METER_FRAME_BYTES);
      if (!frame) {
        break;
      }

      try {
        this.onMeterSample(measurePcmFrame(frame));
      } catch (error) {
        const detail = error instanceof Error ? error.message : String(error);
        this.logger?.warn('Recorder meter callback failed', { detail });
      }
    }
  }

  private readPendingBytes(byteCount: number): Buffer | undefined {
    if (byteCount <= 0 || byteCount > this.pendingBytes) {
      return undefined;
    }

    const output = Buffer.allocUnsafe(byteCount);
    let writeOffset = 0;

    while (writeOffset < byteCount) {
      const head = this.pendingChunks[0];
      if (!head) {
        break;
      }

      const available = head.length - this.pendingChunkOffset;
      const toCopy = Math.min(available, byteCount - writeOffset);
      head.copy(output, writeOffset, this.pendingChunkOffset, this.pendingChunkOffset + toCopy);

      writeOffset += toCopy;
      this.pendingChunkOffset += toCopy;
      this.pendingBytes -= toCopy;

      if (this.pendingChunkOffset >= head.length) {
        this.pendingChunks.shift();
        this.pendingChunkOffset = 0;
      }
    }

    return writeOffset === byteCount ? output : output.subarray(0, writeOffset);
  }
}
