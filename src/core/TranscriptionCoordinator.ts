import fs from 'node:fs/promises';
import path from 'node:path';
import type { StructuredLogger } from '../logging/StructuredLogger';
import type { TranscriptionModel, TranscriptionRequestOptions } from '../types';
import { TranscribeRetryPolicy } from './TranscribeRetryPolicy';
import { TranscriptionCancelledError, TranscriptionError } from './errors';
import { sleep, type Sleeper } from './wait';

export interface RemoteTranscriptionRequest {
  filePath: string;
  model: TranscriptionModel;
  prompt?: string;
  languageCode?: string;
  apiKey: string;
  onDelta?: (text: string) => void;
  signal?: AbortSignal;
}

export interface RemoteTranscriber {
  transcribe: (request: RemoteTranscriptionRequest) => Promise<string>;
  keepWarm: () => void;
}

export interface SilenceTrimmer {
  /** Returns the path to submit; may be the input itself when nothing was trimmed. */
  trim: (inputPath: string, signal?: AbortSignal) => Promise<string>;
}

export interface TranscribeParams {
  sourcePath: string;
  recordedSeconds: number;
  options: TranscriptionRequestOptions;
  apiKey: string;
  onDelta?: (text: string) => void;
  signal?: AbortSignal;
}

export interface TranscriptionCoordinatorDependencies {
  remote: RemoteTranscriber;
  trimmer: SilenceTrimmer;
}

export interface TranscriptionCoordinatorOptions {
  retryPolicy?: TranscribeRetryPolicy;
  minAudioBytes?: number;
  sleep?: Sleeper;
}

const MIN_AUDIO_BYTES = 1024;
const TRIM_MIN_SECONDS = 1.2;
const TRIM_MIN_SECONDS_COMPRESSED = 8.0;
const COMPRESSED_EXTENSIONS = new Set(['m4a', 'mp3', 'mpga', 'mp4', 'mpeg', 'webm', 'ogg', 'flac']);

const fileSize = async (filePath: string): Promise<number> => {
  try {
    const stats = await fs.stat(filePath);
    return stats.isFile() ? stats.size : 0;
  } catch {
    return 0;
  }
};

const shouldTrim = (sourcePath: string, recordedSeconds: number, enableVadTrim: boolean): boolean => {
  if (!enableVadTrim || recordedSeconds < TRIM_MIN_SECONDS) {
    return false;
  }

  const extension = path.extname(sourcePath).slice(1).toLowerCase();
  return !COMPRESSED_EXTENSIONS.has(extension) || recordedSeconds >= TRIM_MIN_SECONDS_COMPRESSED;
};

/**
 * Runs one recorded artifact through optional trimming and the remote call under the retry
 * policy. Every artifact it touches is removed before `transcribe` settles.
 */
export class TranscriptionCoordinator {
  private readonly retryPolicy: TranscribeRetryPolicy;
  private readonly minAudioBytes: number;
  private readonly sleep: Sleeper;

  public constructor(
    private readonly deps: TranscriptionCoordinatorDependencies,
    private readonly logger?: StructuredLogger,
    options: TranscriptionCoordinatorOptions = {}
  ) {
    this.retryPolicy = options.retryPolicy ?? new TranscribeRetryPolicy();
    this.minAudioBytes = options.minAudioBytes ?? MIN_AUDIO_BYTES;
    this.sleep = options.sleep ?? sleep;
  }

  public async transcribe(params: TranscribeParams): Promise<string> {
    const artifacts = new Set<string>([params.sourcePath]);

    try {
      this.throwIfCancelled(params.signal);

      const size = await fileSize(params.sourcePath);
      if (size <= this.minAudioBytes) {
        throw new TranscriptionError({ kind: 'audioFileNotReady' });
      }

      let requestPath = params.sourcePath;
      if (shouldTrim(params.sourcePath, params.recordedSeconds, params.options.enableVadTrim)) {
        requestPath = await this.trim(params.sourcePath, params.signal);
        artifacts.add(requestPath);
        this.throwIfCancelled(params.signal);
      }

      return await this.transcribeWithRetry(requestPath, params);
    } finally {
      await Promise.all([...artifacts].map((artifact) => this.discard(artifact)));
    }
  }

  /** Removes an artifact that will not be transcribed. */
  public async discard(filePath: string): Promise<void> {
    try {
      await fs.rm(filePath, { force: true });
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      this.logger?.warn('Failed to remove audio artifact', { filePath, detail });
    }
  }

  public keepWarm(): void {
    this.deps.remote.keepWarm();
  }

  private async trim(sourcePath: string, signal?: AbortSignal): Promise<string> {
    const startedAt = Date.now();

    try {
      const trimmedPath = await this.deps.trimmer.trim(sourcePath, signal);
      this.logger?.debug('Silence trim finished', {
        elapsedMs: Date.now() - startedAt,
        trimmed: trimmedPath !== sourcePath
      });
      return trimmedPath;
    } catch (error) {
      this.throwIfCancelled(signal);
      throw error;
    }
  }

  private async transcribeWithRetry(filePath: string, params: TranscribeParams): Promise<string> {
    const { options, signal, onDelta } = params;
    let delayMs = this.retryPolicy.initialDelayMs;

    for (let attempt = 1; ; attempt += 1) {
      try {
        this.throwIfCancelled(signal);

        const text = await this.deps.remote.transcribe({
          filePath,
          model: options.model,
          prompt: options.prompt,
          languageCode: options.languageCode,
          apiKey: params.apiKey,
          signal,
          onDelta: onDelta
            ? (delta) => {
                if (!signal?.aborted) {
                  onDelta(delta);
                }
              }
            : undefined
        });

        this.throwIfCancelled(signal);
        return text;
      } catch (error) {
        this.throwIfCancelled(signal);

        if (
          !(error instanceof TranscriptionError) ||
          attempt >= this.retryPolicy.maxAttempts ||
          !this.retryPolicy.shouldRetry(error.failure)
        ) {
          throw error;
        }

        this.logger?.warn('Transcription attempt failed; retrying', {
          attempt,
          maxAttempts: this.retryPolicy.maxAttempts,
          delayMs,
          failure: error.failure.kind,
          detail: error.message
        });

        await this.sleep(delayMs, signal);
        delayMs = this.retryPolicy.nextDelayMs(delayMs);
      }
    }
  }

  private throwIfCancelled(signal?: AbortSignal): void {
    if (signal?.aborted) {
      throw new TranscriptionCancelledError();
    }
  }
}
