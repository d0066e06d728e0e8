import fs from 'node:fs/promises';
import path from 'node:path';
import type { SilenceTrimmer } from '../../core/TranscriptionCoordinator';
import type { StructuredLogger } from '../../logging/StructuredLogger';
import { runCommand, type CommandRunner } from '../process/runCommand';

export interface FfmpegSilenceTrimmerOptions {
  thresholdDB?: number;
  paddingSeconds?: number;
  timeoutMs?: number;
  commandRunner?: CommandRunner;
}

// A header-only WAV carries no audio.
const MIN_TRIMMED_BYTES = 1024;

export const trimmedPathFor = (inputPath: string): string => {
  const parsed = path.parse(inputPath);
  return path.join(parsed.dir, `${parsed.name}.trimmed.wav`);
};

/** Leading silence is removed directly; trailing silence by reversing, trimming, reversing back. */
export const silenceRemoveFilter = (thresholdDB: number, paddingSeconds: number): string => {
  const stage = `silenceremove=start_periods=1:start_duration=${paddingSeconds}:start_threshold=${thresholdDB}dB`;
  return [stage, 'areverse', stage, 'areverse'].join(',');
};

export class FfmpegSilenceTrimmer implements SilenceTrimmer {
  private readonly thresholdDB: number;
  private readonly paddingSeconds: number;
  private readonly timeoutMs: number;
  private readonly commandRunner: CommandRunner;

  public constructor(
    options: FfmpegSilenceTrimmerOptions = {},
    private readonly logger?: StructuredLogger
  ) {
    this.thresholdDB = options.thresholdDB ?? -36;
    this.paddingSeconds = options.paddingSeconds ?? 0.08;
    this.timeoutMs = options.timeoutMs ?? 10000;
    this.commandRunner = options.commandRunner ?? runCommand;
  }

  public async trim(inputPath: string, signal?: AbortSignal): Promise<string> {
    const outputPath = trimmedPathFor(inputPath);

    try {
      await this.commandRunner(
        'ffmpeg',
        [
          '-hide_banner',
          '-loglevel',
          'error',
          '-y',
          '-i',
          inputPath,
          '-af',
          silenceRemoveFilter(this.thresholdDB, this.paddingSeconds),
          '-ac',
          '1',
          '-acodec',
          'pcm_s16le',
          outputPath
        ],
        { timeoutMs: this.timeoutMs, signal }
      );
    } catch (error) {
      await fs.rm(outputPath, { force: true });
      throw error;
    }

    const stats = await fs.stat(outputPath);
    if (stats.size <= MIN_TRIMMED_BYTES) {
      this.logger?.debug('Trim produced no audio; submitting the untrimmed file', { inputPath });
      await fs.rm(outputPath, { force: true });
      return inputPath;
    }

    this.logger?.debug('Silence trimmed', { inputPath, outputPath, bytes: stats.size });
    return outputPath;
  }
}
