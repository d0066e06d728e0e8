import path from 'node:path';
import { PushScribeApp } from '../core/PushScribeApp';
import { TranscribeRetryPolicy } from '../core/TranscribeRetryPolicy';
import { TranscriptionCoordinator } from '../core/TranscriptionCoordinator';
import { StructuredLogger } from '../logging/StructuredLogger';
import { OpenAITranscribeClient } from '../services/asr/OpenAITranscribeClient';
import { FfmpegRecorder } from '../services/capture/FfmpegRecorder';
import { SystemClipboard } from '../services/clipboard/SystemClipboard';
import { PushToTalkHotkey } from '../services/hotkey/PushToTalkHotkey';
import { FfmpegSilenceTrimmer } from '../services/trim/FfmpegSilenceTrimmer';
import { UsageLedger } from '../storage/UsageLedger';
import { TerminalHud } from '../ui/TerminalHud';
import type { AppConfig } from '../types';

export interface PushScribeRuntime {
  app: PushScribeApp;
  hotkey: PushToTalkHotkey;
  usage: UsageLedger;
  logger: StructuredLogger;
}

export interface CreatePushScribeOptions {
  echoLogsToConsole?: boolean;
}

/** Wires the production adapters around one `PushScribeApp`. */
export const createPushScribe = async (
  config: AppConfig,
  options: CreatePushScribeOptions = {}
): Promise<PushScribeRuntime> => {
  const logger = await StructuredLogger.create(path.join(config.dataDir, 'logs'), {
    minLevel: config.logLevel,
    echoToConsole: options.echoLogsToConsole ?? false
  });

  const usage = await UsageLedger.load(config.dataDir, logger);
  const hotkey = new PushToTalkHotkey(logger);

  const transcription = new TranscriptionCoordinator(
    {
      remote: new OpenAITranscribeClient(
        { baseUrl: config.apiBaseUrl, requestTimeoutMs: config.requestTimeoutMs },
        logger
      ),
      trimmer: new FfmpegSilenceTrimmer({}, logger)
    },
    logger,
    {
      retryPolicy: new TranscribeRetryPolicy({
        maxAttempts: config.retryAttempts,
        initialDelayMs: config.retryDelayMs
      })
    }
  );

  const app = new PushScribeApp(
    {
      hotkeys: hotkey,
      recorder: new FfmpegRecorder(
        { inputFormat: config.ffmpegInputFormat, inputDevice: config.ffmpegInputDevice },
        logger
      ),
      transcription,
      hud: new TerminalHud(config.displayLanguage),
      clipboard: new SystemClipboard({ logger }),
      usage
    },
    config,
    logger
  );

  logger.info('PushScribe wired', {
    logPath: logger.getLogPath(),
    model: config.model,
    hotkey: config.hotkey
  });

  return { app, hotkey, usage, logger };
};
