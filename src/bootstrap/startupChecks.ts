import type { StructuredLogger } from '../logging/StructuredLogger';
import { runCommand, type CommandRunner } from '../services/process/runCommand';
import type { AppConfig } from '../types';

export interface StartupCheckOptions {
  commandRunner?: CommandRunner;
  platform?: NodeJS.Platform;
}

const requireCommand = async (
  commandRunner: CommandRunner,
  command: string,
  args: string[],
  hint: string
): Promise<void> => {
  try {
    await commandRunner(command, args, { timeoutMs: 8000 });
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new Error(`${command} is unavailable (${detail}). ${hint}`);
  }
};

/** Verifies external tools before the hotkey goes live. Returns non-fatal warnings. */
export const runStartupChecks = async (
  config: AppConfig,
  logger: StructuredLogger | undefined,
  options: StartupCheckOptions = {}
): Promise<string[]> => {
  const commandRunner = options.commandRunner ?? runCommand;
  const platform = options.platform ?? process.platform;
  const warnings: string[] = [];

  logger?.info('Running startup checks');

  await requireCommand(commandRunner, 'ffmpeg', ['-version'], 'Install ffmpeg and make sure it is on PATH.');

  if (platform === 'darwin') {
    await requireCommand(commandRunner, 'which', ['pbcopy'], 'pbcopy ships with macOS; check PATH.');

    if (config.autoPaste) {
      await requireCommand(
        commandRunner,
        'osascript',
        ['-e', 'return "ok"'],
        'Auto paste needs osascript; disable PUSHSCRIBE_AUTO_PASTE or fix PATH.'
      );
    }
  } else {
    warnings.push(`Clipboard integration targets macOS; running on ${platform}.`);
  }

  if (!config.apiKey) {
    warnings.push('No API key configured. Set OPENAI_API_KEY or PUSHSCRIBE_API_KEY before dictating.');
  }

  for (const warning of warnings) {
    logger?.warn('Startup check warning', { detail: warning });
  }

  logger?.info('Startup checks completed', { warnings: warnings.length });
  return warnings;
};
