import type { StructuredLogger } from '../../logging/StructuredLogger';
import { runCommand, type CommandRunner } from '../process/runCommand';
import type { ClipboardService } from './ClipboardService';

export class AutoPasteError extends Error {
  public constructor(detail: string) {
    super(`Auto paste failed: ${detail}`);
    this.name = 'AutoPasteError';
  }
}

export interface SystemClipboardOptions {
  commandRunner?: CommandRunner;
  logger?: StructuredLogger;
}

const PASTE_SCRIPT = 'tell application "System Events" to keystroke "v" using command down';

/** macOS pasteboard through `pbcopy`, with ⌘V sent via System Events for auto paste. */
export class SystemClipboard implements ClipboardService {
  private readonly commandRunner: CommandRunner;
  private readonly logger?: StructuredLogger;

  public constructor(options: SystemClipboardOptions = {}) {
    this.commandRunner = options.commandRunner ?? runCommand;
    this.logger = options.logger;
  }

  public async copy(text: string): Promise<void> {
    await this.commandRunner('pbcopy', [], { stdin: text, timeoutMs: 2000 });
    this.logger?.debug('Copied transcript to clipboard', { length: text.length });
  }

  public async autoPaste(): Promise<void> {
    try {
      await this.commandRunner('osascript', ['-e', PASTE_SCRIPT], { timeoutMs: 4000 });
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      throw new AutoPasteError(detail);
    }
  }
}
