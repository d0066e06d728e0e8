import { errorSubtitle, warningSubtitle } from '../core/MessageFormatter';
import { phaseGlyph, phaseLabel } from '../core/SessionPhase';
import type { DisplayLanguage } from '../types';
import type { HudPresenter } from './HudPresenter';

export type HudMode = 'hidden' | 'listening' | 'transcribing' | 'success' | 'warning' | 'error';

export type HudWriter = (chunk: string) => void;

const BAR_CELLS = 10;
const MIN_LEVEL = 0.12;
const SMOOTH_FACTOR = 0.24;
const PREVIEW_MAX_CHARS = 60;

const tail = (text: string, maxChars: number): string => {
  const chars = Array.from(text.replace(/\s+/g, ' ').trim());
  return chars.length <= maxChars ? chars.join('') : `…${chars.slice(-maxChars + 1).join('')}`;
};

/**
 * Status lines on a terminal in place of a floating panel. Listening and transcribing
 * redraw their own line; results are printed on lines of their own.
 */
export class TerminalHud implements HudPresenter {
  private mode: HudMode = 'hidden';
  private smoothedLevel = 0;
  private drawnCells = -1;
  private lastPreview = '';

  public constructor(
    private readonly language: DisplayLanguage,
    private readonly write: HudWriter = (chunk) => {
      process.stdout.write(chunk);
    }
  ) {}

  public getMode(): HudMode {
    return this.mode;
  }

  public showListening(): void {
    this.enter('listening');
    this.smoothedLevel = 0;
    this.drawnCells = -1;
    this.drawLevel();
  }

  public showTranscribing(): void {
    this.enter('transcribing');
    this.lastPreview = '';
    this.write(`\r${phaseGlyph('transcribing')} ${phaseLabel('transcribing')}…`);
  }

  public updateTranscribingPreview(text: string): void {
    if (this.mode !== 'transcribing') {
      return;
    }

    const preview = tail(text, PREVIEW_MAX_CHARS);
    if (!preview || preview === this.lastPreview) {
      return;
    }

    this.lastPreview = preview;
    this.write(`\r\x1b[2K${phaseGlyph('transcribing')} ${preview}`);
  }

  public showSuccess(text: string): void {
    this.enter('success');
    this.write(`✓ ${text}\n`);
  }

  public showWarning(hint: string): void {
    this.enter('warning');
    this.write(`! ${hint} (${warningSubtitle(this.language)})\n`);
  }

  public showError(hint: string): void {
    this.enter('error');
    this.write(`✗ ${hint} (${errorSubtitle(this.language)})\n`);
  }

  public dismiss(): void {
    if (this.mode === 'hidden') {
      return;
    }

    this.closeLiveLine();
    this.mode = 'hidden';
    this.write(`${phaseGlyph('idle')} ${phaseLabel('idle')}\n`);
  }

  public updateLevel(rms: number): void {
    if (this.mode !== 'listening') {
      return;
    }

    const incoming = Math.max(0, Math.min(1, rms));
    this.smoothedLevel = this.smoothedLevel * (1 - SMOOTH_FACTOR) + incoming * SMOOTH_FACTOR;
    this.drawLevel();
  }

  private enter(mode: HudMode): void {
    this.closeLiveLine();
    this.mode = mode;
  }

  // Listening and transcribing draw with `\r` and leave the cursor mid-line.
  private closeLiveLine(): void {
    if (this.mode === 'listening' || this.mode === 'transcribing') {
      this.write('\n');
    }
  }

  private drawLevel(): void {
    const level = Math.max(MIN_LEVEL, Math.min(1, this.smoothedLevel));
    const cells = Math.round(level * BAR_CELLS);
    if (cells === this.drawnCells) {
      return;
    }

    this.drawnCells = cells;
    const bar = `${'█'.repeat(cells)}${'░'.repeat(BAR_CELLS - cells)}`;
    this.write(`\r${phaseGlyph('listening')} ${phaseLabel('listening')} ${bar}`);
  }
}
