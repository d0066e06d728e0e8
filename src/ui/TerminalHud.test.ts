import { describe, expect, it } from 'vitest';
import { TerminalHud } from './TerminalHud';

const createHud = (language: 'en' | 'zh' = 'en') => {
  const output: string[] = [];
  const hud = new TerminalHud(language, (chunk) => {
    output.push(chunk);
  });
  return { hud, output };
};

describe('TerminalHud', () => {
  it('draws a smoothed level bar while listening', () => {
    const { hud, output } = createHud();

    hud.showListening();
    hud.updateLevel(1);
    hud.updateLevel(1);

    expect(output).toEqual([
      '\r● Listening █░░░░░░░░░',
      '\r● Listening ██░░░░░░░░',
      '\r● Listening ████░░░░░░'
    ]);
  });

  it('skips redraws when the bar does not change', () => {
    const { hud, output } = createHud();

    hud.showListening();
    hud.updateLevel(0);
    hud.updateLevel(0.01);

    expect(output).toEqual(['\r● Listening █░░░░░░░░░']);
  });

  it('walks through transcribing, preview, success and dismissal', () => {
    const { hud, output } = createHud();

    hud.showListening();
    hud.showTranscribing();
    hud.updateTranscribingPreview('hello');
    hud.updateTranscribingPreview('hello');
    hud.showSuccess('hello world');
    hud.dismiss();
    hud.dismiss();

    expect(output.slice(1)).toEqual([
      '\n',
      '\r◌ Transcribing…',
      '\r\x1b[2K◌ hello',
      '\n',
      '✓ hello world\n',
      '○ Ready\n'
    ]);
    expect(hud.getMode()).toBe('hidden');
  });

  it('keeps only the tail of long previews', () => {
    const { hud, output } = createHud();

    hud.showTranscribing();
    hud.updateTranscribingPreview('a'.repeat(70));

    expect(output[1]).toBe(`\r\x1b[2K◌ …${'a'.repeat(59)}`);
  });

  it('ignores previews and levels outside their phase', () => {
    const { hud, output } = createHud();

    hud.updateTranscribingPreview('late');
    hud.updateLevel(0.8);

    expect(output).toEqual([]);
  });

  it('prints warnings and errors with a localized subtitle', () => {
    const { hud, output } = createHud('zh');

    hud.showWarning('粘贴失败');
    hud.showError('网络异常');

    expect(output).toEqual(['! 粘贴失败 (已复制，但自动粘贴失败)\n', '✗ 网络异常 (未识别语音或网络异常)\n']);
  });
});
