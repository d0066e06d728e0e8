import { describe, expect, it } from 'vitest';
import { resolveConfig } from '../config';
import type { CommandRunner } from '../services/process/runCommand';
import { runStartupChecks } from './startupChecks';

const recordingRunner = (failing: string[] = []) => {
  const commands: string[] = [];
  const runner: CommandRunner = async (command, args) => {
    commands.push([command, ...args].join(' '));
    if (failing.includes(command)) {
      throw new Error('spawn ENOENT');
    }

    return { stdout: '', stderr: '' };
  };

  return { commands, runner };
};

describe('runStartupChecks', () => {
  it('checks ffmpeg and the clipboard tools on macOS', async () => {
    const { commands, runner } = recordingRunner();
    const config = { ...resolveConfig({ PUSHSCRIBE_AUTO_PASTE: 'true' }), apiKey: 'test-secret' };

    const warnings = await runStartupChecks(config, undefined, { commandRunner: runner, platform: 'darwin' });

    expect(warnings).toEqual([]);
    expect(commands).toEqual(['ffmpeg -version', 'which pbcopy', 'osascript -e return "ok"']);
  });

  it('skips osascript when auto paste is off', async () => {
    const { commands, runner } = recordingRunner();
    const config = { ...resolveConfig({}), apiKey: 'test-secret' };

    await runStartupChecks(config, undefined, { commandRunner: runner, platform: 'darwin' });

    expect(commands).toEqual(['ffmpeg -version', 'which pbcopy']);
  });

  it('fails when ffmpeg is missing', async () => {
    const { runner } = recordingRunner(['ffmpeg']);

    await expect(
      runStartupChecks(resolveConfig({}), undefined, { commandRunner: runner, platform: 'darwin' })
    ).rejects.toThrow('ffmpeg is unavailable (spawn ENOENT). Install ffmpeg and make sure it is on PATH.');
  });

  it('warns about a missing key and a non-macOS platform', async () => {
    const { runner } = recordingRunner();
    const config = { ...resolveConfig({}), apiKey: undefined };

    const warnings = await runStartupChecks(config, undefined, { commandRunner: runner, platform: 'linux' });

    expect(warnings).toEqual([
      'Clipboard integration targets macOS; running on linux.',
      'No API key configured. Set OPENAI_API_KEY or PUSHSCRIBE_API_KEY before dictating.'
    ]);
  });
});
