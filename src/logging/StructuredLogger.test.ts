import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { StructuredLogger } from './StructuredLogger';

describe('StructuredLogger', () => {
  let logDir: string;

  beforeEach(async () => {
    logDir = await fs.mkdtemp(path.join(os.tmpdir(), 'pushscribe-logs-'));
  });

  afterEach(async () => {
    await fs.rm(logDir, { recursive: true, force: true });
  });

  it('writes JSON lines at or above the minimum level', async () => {
    const logger = await StructuredLogger.create(path.join(logDir, 'nested'), {
      minLevel: 'info',
      echoToConsole: false
    });

    logger.debug('hidden');
    logger.info('Recorder started', { sampleRate: 16000 });
    logger.error('Transcription failed', { detail: 'timeout' });
    await logger.flush();

    const lines = (await fs.readFile(logger.getLogPath(), 'utf8')).trim().split('\n');
    const entries = lines.map((line) => JSON.parse(line));

    expect(path.basename(logger.getLogPath())).toMatch(/^pushscribe-\d{4}-\d{2}-\d{2}\.log$/);
    expect(entries).toHaveLength(2);
    expect(entries[0]).toMatchObject({ level: 'info', message: 'Recorder started', sampleRate: 16000 });
    expect(entries[1]).toMatchObject({ level: 'error', message: 'Transcription failed', detail: 'timeout' });
    expect(typeof entries[0].ts).toBe('string');
  });
});
