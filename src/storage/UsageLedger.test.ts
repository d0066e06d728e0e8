import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { UsageLedger, dayKey } from './UsageLedger';

describe('UsageLedger', () => {
  let dataDir: string;

  beforeEach(async () => {
    dataDir = await fs.mkdtemp(path.join(os.tmpdir(), 'pushscribe-usage-'));
  });

  afterEach(async () => {
    await fs.rm(dataDir, { recursive: true, force: true });
  });

  it('formats local days with zero padding', () => {
    expect(dayKey(new Date(2026, 0, 5, 23, 59))).toBe('2026-01-05');
  });

  it('accumulates seconds per day and ignores non-positive values', async () => {
    const ledger = await UsageLedger.load(dataDir);
    const monday = new Date(2026, 2, 2, 9, 0);
    const tuesday = new Date(2026, 2, 3, 9, 0);

    ledger.record(30, monday);
    ledger.record(15, monday);
    ledger.record(0, monday);
    ledger.record(-4, monday);
    ledger.record(Number.NaN, monday);
    ledger.record(12, tuesday);

    expect(ledger.secondsOn(monday)).toBe(45);
    expect(ledger.secondsOn(tuesday)).toBe(12);
    expect(ledger.secondsOn(new Date(2026, 2, 4))).toBe(0);
  });

  it('estimates cost per model', async () => {
    const ledger = await UsageLedger.load(dataDir);
    const day = new Date(2026, 2, 2, 9, 0);

    ledger.record(120, day);

    expect(ledger.estimatedCost('gpt-4o-mini-transcribe', day)).toBeCloseTo(0.006, 10);
    expect(ledger.estimatedCost('gpt-4o-transcribe', day)).toBeCloseTo(0.012, 10);
  });

  it('persists and reloads the ledger', async () => {
    const day = new Date(2026, 2, 2, 9, 0);
    const ledger = await UsageLedger.load(dataDir);
    ledger.record(42.5, day);
    await ledger.flush();

    const raw = JSON.parse(await fs.readFile(path.join(dataDir, 'usage.json'), 'utf8'));
    expect(raw).toEqual({ '2026-03-02': 42.5 });

    const reloaded = await UsageLedger.load(dataDir);
    expect(reloaded.secondsOn(day)).toBe(42.5);
  });

  it('starts empty when the file is corrupt', async () => {
    await fs.writeFile(path.join(dataDir, 'usage.json'), '{not json', 'utf8');

    const ledger = await UsageLedger.load(dataDir);

    expect(ledger.secondsOn(new Date(2026, 2, 2))).toBe(0);
  });
});
