import fs from 'node:fs/promises';
import path from 'node:path';
import type { UsageRecorder } from '../core/PushScribeApp';
import type { StructuredLogger } from '../logging/StructuredLogger';
import type { TranscriptionModel } from '../types';

export const COST_PER_MINUTE_USD: Record<TranscriptionModel, number> = {
  'gpt-4o-mini-transcribe': 0.003,
  'gpt-4o-transcribe': 0.006
};

type DailySeconds = Record<string, number>;

const pad = (value: number, width: number): string => String(value).padStart(width, '0');

/** Local calendar day as `YYYY-MM-DD`. */
export const dayKey = (date: Date): string =>
  `${pad(date.getFullYear(), 4)}-${pad(date.getMonth() + 1, 2)}-${pad(date.getDate(), 2)}`;

const parseLedger = (raw: string): DailySeconds => {
  const parsed: unknown = JSON.parse(raw);
  const ledger: DailySeconds = {};

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    return ledger;
  }

  for (const [key, value] of Object.entries(parsed)) {
    if (typeof value === 'number' && Number.isFinite(value) && value > 0) {
      ledger[key] = value;
    }
  }

  return ledger;
};

/** Transcribed seconds per day, persisted as `usage.json` under the data directory. */
export class UsageLedger implements UsageRecorder {
  private writeQueue: Promise<void> = Promise.resolve();

  private constructor(
    private readonly filePath: string,
    private readonly dailySeconds: DailySeconds,
    private readonly logger?: StructuredLogger
  ) {}

  public static async load(dataDir: string, logger?: StructuredLogger): Promise<UsageLedger> {
    await fs.mkdir(dataDir, { recursive: true });
    const filePath = path.join(dataDir, 'usage.json');

    let dailySeconds: DailySeconds = {};
    try {
      dailySeconds = parseLedger(await fs.readFile(filePath, 'utf8'));
    } catch (error) {
      const missing = error instanceof Error && 'code' in error && error.code === 'ENOENT';
      if (!missing) {
        const detail = error instanceof Error ? error.message : String(error);
        logger?.warn('Usage ledger unreadable; starting empty', { filePath, detail });
      }
    }

    return new UsageLedger(filePath, dailySeconds, logger);
  }

  public record(seconds: number, date: Date = new Date()): void {
    if (!(seconds > 0)) {
      return;
    }

    const key = dayKey(date);
    this.dailySeconds[key] = (this.dailySeconds[key] ?? 0) + seconds;

    const snapshot = `${JSON.stringify(this.dailySeconds, null, 2)}\n`;
    this.writeQueue = this.writeQueue
      .then(async () => {
        await fs.writeFile(this.filePath, snapshot, 'utf8');
      })
      .catch((error) => {
        const detail = error instanceof Error ? error.message : String(error);
        this.logger?.warn('Failed to persist usage ledger', { filePath: this.filePath, detail });
      });
  }

  public secondsOn(date: Date = new Date()): number {
    return this.dailySeconds[dayKey(date)] ?? 0;
  }

  public estimatedCost(model: TranscriptionModel, date: Date = new Date()): number {
    return (this.secondsOn(date) / 60) * COST_PER_MINUTE_USD[model];
  }

  public async flush(): Promise<void> {
    await this.writeQueue;
  }
}
