import type { TranscriptionFailure } from './errors';

export interface TranscribeRetryPolicyOptions {
  maxAttempts?: number;
  initialDelayMs?: number;
  maxDelayMs?: number;
}

/**
 * Classifies remote transcription failures and computes exponential backoff.
 * Never sleeps; the caller owns the attempt loop and enforces `maxAttempts`.
 */
export class TranscribeRetryPolicy {
  public readonly maxAttempts: number;
  public readonly initialDelayMs: number;
  private readonly maxDelayMs?: number;

  public constructor(options: TranscribeRetryPolicyOptions = {}) {
    this.maxAttempts = Math.max(1, options.maxAttempts ?? 3);
    this.initialDelayMs = Math.max(0, options.initialDelayMs ?? 400);
    this.maxDelayMs = options.maxDelayMs;
  }

  public shouldRetry(failure: TranscriptionFailure): boolean {
    switch (failure.kind) {
      case 'timeout':
      case 'network':
        return true;
      case 'server':
        return failure.status === 429 || (failure.status >= 500 && failure.status <= 599);
      default:
        return false;
    }
  }

  public nextDelayMs(previousDelayMs: number): number {
    const doubled = previousDelayMs * 2;
    return this.maxDelayMs === undefined ? doubled : Math.min(doubled, this.maxDelayMs);
  }
}
