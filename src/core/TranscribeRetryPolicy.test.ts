import { describe, expect, it } from 'vitest';
import { TranscribeRetryPolicy } from './TranscribeRetryPolicy';

describe('TranscribeRetryPolicy', () => {
  const policy = new TranscribeRetryPolicy({ maxAttempts: 3, initialDelayMs: 400 });

  it('retries transient transport and server failures', () => {
    expect(policy.shouldRetry({ kind: 'timeout' })).toBe(true);
    expect(policy.shouldRetry({ kind: 'network', reason: 'offline' })).toBe(true);
    expect(policy.shouldRetry({ kind: 'server', status: 429, message: 'busy' })).toBe(true);
    expect(policy.shouldRetry({ kind: 'server', status: 503, message: 'down' })).toBe(true);
    expect(policy.shouldRetry({ kind: 'server', status: 599, message: 'edge' })).toBe(true);
  });

  it('does not retry terminal failures', () => {
    expect(policy.shouldRetry({ kind: 'unauthorized' })).toBe(false);
    expect(policy.shouldRetry({ kind: 'fileTooLarge' })).toBe(false);
    expect(policy.shouldRetry({ kind: 'server', status: 400, message: 'bad request' })).toBe(false);
    expect(policy.shouldRetry({ kind: 'server', status: 404, message: 'missing' })).toBe(false);
    expect(policy.shouldRetry({ kind: 'audioFileNotReady' })).toBe(false);
    expect(policy.shouldRetry({ kind: 'emptyText' })).toBe(false);
  });

  it('doubles the backoff delay exactly', () => {
    expect(policy.nextDelayMs(400)).toBe(800);
    expect(policy.nextDelayMs(800)).toBe(1600);
  });

  it('caps the backoff only when a maximum is configured', () => {
    const capped = new TranscribeRetryPolicy({ initialDelayMs: 400, maxDelayMs: 1000 });

    expect(capped.nextDelayMs(400)).toBe(800);
    expect(capped.nextDelayMs(800)).toBe(1000);
  });

  it('keeps at least one attempt', () => {
    expect(new TranscribeRetryPolicy({ maxAttempts: 0 }).maxAttempts).toBe(1);
    expect(new TranscribeRetryPolicy().maxAttempts).toBe(3);
    expect(new TranscribeRetryPolicy().initialDelayMs).toBe(400);
  });
});
