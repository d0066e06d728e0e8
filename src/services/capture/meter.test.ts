import { describe, expect, it } from 'vitest';
import { measurePcmFrame } from './meter';

const frameOf = (values: number[]): Buffer => {
  const buffer = Buffer.alloc(values.length * 2);
  values.forEach((value, index) => buffer.writeInt16LE(value, index * 2));
  return buffer;
};

describe('measurePcmFrame', () => {
  it('reports the floor for digital silence', () => {
    expect(measurePcmFrame(frameOf(new Array<number>(800).fill(0)))).toEqual({
      rms: 0,
      instantaneousDecibels: -120,
      frameDurationMs: 50
    });
  });

  it('measures a half-scale square wave at about -6 dBFS', () => {
    const sample = measurePcmFrame(frameOf([16384, -16384, 16384, -16384]));
    expect(sample.rms).toBe(0.5);
    expect(sample.instantaneousDecibels).toBeCloseTo(-6.0206, 3);
    expect(sample.frameDurationMs).toBe(0.25);
  });

  it('handles an empty frame and ignores a trailing odd byte', () => {
    expect(measurePcmFrame(Buffer.alloc(0)).instantaneousDecibels).toBe(-120);
    expect(measurePcmFrame(Buffer.from([0x00, 0x40, 0x01])).rms).toBe(0.5);
  });

  it('never reports below the floor', () => {
    expect(measurePcmFrame(frameOf([1, 0, 0, 0, 0, 0, 0, 0])).instantaneousDecibels).toBeGreaterThanOrEqual(-120);
  });
});
