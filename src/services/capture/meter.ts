import type { MeterSample } from '../../types';

export const SAMPLE_RATE = 16000;
export const BYTES_PER_SAMPLE = 2; // s16le mono
export const METER_FLOOR_DB = -120;

/** RMS and dBFS of one little-endian 16-bit mono PCM frame. */
export const measurePcmFrame = (frame: Buffer, sampleRate = SAMPLE_RATE): MeterSample => {
  const sampleCount = Math.floor(frame.length / BYTES_PER_SAMPLE);
  const frameDurationMs = (sampleCount / sampleRate) * 1000;

  if (sampleCount === 0) {
    return { rms: 0, instantaneousDecibels: METER_FLOOR_DB, frameDurationMs };
  }

  let sumSquares = 0;
  for (let index = 0; index < sampleCount; index += 1) {
    const sample = frame.readInt16LE(index * BYTES_PER_SAMPLE) / 32768;
    sumSquares += sample * sample;
  }

  const rms = Math.sqrt(sumSquares / sampleCount);
  const instantaneousDecibels = rms > 0 ? Math.max(METER_FLOOR_DB, 20 * Math.log10(rms)) : METER_FLOOR_DB;

  return { rms, instantaneousDecibels, frameDurationMs };
};
