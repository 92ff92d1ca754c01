import { describe, expect, it } from 'vitest';

import {
  bytesPerFrame,
  bytesPerSecond,
  convertPcm,
  createSilence,
  durationFromBytes,
  isFrameAligned,
  silenceBytes,
  VOX_PCM_FORMAT
} from '../src/audio';

function pcm(samples: number[]): Buffer {
  const buffer = Buffer.alloc(samples.length * 2);
  samples.forEach((sample, index) => buffer.writeInt16LE(sample, index * 2));
  return buffer;
}

function samplesOf(buffer: Buffer): number[] {
  const out: number[] = [];
  for (let offset = 0; offset < buffer.length; offset += 2) {
    out.push(buffer.readInt16LE(offset));
  }
  return out;
}

describe('system pcm format', () => {
  it('uses 4-byte frames and 192000 bytes per second', () => {
    expect(bytesPerFrame()).toBe(4);
    expect(bytesPerSecond()).toBe(192_000);
    expect(VOX_PCM_FORMAT).toEqual({ sampleRate: 48_000, bitsPerSample: 16, channels: 2 });
  });

  it.each([
    [20, 3_840],
    [50, 9_600],
    [100, 19_200],
    [200, 38_400]
  ])('inserts exactly %ims * 192 bytes of silence', (gapMs, expected) => {
    expect(silenceBytes(gapMs)).toBe(expected);
    expect(silenceBytes(gapMs)).toBe(gapMs * 192);

    const silence = createSilence(gapMs);
    expect(silence.length).toBe(expected);
    expect(silence.every((byte) => byte === 0)).toBe(true);
  });

  it('treats zero and negative durations as no silence', () => {
    expect(silenceBytes(0)).toBe(0);
    expect(silenceBytes(-5)).toBe(0);
  });

  it('derives duration from byte length', () => {
    expect(durationFromBytes(115_200)).toBe(0.6);
    expect(durationFromBytes(345_600)).toBe(1.8);
  });

  it('detects frame alignment', () => {
    expect(isFrameAligned(8)).toBe(true);
    expect(isFrameAligned(6)).toBe(false);
  });
});

describe('convertPcm', () => {
  it('upsamples 24 kHz mono to 48 kHz stereo with linear interpolation', () => {
    const input = pcm([0, 1000]);

    const output = convertPcm(input, { sampleRate: 24_000, bitsPerSample: 16, channels: 1 });

    expect(samplesOf(output)).toEqual([0, 0, 500, 500, 1000, 1000, 1000, 1000]);
  });

  it('averages stereo down to mono', () => {
    const input = pcm([100, 300, -200, 200]);

    const output = convertPcm(
      input,
      { sampleRate: 48_000, bitsPerSample: 16, channels: 2 },
      { sampleRate: 48_000, bitsPerSample: 16, channels: 1 }
    );

    expect(samplesOf(output)).toEqual([200, 0]);
  });

  it('returns an empty buffer for input shorter than one frame', () => {
    expect(convertPcm(Buffer.alloc(1), { sampleRate: 24_000, bitsPerSample: 16, channels: 1 }).length).toBe(0);
  });

  it('rejects bit depths other than 16', () => {
    expect(() => convertPcm(Buffer.alloc(4), { sampleRate: 24_000, bitsPerSample: 8, channels: 1 }))
      .toThrow('Unsupported PCM bit depth');
  });
});
