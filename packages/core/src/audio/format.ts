/**
 * Raw PCM layout shared by every clip in the word bank. Only signed 16-bit
 * little-endian interleaved samples are supported.
 */
export interface PcmFormat {
  sampleRate   : number;
  bitsPerSample: number;
  channels     : number;
}

/** The one format every stored clip and every assembled buffer uses. */
export const VOX_PCM_FORMAT: Readonly<PcmFormat> = Object.freeze({
  sampleRate   : 48_000,
  bitsPerSample: 16,
  channels     : 2
});

export function bytesPerFrame(format: PcmFormat = VOX_PCM_FORMAT): number {
  return (format.bitsPerSample / 8) * format.channels;
}

export function bytesPerSecond(format: PcmFormat = VOX_PCM_FORMAT): number {
  return format.sampleRate * bytesPerFrame(format);
}

/**
 * Byte count of `durationMs` of silence. For the system format this is
 * `durationMs * 192`; fractional frames are dropped so the result stays
 * frame aligned.
 */
export function silenceBytes(durationMs: number, format: PcmFormat = VOX_PCM_FORMAT): number {
  if (!Number.isFinite(durationMs) || durationMs <= 0) {
    return 0;
  }

  const frames = Math.floor((durationMs * format.sampleRate) / 1000);
  return frames * bytesPerFrame(format);
}

export function createSilence(durationMs: number, format: PcmFormat = VOX_PCM_FORMAT): Buffer {
  return Buffer.alloc(silenceBytes(durationMs, format));
}

export function durationFromBytes(byteLength: number, format: PcmFormat = VOX_PCM_FORMAT): number {
  return byteLength / bytesPerSecond(format);
}

export function isFrameAligned(byteLength: number, format: PcmFormat = VOX_PCM_FORMAT): boolean {
  return byteLength % bytesPerFrame(format) === 0;
}

export function isSameFormat(a: PcmFormat, b: PcmFormat): boolean {
  return a.sampleRate === b.sampleRate
    && a.bitsPerSample === b.bitsPerSample
    && a.channels === b.channels;
}
