import { bytesPerFrame, type PcmFormat, VOX_PCM_FORMAT } from './format';

function clampSample(value: number): number {
  if (value > 32_767) return 32_767;
  if (value < -32_768) return -32_768;
  return Math.round(value);
}

/**
 * Resamples (linear interpolation) and remaps channels of 16-bit PCM.
 *
 * Mono sources are duplicated onto every output channel; multi-channel
 * sources going to mono are averaged; otherwise channels map by index and
 * missing ones repeat the last source channel.
 */
export function convertPcm(input: Buffer, from: PcmFormat, to: PcmFormat = VOX_PCM_FORMAT): Buffer {
  if (from.bitsPerSample !== 16 || to.bitsPerSample !== 16) {
    throw new Error(`Unsupported PCM bit depth: ${from.bitsPerSample} -> ${to.bitsPerSample}`);
  }

  const inFrameBytes = bytesPerFrame(from);
  const inFrames = Math.floor(input.length / inFrameBytes);
  if (inFrames === 0) {
    return Buffer.alloc(0);
  }

  const outFrames = Math.floor((inFrames * to.sampleRate) / from.sampleRate);
  const output = Buffer.alloc(outFrames * bytesPerFrame(to));
  const step = from.sampleRate / to.sampleRate;

  const readSample = (frame: number, channel: number): number =>
    input.readInt16LE(frame * inFrameBytes + channel * 2);

  const readMixed = (frame: number, outChannel: number): number => {
    if (to.channels === 1 && from.channels > 1) {
      let sum = 0;
      for (let c = 0; c < from.channels; c += 1) {
        sum += readSample(frame, c);
      }
      return sum / from.channels;
    }

    return readSample(frame, Math.min(outChannel, from.channels - 1));
  };

  let offset = 0;
  for (let i = 0; i < outFrames; i += 1) {
    const position = i * step;
    const base = Math.floor(position);
    const next = Math.min(base + 1, inFrames - 1);
    const fraction = position - base;

    for (let channel = 0; channel < to.channels; channel += 1) {
      const a = readMixed(base, channel);
      const b = readMixed(next, channel);
      output.writeInt16LE(clampSample(a + (b - a) * fraction), offset);
      offset += 2;
    }
  }

  return output;
}
