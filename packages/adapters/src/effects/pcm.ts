import {
    type ApplyEffectsOptions,
    type AudioEffectsProcessor,
    bytesPerFrame,
    type CustomFilterSettings,
    FilterError,
    type PcmFormat,
    throwIfAborted
} from '@vox/core';

const BUTTERWORTH_Q = Math.SQRT1_2;
const COMPRESSOR_THRESHOLD_DB = -18;
const COMPRESSOR_ATTACK_MS = 5;
const COMPRESSOR_RELEASE_MS = 50;
const INT16_SCALE = 32768;

interface BiquadCoefficients {
    b0: number;
    b1: number;
    b2: number;
    a1: number;
    a2: number;
}

/** RBJ cookbook coefficients, normalised by a0. */
function biquad(type: 'highpass' | 'lowpass', cutoffHz: number, sampleRate: number): BiquadCoefficients {
    const nyquistSafe = Math.min(cutoffHz, sampleRate * 0.49);
    const w0 = (2 * Math.PI * nyquistSafe) / sampleRate;
    const cos = Math.cos(w0);
    const alpha = Math.sin(w0) / (2 * BUTTERWORTH_Q);
    const a0 = 1 + alpha;

    const b0 = type === 'highpass' ? (1 + cos) / 2 : (1 - cos) / 2;
    const b1 = type === 'highpass' ? -(1 + cos) : 1 - cos;

    return {
        b0: b0 / a0,
        b1: b1 / a0,
        b2: b0 / a0,
        a1: (-2 * cos) / a0,
        a2: (1 - alpha) / a0
    };
}

function runBiquad(channel: Float64Array, c: BiquadCoefficients): void {
    let x1 = 0;
    let x2 = 0;
    let y1 = 0;
    let y2 = 0;
    for (let i = 0; i < channel.length; i += 1) {
        const x0 = channel[i] ?? 0;
        const y0 = c.b0 * x0 + c.b1 * x1 + c.b2 * x2 - c.a1 * y1 - c.a2 * y2;
        x2 = x1;
        x1 = x0;
        y2 = y1;
        y1 = y0;
        channel[i] = y0;
    }
}

/** Feed-forward peak compressor with the envelope linked across channels. */
function compress(channels: Float64Array[], ratio: number, sampleRate: number): void {
    if (ratio <= 1) {
        return;
    }

    const attack = Math.exp(-1 / ((COMPRESSOR_ATTACK_MS / 1000) * sampleRate));
    const release = Math.exp(-1 / ((COMPRESSOR_RELEASE_MS / 1000) * sampleRate));
    const frames = channels[0]?.length ?? 0;
    let envelope = 0;

    for (let i = 0; i < frames; i += 1) {
        let peak = 0;
        for (const channel of channels) {
            peak = Math.max(peak, Math.abs(channel[i] ?? 0));
        }

        const coefficient = peak > envelope ? attack : release;
        envelope = coefficient * envelope + (1 - coefficient) * peak;
        if (envelope <= 0) {
            continue;
        }

        const levelDb = 20 * Math.log10(envelope);
        if (levelDb <= COMPRESSOR_THRESHOLD_DB) {
            continue;
        }

        const targetDb = COMPRESSOR_THRESHOLD_DB + (levelDb - COMPRESSOR_THRESHOLD_DB) / ratio;
        const gain = Math.pow(10, (targetDb - levelDb) / 20);
        for (const channel of channels) {
            channel[i] = (channel[i] ?? 0) * gain;
        }
    }
}

function distort(channel: Float64Array, amount: number): void {
    if (amount <= 0) {
        return;
    }

    const drive = 1 + 9 * amount;
    const norm = Math.tanh(drive);
    for (let i = 0; i < channel.length; i += 1) {
        channel[i] = Math.tanh(drive * (channel[i] ?? 0)) / norm;
    }
}

function deinterleave(audio: Buffer, format: PcmFormat): Float64Array[] {
    const frames = audio.length / bytesPerFrame(format);
    const channels = Array.from({ length: format.channels }, () => new Float64Array(frames));
    for (let frame = 0; frame < frames; frame += 1) {
        for (let ch = 0; ch < format.channels; ch += 1) {
            const target = channels[ch];
            if (target) {
                target[frame] = audio.readInt16LE((frame * format.channels + ch) * 2) / INT16_SCALE;
            }
        }
    }
    return channels;
}

function interleave(channels: Float64Array[], byteLength: number): Buffer {
    const out = Buffer.alloc(byteLength);
    const count = channels.length;
    channels.forEach((channel, ch) => {
        for (let frame = 0; frame < channel.length; frame += 1) {
            const value = Math.round((channel[frame] ?? 0) * INT16_SCALE);
            out.writeInt16LE(Math.max(-32768, Math.min(32767, value)), (frame * count + ch) * 2);
        }
    });
    return out;
}

export function applyRadioChain(audio: Buffer, format: PcmFormat, settings: CustomFilterSettings): Buffer {
    if (format.bitsPerSample !== 16) {
        throw new FilterError(`Unsupported PCM bit depth for effects: ${format.bitsPerSample}`);
    }
    if (audio.length % bytesPerFrame(format) !== 0) {
        throw new FilterError(`Audio length ${audio.length} is not a whole number of frames`);
    }

    const channels = deinterleave(audio, format);
    const highpass = biquad('highpass', settings.highpassHz, format.sampleRate);
    const lowpass = biquad('lowpass', settings.lowpassHz, format.sampleRate);

    for (const channel of channels) {
        runBiquad(channel, highpass);
        runBiquad(channel, lowpass);
    }
    compress(channels, settings.compressionRatio, format.sampleRate);
    for (const channel of channels) {
        distort(channel, settings.distortion);
    }

    return interleave(channels, audio.length);
}

/** In-process highpass, lowpass, compression and soft-clip chain. */
export class PcmEffectsProcessor implements AudioEffectsProcessor {
    public async apply(options: ApplyEffectsOptions): Promise<Buffer> {
        throwIfAborted(options.signal);
        const output = applyRadioChain(options.audio, options.format, options.settings);
        throwIfAborted(options.signal);
        return output;
    }
}
