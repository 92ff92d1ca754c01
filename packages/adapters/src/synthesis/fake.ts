import {
    durationFromBytes,
    raceAbort,
    silenceBytes,
    type SynthesisProvider,
    type SynthesizedAudio,
    type SynthesizeWordOptions
} from '@vox/core';

export interface FakeSynthesisProviderOptions {
    /** Clip length per word in seconds; `defaultDurationSeconds` otherwise. */
    durations?: Record<string, number>;
    defaultDurationSeconds?: number;
    /** Artificial latency, globally or per word. */
    delayMs?: number | ((word: string) => number);
    /** Words that always fail, mapped to the error they throw. */
    failures?: Record<string, Error>;
}

/**
 * Deterministic provider for tests. Every frame of a word's clip holds the
 * same sample value (see `sampleFor`), so words can be located inside an
 * assembled buffer.
 */
export class FakeSynthesisProvider implements SynthesisProvider {
    public readonly calls: Array<{ word: string; voiceId: string }> = [];
    public inFlight = 0;
    public maxInFlight = 0;
    private readonly options: FakeSynthesisProviderOptions;
    private readonly failures: Map<string, Error>;

    public constructor(options: FakeSynthesisProviderOptions = {}) {
        this.options = options;
        this.failures = new Map(Object.entries(options.failures ?? {}));
    }

    public static sampleFor(word: string): number {
        let hash = 0;
        for (const char of word) {
            hash = (hash * 31 + (char.codePointAt(0) ?? 0)) % 30_000;
        }
        return hash + 1;
    }

    public static clipFor(word: string, durationSeconds: number): Buffer {
        const audio = Buffer.alloc(silenceBytes(durationSeconds * 1000));
        const sample = FakeSynthesisProvider.sampleFor(word);
        for (let offset = 0; offset < audio.length; offset += 2) {
            audio.writeInt16LE(sample, offset);
        }
        return audio;
    }

    public failWord(word: string, error: Error): void {
        this.failures.set(word, error);
    }

    public clearFailure(word: string): void {
        this.failures.delete(word);
    }

    public callsFor(word: string): number {
        return this.calls.filter((call) => call.word === word).length;
    }

    public async synthesizeWord(options: SynthesizeWordOptions): Promise<SynthesizedAudio> {
        this.calls.push({ word: options.word, voiceId: options.voiceId });
        this.inFlight += 1;
        this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);

        try {
            const delay = typeof this.options.delayMs === 'function'
                ? this.options.delayMs(options.word)
                : this.options.delayMs ?? 0;
            if (delay > 0) {
                await raceAbort(new Promise((resolve) => setTimeout(resolve, delay)), options.signal);
            }

            const failure = this.failures.get(options.word);
            if (failure) {
                throw failure;
            }

            const durationSeconds = this.options.durations?.[options.word] ?? this.options.defaultDurationSeconds ?? 0.5;
            const audio = FakeSynthesisProvider.clipFor(options.word, durationSeconds);
            return { audio, durationSeconds: durationFromBytes(audio.length), latencyMs: delay };
        } finally {
            this.inFlight -= 1;
        }
    }
}
