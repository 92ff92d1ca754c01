import OpenAI from 'openai';
import {
    CancelledError,
    convertPcm,
    durationFromBytes,
    errorMessage,
    type PcmFormat,
    ProviderError,
    type SynthesisProvider,
    type SynthesizedAudio,
    type SynthesizeWordOptions
} from '@vox/core';

/** `response_format: 'pcm'` is raw 24 kHz, 16-bit, mono little-endian. */
const OPENAI_PCM_FORMAT: PcmFormat = { sampleRate: 24_000, bitsPerSample: 16, channels: 1 };

export interface OpenAISynthesisProviderOptions {
    apiKey?: string;
    baseUrl?: string;
    model?: string;
    /** Style hint forwarded to models that accept one. */
    instructions?: string;
    client?: OpenAI;
}

function isRetryable(error: unknown): boolean {
    if (error instanceof OpenAI.APIConnectionError) {
        return true;
    }

    if (error instanceof OpenAI.APIError) {
        const status = error.status;
        return status === undefined || status === 408 || status === 429 || status >= 500;
    }

    return false;
}

export class OpenAISynthesisProvider implements SynthesisProvider {
    private readonly client: OpenAI;
    private readonly model: string;
    private readonly instructions: string | undefined;

    public constructor(options: OpenAISynthesisProviderOptions = {}) {
        this.client = options.client ?? new OpenAI({
            apiKey: options.apiKey,
            baseURL: options.baseUrl
        });
        this.model = options.model ?? 'gpt-4o-mini-tts';
        this.instructions = options.instructions;
    }

    public async synthesizeWord(options: SynthesizeWordOptions): Promise<SynthesizedAudio> {
        const startedAt = Date.now();

        let raw: Buffer;
        try {
            const response = await this.client.audio.speech.create(
                {
                    model: this.model,
                    voice: options.voiceId as OpenAI.Audio.SpeechCreateParams['voice'],
                    input: options.word,
                    response_format: 'pcm',
                    ...(this.instructions !== undefined ? { instructions: this.instructions } : {})
                },
                { signal: options.signal }
            );
            raw = Buffer.from(await response.arrayBuffer());
        } catch (error) {
            if (error instanceof OpenAI.APIUserAbortError) {
                throw new CancelledError(`Synthesis of "${options.word}" was cancelled.`);
            }

            throw new ProviderError({
                word: options.word,
                message: `OpenAI speech synthesis failed for "${options.word}": ${errorMessage(error)}`,
                retryable: isRetryable(error),
                cause: error
            });
        }

        if (raw.length === 0) {
            throw new ProviderError({ word: options.word, message: `OpenAI returned no audio for "${options.word}"` });
        }

        const audio = convertPcm(raw, OPENAI_PCM_FORMAT);

        return {
            audio,
            durationSeconds: durationFromBytes(audio.length),
            latencyMs: Math.max(0, Date.now() - startedAt)
        };
    }
}
