import { type RuntimeResource } from '../lifecycle';

export interface SynthesizeWordOptions {
  word   : string;
  voiceId: string;
  signal?: AbortSignal;
}

export interface SynthesizedAudio {
  /** PCM in the system format (48 kHz, s16le, stereo). */
  audio          : Buffer;
  /** Provider-reported duration; derived from the byte count when absent. */
  durationSeconds?: number;
  latencyMs      : number;
}

/**
 * External, rate-limited text-to-speech service. Implementations convert
 * whatever the vendor returns into the system PCM format and throw
 * ProviderError (or any Error) on failure.
 */
export interface SynthesisProvider extends RuntimeResource {
  synthesizeWord(options: SynthesizeWordOptions): Promise<SynthesizedAudio>;
}
