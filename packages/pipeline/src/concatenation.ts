import {
  ConcatenationError,
  createSilence,
  durationFromBytes,
  isFrameAligned,
  type PauseMode,
  VOX_DEFAULTS,
  type WordClip
} from '@vox/core';

export type CompositionItem =
  | { kind: 'word'; clip: WordClip }
  | { kind: 'pause'; durationMs: number };

export type Composition = CompositionItem[];

export interface ConcatenationSegment {
  kind: 'clip' | 'silence';
  /** Set for clip segments. */
  word?: string;
  offset: number;
  length: number;
}

export interface ConcatenationOptions {
  wordGapMs?: number;
  pauseMode?: PauseMode;
}

export interface ConcatenationResult {
  buffer: Buffer;
  segments: ConcatenationSegment[];
  durationSeconds: number;
}

/**
 * Silence between two adjacent words. In `additive` mode pauses add to the
 * word gap; in `override` mode any pause replaces it.
 */
export function boundarySilenceMs(wordGapMs: number, pauseMs: number, pauseMode: PauseMode): number {
  if (pauseMode === 'override') {
    return pauseMs > 0 ? pauseMs : wordGapMs;
  }
  return wordGapMs + pauseMs;
}

export class ConcatenationEngine {
  private readonly wordGapMs: number;
  private readonly pauseMode: PauseMode;

  public constructor(defaults: ConcatenationOptions = {}) {
    this.wordGapMs = defaults.wordGapMs ?? VOX_DEFAULTS.WORD_GAP_MS;
    this.pauseMode = defaults.pauseMode ?? VOX_DEFAULTS.PAUSE_MODE;
  }

  /**
   * Joins clips in composition order. Silence only ever sits between two
   * words; pauses before the first word or after the last are dropped.
   */
  public concatenate(composition: Composition, options: ConcatenationOptions = {}): ConcatenationResult {
    const wordGapMs = options.wordGapMs ?? this.wordGapMs;
    const pauseMode = options.pauseMode ?? this.pauseMode;

    const parts: Buffer[] = [];
    const segments: ConcatenationSegment[] = [];
    let offset = 0;
    let seenWord = false;
    let pendingPauseMs = 0;

    for (const item of composition) {
      if (item.kind === 'pause') {
        if (seenWord) pendingPauseMs += Math.max(0, item.durationMs);
        continue;
      }

      const { audio, key } = item.clip;
      if (audio.length === 0) {
        throw new ConcatenationError(`Clip for "${key.word}" is empty`);
      }
      if (!isFrameAligned(audio.length)) {
        throw new ConcatenationError(`Clip for "${key.word}" is ${audio.length} bytes, not a whole number of frames`);
      }

      if (seenWord) {
        const silence = createSilence(boundarySilenceMs(wordGapMs, pendingPauseMs, pauseMode));
        if (silence.length > 0) {
          parts.push(silence);
          segments.push({ kind: 'silence', offset, length: silence.length });
          offset += silence.length;
        }
      }

      parts.push(audio);
      segments.push({ kind: 'clip', word: key.word, offset, length: audio.length });
      offset += audio.length;
      seenWord = true;
      pendingPauseMs = 0;
    }

    if (!seenWord) {
      throw new ConcatenationError('Nothing to concatenate: the composition has no word clips');
    }

    const buffer = Buffer.concat(parts, offset);
    return { buffer, segments, durationSeconds: durationFromBytes(buffer.length) };
  }
}
