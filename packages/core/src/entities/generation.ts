import type { WordClip } from './clip';

export type GenerationResult =
  | { status: 'cached'; clip: WordClip }
  | { status: 'generated'; clip: WordClip }
  | { status: 'failed'; reason: string }
  | { status: 'skipped'; reason: string };

export type GenerationStatus = GenerationResult['status'];

export interface GenerationProgress {
  total    : number;
  cached   : number;
  generated: number;
  failed   : number;
  skipped  : number;
  inFlight : number;
  /** The word whose state just changed, if any. */
  word?    : string;
}

export function resolvedClip(result: GenerationResult | undefined): WordClip | null {
  if (!result) return null;
  return result.status === 'cached' || result.status === 'generated' ? result.clip : null;
}
