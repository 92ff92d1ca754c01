import type { FilterSpec } from '../entities/filter';
import type { GenerationProgress } from '../entities/generation';
import type { Token } from '../entities/token';
import type { VoxError } from '../errors';

export type SynthesisStage =
  | 'tokenizing'
  | 'checking_cache'
  | 'generating'
  | 'concatenating'
  | 'filtering'
  | 'done'
  | 'failed';

export type SynthesisInput =
  | { text: string }
  | { tokens: Token[] };

export interface SynthesisRequest {
  input           : SynthesisInput;
  voiceId         : string;
  scopeId         : string;
  filter?         : FilterSpec;
  /** Defaults to the configured word gap. */
  wordGapMs?      : number;
  /** When false, cache misses are skipped instead of synthesized. */
  generateMissing?: boolean;
}

export interface SkippedWord {
  word    : string;
  position: number;
  /** e.g. `validation:invalid_characters`, `generation:<message>`, `not_cached`. */
  reason  : string;
}

export interface SynthesisCounts {
  cached   : number;
  generated: number;
  failed   : number;
  skipped  : number;
}

export type SynthesisOutcome =
  | {
    ok              : true;
    stage           : 'done';
    requestId       : string;
    buffer          : Buffer;
    matchedWords    : string[];
    skippedWords    : SkippedWord[];
    /** Seconds of audio in `buffer`. */
    durationEstimate: number;
    counts          : SynthesisCounts;
  }
  | {
    ok          : false;
    /** The stage that was running when the request failed. */
    stage       : Exclude<SynthesisStage, 'done' | 'failed'>;
    requestId   : string;
    error       : VoxError;
    matchedWords: string[];
    skippedWords: SkippedWord[];
  };

export type SynthesisProgressEvent =
  | { type: 'stage'; requestId: string; stage: SynthesisStage }
  | { type: 'generation'; requestId: string; progress: GenerationProgress };

export interface SynthesizeOptions {
  signal?    : AbortSignal;
  onProgress?: (event: SynthesisProgressEvent) => void;
}

export interface TokenPreviewEntry {
  word           : string;
  position       : number;
  hasClip        : boolean;
  durationSeconds: number;
}

export interface TokenPreview {
  tokens                  : TokenPreviewEntry[];
  invalidWords            : SkippedWord[];
  matchedCount            : number;
  skippedCount            : number;
  estimatedDurationSeconds: number;
}
