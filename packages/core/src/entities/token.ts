export type TokenKind = 'word' | 'pause';

/** Named pause marks recognised in input text. */
export type PauseMark = 'period' | 'comma' | 'ellipsis' | 'dash';

export const PAUSE_DURATIONS_MS: Readonly<Record<PauseMark, number>> = Object.freeze({
  ellipsis: 250,
  period  : 200,
  comma   : 150,
  dash    : 100
});

export interface Token {
  /** Normalized word, or the punctuation that produced a pause. */
  word           : string;
  kind           : TokenKind;
  /** Zero for words. */
  pauseDurationMs: number;
  /**
   * Index of the word among all words of the input, including words that
   * failed validation. Pauses carry the position of the next word.
   */
  position       : number;
}

export type TokenValidationReason = 'invalid_characters' | 'too_long';

export interface TokenValidationIssue {
  word    : string;
  position: number;
  reason  : TokenValidationReason;
}

export interface TokenizeResult {
  tokens: Token[];
  errors: TokenValidationIssue[];
}

export function wordToken(word: string, position: number): Token {
  return { word, kind: 'word', pauseDurationMs: 0, position };
}

export function pauseToken(mark: string, durationMs: number, position: number): Token {
  return { word: mark, kind: 'pause', pauseDurationMs: durationMs, position };
}

export function isWordToken(token: Token): boolean {
  return token.kind === 'word';
}
