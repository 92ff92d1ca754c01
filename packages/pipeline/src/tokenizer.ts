import {
  type ContractionMode,
  PAUSE_DURATIONS_MS,
  type PauseMark,
  pauseToken,
  type Token,
  type TokenizeResult,
  type TokenValidationIssue,
  type TokenValidationReason,
  VOX_DEFAULTS,
  wordToken
} from '@vox/core';

export interface TokenizeOptions {
  /** `join` drops apostrophes inside a word (`don't` -> `dont`); `reject` reports the word. */
  contractions?: ContractionMode;
  /** Spell out integers from 0 to 999 999 999 (`42` -> `forty two`). */
  expandNumbers?: boolean;
  maxWordLength?: number;
}

const WORD_PATTERN = /^[a-z0-9](?:[a-z0-9_-]*[a-z0-9])?$/;
const WORD_CHAR = /[\p{L}\p{N}]/u;
const APOSTROPHES = /['’]/g;

const ONES = [
  'zero', 'one', 'two', 'three', 'four', 'five', 'six', 'seven', 'eight', 'nine',
  'ten', 'eleven', 'twelve', 'thirteen', 'fourteen', 'fifteen', 'sixteen',
  'seventeen', 'eighteen', 'nineteen'
] as const;
const TENS = ['', '', 'twenty', 'thirty', 'forty', 'fifty', 'sixty', 'seventy', 'eighty', 'ninety'] as const;
const MAX_SPELLED_NUMBER = 999_999_999;

export function validateWord(word: string, maxWordLength: number = VOX_DEFAULTS.MAX_WORD_LENGTH): TokenValidationReason | null {
  if (!WORD_PATTERN.test(word)) {
    return 'invalid_characters';
  }
  if (word.length > maxWordLength) {
    return 'too_long';
  }
  return null;
}

/** The longest pause a punctuation run contains, if any. */
export function pauseMarkFor(run: string): PauseMark | null {
  if (run.includes('...') || run.includes('…')) return 'ellipsis';
  if (/[.!?]/.test(run)) return 'period';
  if (/[,;:]/.test(run)) return 'comma';
  if (/[-–—]/.test(run)) return 'dash';
  return null;
}

function belowThousand(n: number): string[] {
  const words: string[] = [];
  const hundreds = Math.floor(n / 100);
  const rest = n % 100;

  if (hundreds > 0) {
    words.push(ONES[hundreds] ?? '', 'hundred');
  }
  if (rest >= 20) {
    words.push(TENS[Math.floor(rest / 10)] ?? '');
    if (rest % 10 > 0) {
      words.push(ONES[rest % 10] ?? '');
    }
  } else if (rest > 0) {
    words.push(ONES[rest] ?? '');
  }
  return words;
}

/** English words for an integer in 0..999 999 999, or null outside that range. */
export function spellNumber(n: number): string[] | null {
  if (!Number.isInteger(n) || n < 0 || n > MAX_SPELLED_NUMBER) {
    return null;
  }
  if (n === 0) {
    return ['zero'];
  }

  const millions = Math.floor(n / 1_000_000);
  const thousands = Math.floor((n % 1_000_000) / 1000);
  const units = n % 1000;
  const words: string[] = [];

  if (millions > 0) words.push(...belowThousand(millions), 'million');
  if (thousands > 0) words.push(...belowThousand(thousands), 'thousand');
  if (units > 0) words.push(...belowThousand(units));
  return words;
}

function splitChunk(chunk: string): { leading: string; core: string; trailing: string } {
  const chars = Array.from(chunk);
  const first = chars.findIndex((char) => WORD_CHAR.test(char));
  if (first === -1) {
    return { leading: chunk, core: '', trailing: '' };
  }

  let last = chars.length - 1;
  while (last > first && !WORD_CHAR.test(chars[last] ?? '')) {
    last -= 1;
  }

  return {
    leading: chars.slice(0, first).join(''),
    core: chars.slice(first, last + 1).join(''),
    trailing: chars.slice(last + 1).join('')
  };
}

function pushPause(tokens: Token[], run: string, position: number): void {
  const mark = pauseMarkFor(run);
  if (mark) {
    tokens.push(pauseToken(mark, PAUSE_DURATIONS_MS[mark], position));
  }
}

/**
 * Splits text into word and pause tokens in input order. Words failing
 * validation are reported in `errors` and left out of `tokens`.
 */
export function tokenize(text: string, options: TokenizeOptions = {}): TokenizeResult {
  const contractions = options.contractions ?? VOX_DEFAULTS.CONTRACTIONS;
  const expandNumbers = options.expandNumbers ?? VOX_DEFAULTS.EXPAND_NUMBERS;
  const maxWordLength = options.maxWordLength ?? VOX_DEFAULTS.MAX_WORD_LENGTH;

  const tokens: Token[] = [];
  const errors: TokenValidationIssue[] = [];
  let position = 0;

  for (const chunk of text.split(/\s+/)) {
    if (!chunk) continue;

    const { leading, core, trailing } = splitChunk(chunk);
    if (!core) {
      pushPause(tokens, leading, position);
      continue;
    }

    pushPause(tokens, leading, position);

    let word = core.toLowerCase().trim();
    if (contractions === 'join') {
      word = word.replace(APOSTROPHES, '');
    }

    const spelled = expandNumbers && /^\d+$/.test(word) ? spellNumber(Number(word)) : null;
    const candidates = spelled ?? [word];

    for (const candidate of candidates) {
      const reason = validateWord(candidate, maxWordLength);
      if (reason) {
        errors.push({ word: candidate, position, reason });
      } else {
        tokens.push(wordToken(candidate, position));
      }
    }

    position += 1;
    pushPause(tokens, trailing, position);
  }

  return { tokens, errors };
}

export function wordCount(result: TokenizeResult): number {
  const positions = new Set<number>();
  for (const token of result.tokens) {
    if (token.kind === 'word') positions.add(token.position);
  }
  for (const issue of result.errors) {
    positions.add(issue.position);
  }
  return positions.size;
}
