/**
 * Default constants for VOX engine configuration
 */
import { homedir } from 'node:os';
import { join } from 'node:path';

/**
 * Word gap bounds accepted per request
 */
export const WORD_GAP_LIMITS = {
  MIN_MS: 20 as const,
  MAX_MS: 200 as const,
};

/** Longest silence a single pre-tokenized pause may ask for */
export const MAX_PAUSE_MS = 10_000;

/**
 * Pipeline Configuration
 */
export const VOX_DEFAULTS = {
  /** Default on-disk word bank root */
  CACHE_DIR: join(homedir(), '.cache', 'vox', 'word-bank'),

  /** Simultaneous provider calls per generator */
  CONCURRENCY: 3 as const,

  /** Silence between two words when the request does not say otherwise */
  WORD_GAP_MS: 50 as const,

  PAUSE_MODE: 'additive' as const,

  MAX_MESSAGE_LENGTH: 500 as const,
  MAX_MESSAGE_WORDS: 50 as const,
  MAX_WORD_LENGTH: 30 as const,

  PROVIDER_TIMEOUT_MS: 15_000 as const,
  MAX_RETRIES: 1 as const,
  RETRY_BASE_DELAY_MS: 75 as const,
  RETRY_JITTER_MS: 25 as const,

  CONTRACTIONS: 'join' as const,
  EXPAND_NUMBERS: false as const,
};

/**
 * Logging Configuration
 */
export const LOGGING_DEFAULTS = {
  /** Default log level */
  LEVEL: "info" as const,

  /** Whether to pretty-print logs (enabled in non-production) */
  PRETTY_PRINT: process.env.NODE_ENV !== "production",
} as const;
