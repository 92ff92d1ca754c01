export type PauseMode = 'additive' | 'override';

export type ContractionMode = 'join' | 'reject';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export interface VoxConfig {
  cacheDir         : string;
  concurrency      : number;
  wordGapMs        : number;
  /**
   * How an explicit pause combines with the word gap at the same boundary:
   * 'additive' inserts both, 'override' uses the pause alone.
   */
  pauseMode        : PauseMode;
  maxMessageLength : number;
  maxMessageWords  : number;
  maxWordLength    : number;
  providerTimeoutMs: number;
  maxRetries       : number;
  retryBaseDelayMs : number;
  retryJitterMs    : number;
  contractions     : ContractionMode;
  expandNumbers    : boolean;
  logLevel         : LogLevel;
  prettyLogs       : boolean;
}
