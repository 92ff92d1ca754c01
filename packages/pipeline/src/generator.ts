import {
  CancelledError,
  type CacheKey,
  cacheKeyId,
  errorMessage,
  type GenerationProgress,
  type GenerationResult,
  isFrameAligned,
  type Logger,
  raceAbort,
  retryIdempotent,
  type SynthesisProvider,
  throwIfAborted,
  type Token,
  VOX_DEFAULTS,
  withTimeout
} from '@vox/core';

import { WorkerPool } from './pool';
import type { WordBankCache } from './wordBank';

export interface ConcurrentGeneratorOptions {
  cache: WordBankCache;
  provider: SynthesisProvider;
  logger: Logger;
  concurrency?: number;
  providerTimeoutMs?: number;
  maxRetries?: number;
  retryBaseDelayMs?: number;
  retryJitterMs?: number;
}

export interface GenerateMissingOptions {
  signal?: AbortSignal;
  onProgress?: (progress: GenerationProgress) => void;
  /** Called once the unique words are split into cached and missing. */
  onPartitioned?: (summary: { cached: number; missing: number }) => void;
  /** When false, misses are reported `skipped('not_cached')` and the provider is never called. */
  generateMissing?: boolean;
}

const CANCELLED_REASON = 'cancelled';

/** Unique word tokens in first-appearance order. */
export function uniqueWords(tokens: Token[]): string[] {
  const seen = new Set<string>();
  for (const token of tokens) {
    if (token.kind === 'word') seen.add(token.word);
  }
  return [...seen];
}

function linkedController(signal: AbortSignal | undefined): { controller: AbortController; unlink: () => void } {
  const controller = new AbortController();
  if (!signal) {
    return { controller, unlink: () => undefined };
  }

  const forward = () => controller.abort();
  if (signal.aborted) {
    controller.abort();
  } else {
    signal.addEventListener('abort', forward, { once: true });
  }
  return { controller, unlink: () => signal.removeEventListener('abort', forward) };
}

/**
 * Resolves every word of a token list to a clip, synthesizing cache misses
 * with bounded parallelism. Per-word failures are reported, never thrown.
 */
export class ConcurrentGenerator {
  private readonly cache: WordBankCache;
  private readonly provider: SynthesisProvider;
  private readonly logger: Logger;
  private readonly pool: WorkerPool;
  private readonly providerTimeoutMs: number;
  private readonly maxRetries: number;
  private readonly retryBaseDelayMs: number;
  private readonly retryJitterMs: number;
  /** Generations running right now, shared by overlapping requests for the same key. */
  private readonly inFlight = new Map<string, Promise<GenerationResult>>();

  public constructor(options: ConcurrentGeneratorOptions) {
    this.cache = options.cache;
    this.provider = options.provider;
    this.logger = options.logger;
    this.pool = new WorkerPool(options.concurrency ?? VOX_DEFAULTS.CONCURRENCY);
    this.providerTimeoutMs = options.providerTimeoutMs ?? VOX_DEFAULTS.PROVIDER_TIMEOUT_MS;
    this.maxRetries = options.maxRetries ?? VOX_DEFAULTS.MAX_RETRIES;
    this.retryBaseDelayMs = options.retryBaseDelayMs ?? VOX_DEFAULTS.RETRY_BASE_DELAY_MS;
    this.retryJitterMs = options.retryJitterMs ?? VOX_DEFAULTS.RETRY_JITTER_MS;
  }

  /**
   * Returns one result per unique word. Throws CancelledError when `signal`
   * fires; clips written before that stay in the cache.
   */
  public async generateMissing(
    tokens: Token[],
    voiceId: string,
    scopeId: string,
    options: GenerateMissingOptions = {}
  ): Promise<Map<string, GenerationResult>> {
    const { signal } = options;
    throwIfAborted(signal);

    const words = uniqueWords(tokens);
    const results = new Map<string, GenerationResult>();
    const progress: GenerationProgress = {
      total: words.length,
      cached: 0,
      generated: 0,
      failed: 0,
      skipped: 0,
      inFlight: 0
    };
    const report = (word?: string) => {
      options.onProgress?.({ ...progress, ...(word !== undefined ? { word } : {}) });
    };

    const missing: string[] = [];
    for (const word of words) {
      const clip = await this.cache.get({ scopeId, voiceId, word });
      if (clip) {
        results.set(word, { status: 'cached', clip });
        progress.cached += 1;
      } else {
        missing.push(word);
      }
    }
    options.onPartitioned?.({ cached: progress.cached, missing: missing.length });
    report();

    if (options.generateMissing === false) {
      for (const word of missing) {
        results.set(word, { status: 'skipped', reason: 'not_cached' });
        progress.skipped += 1;
        report(word);
      }
      return this.ordered(words, results);
    }

    await Promise.all(missing.map(async (word) => {
      const result = await this.resolve({ scopeId, voiceId, word }, signal, {
        onStart: () => {
          progress.inFlight += 1;
          report(word);
        },
        onSettle: () => {
          progress.inFlight -= 1;
        }
      });

      results.set(word, result);
      if (result.status === 'generated') progress.generated += 1;
      else if (result.status === 'cached') progress.cached += 1;
      else progress.failed += 1;
      report(word);
    }));

    throwIfAborted(signal);
    return this.ordered(words, results);
  }

  private ordered(words: string[], results: Map<string, GenerationResult>): Map<string, GenerationResult> {
    const ordered = new Map<string, GenerationResult>();
    for (const word of words) {
      const result = results.get(word);
      if (result) ordered.set(word, result);
    }
    return ordered;
  }

  private async resolve(
    key: CacheKey,
    signal: AbortSignal | undefined,
    hooks: { onStart: () => void; onSettle: () => void }
  ): Promise<GenerationResult> {
    const id = cacheKeyId(key);
    const shared = this.inFlight.get(id);
    if (shared) {
      let joined: GenerationResult;
      try {
        joined = await raceAbort(shared, signal);
      } catch (error) {
        if (error instanceof CancelledError) {
          return { status: 'failed', reason: CANCELLED_REASON };
        }
        throw error;
      }
      const cancelledElsewhere = joined.status === 'failed' && joined.reason === CANCELLED_REASON && !signal?.aborted;
      if (!cancelledElsewhere) {
        return joined.status === 'generated' ? { status: 'cached', clip: joined.clip } : joined;
      }
    }

    const task = this.dispatch(key, signal, hooks);
    this.inFlight.set(id, task);
    try {
      return await task;
    } finally {
      if (this.inFlight.get(id) === task) {
        this.inFlight.delete(id);
      }
    }
  }

  private async dispatch(
    key: CacheKey,
    signal: AbortSignal | undefined,
    hooks: { onStart: () => void; onSettle: () => void }
  ): Promise<GenerationResult> {
    try {
      return await this.pool.run(async () => {
        hooks.onStart();
        try {
          return await this.generate(key, signal);
        } finally {
          hooks.onSettle();
        }
      }, signal);
    } catch (error) {
      if (error instanceof CancelledError) {
        return { status: 'failed', reason: CANCELLED_REASON };
      }
      this.logger.warn({ word: key.word, voiceId: key.voiceId, error: errorMessage(error) }, 'Word generation failed');
      return { status: 'failed', reason: errorMessage(error) };
    }
  }

  private async generate(key: CacheKey, signal: AbortSignal | undefined): Promise<GenerationResult> {
    const startedAt = Date.now();

    const synthesized = await retryIdempotent({
      maxRetries: this.maxRetries,
      baseDelayMs: this.retryBaseDelayMs,
      jitterMs: this.retryJitterMs,
      signal,
      onRetry: ({ attempt, delayMs, error }) => {
        this.logger.debug({ word: key.word, attempt, delayMs, error: errorMessage(error) }, 'Retrying word synthesis');
      },
      run: async () => {
        const { controller, unlink } = linkedController(signal);
        try {
          return await withTimeout({
            label: `Synthesis of "${key.word}"`,
            timeoutMs: this.providerTimeoutMs,
            run: () => raceAbort(
              this.provider.synthesizeWord({ word: key.word, voiceId: key.voiceId, signal: controller.signal }),
              signal
            )
          });
        } finally {
          // stops a call that outlived its timeout
          controller.abort();
          unlink();
        }
      }
    });

    if (synthesized.audio.length === 0 || !isFrameAligned(synthesized.audio.length)) {
      return { status: 'failed', reason: `invalid_audio: ${synthesized.audio.length} bytes is not whole 4-byte frames` };
    }

    throwIfAborted(signal);
    const clip = await this.cache.put(key, synthesized.audio, synthesized.durationSeconds);
    this.logger.debug({ word: key.word, voiceId: key.voiceId, latencyMs: Date.now() - startedAt }, 'Word generated');
    return { status: 'generated', clip };
  }
}
