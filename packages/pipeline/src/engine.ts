import {
  type AudioEffectsProcessor,
  closeResources,
  type Logger,
  resolveVoxConfig,
  type RuntimeResource,
  startResources,
  type SynthesisOutcome,
  type SynthesisProvider,
  type SynthesisRequest,
  type SynthesizeOptions,
  type TokenizeResult,
  type TokenPreview,
  uniqueResources,
  type VoxConfig,
  type WordBankStore
} from '@vox/core';

import { ConcatenationEngine } from './concatenation';
import { FilterEngine } from './filter';
import { ConcurrentGenerator } from './generator';
import { VoxOrchestrator } from './orchestrator';
import { tokenize } from './tokenizer';
import { WordBankCache } from './wordBank';

export interface VoxEngineOptions {
  store: WordBankStore;
  provider: SynthesisProvider;
  effects: AudioEffectsProcessor;
  logger: Logger;
  config?: Partial<VoxConfig>;
}

export interface VoxEngine extends RuntimeResource {
  readonly config: VoxConfig;
  readonly cache: WordBankCache;
  readonly generator: ConcurrentGenerator;
  readonly orchestrator: VoxOrchestrator;
  start(): Promise<void>;
  close(): Promise<void>;
  tokenize(text: string): TokenizeResult;
  synthesize(request: SynthesisRequest, options?: SynthesizeOptions): Promise<SynthesisOutcome>;
  preview(text: string, voiceId: string, scopeId: string): Promise<TokenPreview>;
}

/**
 * Wires cache, generator, concatenation, filter and orchestrator over the
 * given adapters. `start()` starts the provider and effects processor, then
 * the cache (which starts its store); `close()` runs in reverse.
 */
export function createVoxEngine(options: VoxEngineOptions): VoxEngine {
  const config = resolveVoxConfig(options.config);
  const logger = options.logger;

  const cache = new WordBankCache({
    store: options.store,
    logger: logger.child({ component: 'word-bank' }),
    maxWordLength: config.maxWordLength
  });
  const generator = new ConcurrentGenerator({
    cache,
    provider: options.provider,
    logger: logger.child({ component: 'generator' }),
    concurrency: config.concurrency,
    providerTimeoutMs: config.providerTimeoutMs,
    maxRetries: config.maxRetries,
    retryBaseDelayMs: config.retryBaseDelayMs,
    retryJitterMs: config.retryJitterMs
  });
  const orchestrator = new VoxOrchestrator({
    cache,
    generator,
    concatenation: new ConcatenationEngine({ wordGapMs: config.wordGapMs, pauseMode: config.pauseMode }),
    filter: new FilterEngine({ processor: options.effects, logger: logger.child({ component: 'filter' }) }),
    config,
    logger: logger.child({ component: 'orchestrator' })
  });

  const resources = uniqueResources([options.provider, options.effects, cache]);
  let started = false;

  return {
    config,
    cache,
    generator,
    orchestrator,

    async start(): Promise<void> {
      if (started) return;
      await startResources(resources);
      started = true;
      logger.info({ cacheDir: config.cacheDir, concurrency: config.concurrency }, 'Vox engine started');
    },

    async close(): Promise<void> {
      if (!started) return;
      await closeResources(resources);
      started = false;
      logger.info('Vox engine closed');
    },

    tokenize(text: string): TokenizeResult {
      return tokenize(text, {
        contractions: config.contractions,
        expandNumbers: config.expandNumbers,
        maxWordLength: config.maxWordLength
      });
    },

    synthesize(request, synthesizeOptions) {
      return orchestrator.synthesize(request, synthesizeOptions);
    },

    preview(text, voiceId, scopeId) {
      return orchestrator.preview(text, voiceId, scopeId);
    }
  };
}
