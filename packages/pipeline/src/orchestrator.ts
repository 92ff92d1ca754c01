import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import {
  CancelledError,
  durationFromBytes,
  errorMessage,
  type GenerationResult,
  type Logger,
  MAX_PAUSE_MS,
  resolvedClip,
  type SkippedWord,
  type SynthesisCounts,
  type SynthesisOutcome,
  type SynthesisProgressEvent,
  type SynthesisRequest,
  type SynthesisStage,
  type SynthesizeOptions,
  throwIfAborted,
  type Token,
  type TokenPreview,
  toVoxError,
  ValidationError,
  type VoxConfig,
  VoxError,
  WORD_GAP_LIMITS,
  ZeroMatchError
} from '@vox/core';

import type { Composition, ConcatenationEngine } from './concatenation';
import { FilterSpecSchema, type FilterEngine } from './filter';
import type { ConcurrentGenerator } from './generator';
import { tokenize, validateWord, wordCount } from './tokenizer';
import type { WordBankCache } from './wordBank';

type RunningStage = Exclude<SynthesisStage, 'done' | 'failed'>;

const TokenSchema = z.object({
  word: z.string(),
  kind: z.enum(['word', 'pause']),
  pauseDurationMs: z.number().min(0).max(MAX_PAUSE_MS),
  position: z.number().int().min(0)
});

const SynthesisRequestSchema = z.object({
  input: z.union([
    z.object({ text: z.string() }),
    z.object({ tokens: z.array(TokenSchema) })
  ]),
  voiceId: z.string().trim().min(1),
  scopeId: z.string().trim().min(1),
  filter: FilterSpecSchema.optional(),
  wordGapMs: z.number().int().min(WORD_GAP_LIMITS.MIN_MS).max(WORD_GAP_LIMITS.MAX_MS).optional(),
  generateMissing: z.boolean().optional()
});

export type OrchestratorConfig = Pick<
  VoxConfig,
  'wordGapMs' | 'pauseMode' | 'maxMessageLength' | 'maxMessageWords' | 'maxWordLength' | 'contractions' | 'expandNumbers'
>;

export interface VoxOrchestratorOptions {
  cache: WordBankCache;
  generator: ConcurrentGenerator;
  concatenation: ConcatenationEngine;
  filter: FilterEngine;
  config: OrchestratorConfig;
  logger: Logger;
}

interface PreparedTokens {
  tokens: Token[];
  skippedWords: SkippedWord[];
}

class StageFailure extends Error {
  public constructor(public readonly stage: RunningStage, public readonly error: VoxError) {
    super(error.message);
  }
}

function failureReason(result: GenerationResult | undefined): string | null {
  if (!result) return 'generation:missing_result';
  if (result.status === 'failed') return `generation:${result.reason}`;
  if (result.status === 'skipped') return result.reason;
  return null;
}

/**
 * Runs one request through tokenizing, cache checks, generation,
 * concatenation and filtering. Failures come back as outcomes, never throws.
 */
export class VoxOrchestrator {
  private readonly cache: WordBankCache;
  private readonly generator: ConcurrentGenerator;
  private readonly concatenation: ConcatenationEngine;
  private readonly filter: FilterEngine;
  private readonly config: OrchestratorConfig;
  private readonly logger: Logger;

  public constructor(options: VoxOrchestratorOptions) {
    this.cache = options.cache;
    this.generator = options.generator;
    this.concatenation = options.concatenation;
    this.filter = options.filter;
    this.config = options.config;
    this.logger = options.logger;
  }

  public async synthesize(request: SynthesisRequest, options: SynthesizeOptions = {}): Promise<SynthesisOutcome> {
    const requestId = randomUUID();
    const startedAt = Date.now();
    const { signal, onProgress } = options;
    const log = this.logger.child({ requestId, scopeId: request.scopeId, voiceId: request.voiceId });

    let stage: RunningStage = 'tokenizing';
    let matchedWords: string[] = [];
    let skippedWords: SkippedWord[] = [];

    const emit = (event: SynthesisProgressEvent) => {
      try {
        onProgress?.(event);
      } catch (error) {
        log.warn({ error: errorMessage(error) }, 'Progress listener threw');
      }
    };
    const enter = (next: RunningStage) => {
      throwIfAborted(signal);
      stage = next;
      emit({ type: 'stage', requestId, stage: next });
    };

    try {
      enter('tokenizing');
      const parsed = this.parseRequest(request);
      const prepared = this.prepareTokens(parsed.input);
      skippedWords = prepared.skippedWords;

      const wordTokens = prepared.tokens.filter((token) => token.kind === 'word');
      if (wordTokens.length === 0) {
        throw new StageFailure('tokenizing', new ZeroMatchError('No content to synthesize: the message has no valid words.'));
      }

      enter('checking_cache');
      const results = await this.generator.generateMissing(prepared.tokens, parsed.voiceId, parsed.scopeId, {
        signal,
        generateMissing: parsed.generateMissing ?? true,
        onPartitioned: (summary) => {
          log.debug(summary, 'Cache checked');
          enter('generating');
        },
        onProgress: (progress) => emit({ type: 'generation', requestId, progress })
      });

      const composition: Composition = [];
      const wordSkips: SkippedWord[] = [];
      for (const token of prepared.tokens) {
        if (token.kind === 'pause') {
          composition.push({ kind: 'pause', durationMs: token.pauseDurationMs });
          continue;
        }

        const result = results.get(token.word);
        const clip = resolvedClip(result);
        if (clip) {
          composition.push({ kind: 'word', clip });
          matchedWords.push(token.word);
        } else {
          wordSkips.push({ word: token.word, position: token.position, reason: failureReason(result) ?? 'unresolved' });
        }
      }
      skippedWords = [...skippedWords, ...wordSkips].sort((a, b) => a.position - b.position);

      if (matchedWords.length === 0) {
        throw new StageFailure(stage, new ZeroMatchError());
      }

      enter('concatenating');
      const assembled = this.concatenation.concatenate(composition, {
        wordGapMs: parsed.wordGapMs ?? this.config.wordGapMs,
        pauseMode: this.config.pauseMode
      });

      enter('filtering');
      const buffer = await this.filter.apply(assembled.buffer, parsed.filter ?? { kind: 'preset', preset: 'off' }, signal);
      throwIfAborted(signal);

      const counts = this.countResults(results);
      emit({ type: 'stage', requestId, stage: 'done' });
      log.info(
        { matched: matchedWords.length, ...counts, bytes: buffer.length, latencyMs: Date.now() - startedAt },
        'Synthesis completed'
      );

      return {
        ok: true,
        stage: 'done',
        requestId,
        buffer,
        matchedWords,
        skippedWords,
        durationEstimate: durationFromBytes(buffer.length),
        counts
      };
    } catch (caught) {
      const failedStage = caught instanceof StageFailure ? caught.stage : stage;
      const error = caught instanceof StageFailure ? caught.error : toVoxError(caught);

      emit({ type: 'stage', requestId, stage: 'failed' });
      const details = { stage: failedStage, code: error.code, error: error.message };
      if (error instanceof CancelledError) {
        log.info(details, 'Synthesis cancelled');
      } else {
        log.warn(details, 'Synthesis failed');
      }

      return { ok: false, stage: failedStage, requestId, error, matchedWords, skippedWords };
    }
  }

  /** Per-token availability and a duration estimate; never calls the provider. */
  public async preview(text: string, voiceId: string, scopeId: string): Promise<TokenPreview> {
    if (!text.trim()) {
      return { tokens: [], invalidWords: [], matchedCount: 0, skippedCount: 0, estimatedDurationSeconds: 0 };
    }

    const result = this.tokenizeText(text);
    const preview: TokenPreview = {
      tokens: [],
      invalidWords: result.errors.map((issue) => ({
        word: issue.word,
        position: issue.position,
        reason: `validation:${issue.reason}`
      })),
      matchedCount: 0,
      skippedCount: result.errors.length,
      estimatedDurationSeconds: 0
    };

    for (const token of result.tokens) {
      if (token.kind !== 'word') continue;

      const metadata = await this.cache.getMetadata({ scopeId, voiceId, word: token.word });
      preview.tokens.push({
        word: token.word,
        position: token.position,
        hasClip: metadata !== null,
        durationSeconds: metadata?.durationSeconds ?? 0
      });
      if (metadata) {
        preview.matchedCount += 1;
        preview.estimatedDurationSeconds += metadata.durationSeconds;
      } else {
        preview.skippedCount += 1;
      }
    }

    if (preview.matchedCount > 1) {
      preview.estimatedDurationSeconds += (preview.matchedCount - 1) * (this.config.wordGapMs / 1000);
    }
    return preview;
  }

  private parseRequest(request: SynthesisRequest): z.infer<typeof SynthesisRequestSchema> {
    const parsed = SynthesisRequestSchema.safeParse(request);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message }));
      const detail = issues.map((issue) => `${issue.path}: ${issue.message}`).join('; ');
      throw new StageFailure('tokenizing', new ValidationError(`Invalid synthesis request: ${detail}`, issues));
    }
    return parsed.data;
  }

  private tokenizeText(text: string) {
    return tokenize(text, {
      contractions: this.config.contractions,
      expandNumbers: this.config.expandNumbers,
      maxWordLength: this.config.maxWordLength
    });
  }

  private prepareTokens(input: z.infer<typeof SynthesisRequestSchema>['input']): PreparedTokens {
    if ('tokens' in input) {
      const tokens: Token[] = [];
      const skippedWords: SkippedWord[] = [];
      for (const token of input.tokens) {
        const reason = token.kind === 'word' ? validateWord(token.word, this.config.maxWordLength) : null;
        if (reason) {
          skippedWords.push({ word: token.word, position: token.position, reason: `validation:${reason}` });
        } else {
          tokens.push(token);
        }
      }
      this.assertWordLimit(new Set(input.tokens.filter((token) => token.kind === 'word').map((token) => token.position)).size);
      return { tokens, skippedWords };
    }

    const text = input.text.trim();
    if (!text) {
      throw new StageFailure('tokenizing', new ValidationError('Message text must not be empty', [
        { path: 'input.text', message: 'must not be empty' }
      ]));
    }
    if (text.length > this.config.maxMessageLength) {
      throw new StageFailure('tokenizing', new ValidationError(
        `Message exceeds maximum length of ${this.config.maxMessageLength} characters.`,
        [{ path: 'input.text', message: `must be at most ${this.config.maxMessageLength} characters` }]
      ));
    }

    const result = this.tokenizeText(text);
    this.assertWordLimit(wordCount(result));
    return {
      tokens: result.tokens,
      skippedWords: result.errors.map((issue) => ({
        word: issue.word,
        position: issue.position,
        reason: `validation:${issue.reason}`
      }))
    };
  }

  private assertWordLimit(count: number): void {
    if (count > this.config.maxMessageWords) {
      throw new StageFailure('tokenizing', new ValidationError(
        `Message exceeds maximum word count of ${this.config.maxMessageWords} words.`,
        [{ path: 'input', message: `has ${count} words` }]
      ));
    }
  }

  private countResults(results: Map<string, GenerationResult>): SynthesisCounts {
    const counts: SynthesisCounts = { cached: 0, generated: 0, failed: 0, skipped: 0 };
    for (const result of results.values()) {
      counts[result.status] += 1;
    }
    return counts;
  }
}
