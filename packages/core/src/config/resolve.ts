import { z } from 'zod';

import { ValidationError } from '../errors';
import { LOGGING_DEFAULTS, VOX_DEFAULTS, WORD_GAP_LIMITS } from './defaults';
import type { VoxConfig } from './types';

const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal'] as const;

export const VoxConfigSchema = z.object({
  cacheDir         : z.string().min(1),
  concurrency      : z.number().int().min(1).max(32),
  wordGapMs        : z.number().int().min(WORD_GAP_LIMITS.MIN_MS).max(WORD_GAP_LIMITS.MAX_MS),
  pauseMode        : z.enum(['additive', 'override']),
  maxMessageLength : z.number().int().positive(),
  maxMessageWords  : z.number().int().positive(),
  maxWordLength    : z.number().int().positive(),
  providerTimeoutMs: z.number().int().positive(),
  maxRetries       : z.number().int().min(0).max(10),
  retryBaseDelayMs : z.number().int().min(0),
  retryJitterMs    : z.number().int().min(0),
  contractions     : z.enum(['join', 'reject']),
  expandNumbers    : z.boolean(),
  logLevel         : z.enum(LOG_LEVELS),
  prettyLogs       : z.boolean()
});

const envFlag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform((value) => value === 'true' || value === '1' || value === 'yes');

const VoxEnvSchema = z.object({
  VOX_CACHE_DIR          : z.string().min(1).optional(),
  VOX_CONCURRENCY        : z.coerce.number().optional(),
  VOX_WORD_GAP_MS        : z.coerce.number().optional(),
  VOX_PAUSE_MODE         : z.enum(['additive', 'override']).optional(),
  VOX_MAX_MESSAGE_LENGTH : z.coerce.number().optional(),
  VOX_MAX_MESSAGE_WORDS  : z.coerce.number().optional(),
  VOX_MAX_WORD_LENGTH    : z.coerce.number().optional(),
  VOX_PROVIDER_TIMEOUT_MS: z.coerce.number().optional(),
  VOX_MAX_RETRIES        : z.coerce.number().optional(),
  VOX_RETRY_BASE_DELAY_MS: z.coerce.number().optional(),
  VOX_RETRY_JITTER_MS    : z.coerce.number().optional(),
  VOX_CONTRACTIONS       : z.enum(['join', 'reject']).optional(),
  VOX_EXPAND_NUMBERS     : envFlag.optional(),
  VOX_LOG_LEVEL          : z.enum(LOG_LEVELS).optional(),
  VOX_PRETTY_LOGS        : envFlag.optional()
});

function toValidationError(prefix: string, error: z.ZodError): ValidationError {
  const issues = error.issues.map((issue) => ({
    path   : issue.path.length > 0 ? issue.path.join('.') : '(root)',
    message: issue.message
  }));
  const detail = issues.map((issue) => `${issue.path}: ${issue.message}`).join('; ');
  return new ValidationError(`${prefix}: ${detail}`, issues);
}

/** Fills defaults for anything `overrides` leaves out and validates the result. */
export function resolveVoxConfig(overrides: Partial<VoxConfig> = {}): VoxConfig {
  const resolved: VoxConfig = {
    cacheDir         : overrides.cacheDir          ?? VOX_DEFAULTS.CACHE_DIR,
    concurrency      : overrides.concurrency       ?? VOX_DEFAULTS.CONCURRENCY,
    wordGapMs        : overrides.wordGapMs         ?? VOX_DEFAULTS.WORD_GAP_MS,
    pauseMode        : overrides.pauseMode         ?? VOX_DEFAULTS.PAUSE_MODE,
    maxMessageLength : overrides.maxMessageLength  ?? VOX_DEFAULTS.MAX_MESSAGE_LENGTH,
    maxMessageWords  : overrides.maxMessageWords   ?? VOX_DEFAULTS.MAX_MESSAGE_WORDS,
    maxWordLength    : overrides.maxWordLength     ?? VOX_DEFAULTS.MAX_WORD_LENGTH,
    providerTimeoutMs: overrides.providerTimeoutMs ?? VOX_DEFAULTS.PROVIDER_TIMEOUT_MS,
    maxRetries       : overrides.maxRetries        ?? VOX_DEFAULTS.MAX_RETRIES,
    retryBaseDelayMs : overrides.retryBaseDelayMs  ?? VOX_DEFAULTS.RETRY_BASE_DELAY_MS,
    retryJitterMs    : overrides.retryJitterMs     ?? VOX_DEFAULTS.RETRY_JITTER_MS,
    contractions     : overrides.contractions      ?? VOX_DEFAULTS.CONTRACTIONS,
    expandNumbers    : overrides.expandNumbers     ?? VOX_DEFAULTS.EXPAND_NUMBERS,
    logLevel         : overrides.logLevel          ?? LOGGING_DEFAULTS.LEVEL,
    prettyLogs       : overrides.prettyLogs        ?? LOGGING_DEFAULTS.PRETTY_PRINT
  };

  const parsed = VoxConfigSchema.safeParse(resolved);
  if (!parsed.success) {
    throw toValidationError('Invalid vox config', parsed.error);
  }

  return parsed.data;
}

/** Reads `VOX_*` variables from `env`; unset ones fall back to defaults. */
export function loadVoxConfig(env: Record<string, string | undefined> = process.env): VoxConfig {
  const parsed = VoxEnvSchema.safeParse(env);
  if (!parsed.success) {
    throw toValidationError('Invalid vox environment', parsed.error);
  }

  const vars = parsed.data;
  const overrides: Partial<VoxConfig> = {};
  if (vars.VOX_CACHE_DIR !== undefined) overrides.cacheDir = vars.VOX_CACHE_DIR;
  if (vars.VOX_CONCURRENCY !== undefined) overrides.concurrency = vars.VOX_CONCURRENCY;
  if (vars.VOX_WORD_GAP_MS !== undefined) overrides.wordGapMs = vars.VOX_WORD_GAP_MS;
  if (vars.VOX_PAUSE_MODE !== undefined) overrides.pauseMode = vars.VOX_PAUSE_MODE;
  if (vars.VOX_MAX_MESSAGE_LENGTH !== undefined) overrides.maxMessageLength = vars.VOX_MAX_MESSAGE_LENGTH;
  if (vars.VOX_MAX_MESSAGE_WORDS !== undefined) overrides.maxMessageWords = vars.VOX_MAX_MESSAGE_WORDS;
  if (vars.VOX_MAX_WORD_LENGTH !== undefined) overrides.maxWordLength = vars.VOX_MAX_WORD_LENGTH;
  if (vars.VOX_PROVIDER_TIMEOUT_MS !== undefined) overrides.providerTimeoutMs = vars.VOX_PROVIDER_TIMEOUT_MS;
  if (vars.VOX_MAX_RETRIES !== undefined) overrides.maxRetries = vars.VOX_MAX_RETRIES;
  if (vars.VOX_RETRY_BASE_DELAY_MS !== undefined) overrides.retryBaseDelayMs = vars.VOX_RETRY_BASE_DELAY_MS;
  if (vars.VOX_RETRY_JITTER_MS !== undefined) overrides.retryJitterMs = vars.VOX_RETRY_JITTER_MS;
  if (vars.VOX_CONTRACTIONS !== undefined) overrides.contractions = vars.VOX_CONTRACTIONS;
  if (vars.VOX_EXPAND_NUMBERS !== undefined) overrides.expandNumbers = vars.VOX_EXPAND_NUMBERS;
  if (vars.VOX_LOG_LEVEL !== undefined) overrides.logLevel = vars.VOX_LOG_LEVEL;
  if (vars.VOX_PRETTY_LOGS !== undefined) overrides.prettyLogs = vars.VOX_PRETTY_LOGS;

  return resolveVoxConfig(overrides);
}
