export type VoxErrorCode =
  | 'validation'
  | 'provider'
  | 'zero_match'
  | 'concatenation'
  | 'filter'
  | 'archive'
  | 'storage'
  | 'cancelled'
  | 'timeout';

export class VoxError extends Error {
  public readonly code: VoxErrorCode;

  public constructor(code: VoxErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'VoxError';
    this.code = code;
  }
}

export interface ValidationIssue {
  path   : string;
  message: string;
}

export class ValidationError extends VoxError {
  public readonly issues: ValidationIssue[];

  public constructor(message: string, issues: ValidationIssue[] = []) {
    super('validation', message);
    this.name   = 'ValidationError';
    this.issues = issues;
  }
}

export class ProviderError extends VoxError {
  public readonly word     : string;
  public readonly retryable: boolean;

  public constructor(options: { word: string; message: string; retryable?: boolean; cause?: unknown }) {
    super('provider', options.message, { cause: options.cause });
    this.name      = 'ProviderError';
    this.word      = options.word;
    this.retryable = options.retryable ?? false;
  }
}

export class ZeroMatchError extends VoxError {
  public constructor(message = 'No content to synthesize: none of the words could be resolved.') {
    super('zero_match', message);
    this.name = 'ZeroMatchError';
  }
}

export class ConcatenationError extends VoxError {
  public constructor(message: string, options?: { cause?: unknown }) {
    super('concatenation', message, options);
    this.name = 'ConcatenationError';
  }
}

export class FilterError extends VoxError {
  public constructor(message: string, options?: { cause?: unknown }) {
    super('filter', message, options);
    this.name = 'FilterError';
  }
}

export class ArchiveError extends VoxError {
  public constructor(message: string) {
    super('archive', message);
    this.name = 'ArchiveError';
  }
}

export class StorageError extends VoxError {
  public constructor(message: string, options?: { cause?: unknown }) {
    super('storage', message, options);
    this.name = 'StorageError';
  }
}

export class CancelledError extends VoxError {
  public constructor(message = 'Operation was cancelled.') {
    super('cancelled', message);
    this.name = 'CancelledError';
  }
}

export class TimeoutError extends VoxError {
  public readonly timeoutMs: number;

  public constructor(label: string, timeoutMs: number) {
    super('timeout', `${label} timed out after ${timeoutMs}ms`);
    this.name      = 'TimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Passes VoxErrors through; anything else becomes a StorageError. */
export function toVoxError(error: unknown): VoxError {
  return error instanceof VoxError ? error : new StorageError(errorMessage(error), { cause: error });
}
