import { CancelledError, ProviderError, TimeoutError } from '../errors';
import { sleep } from './abort';

interface RetryIdempotentInput<T> {
  run: (attempt: number) => Promise<T>;
  maxRetries: number;
  baseDelayMs: number;
  jitterMs: number;
  isRetryable?: (error: unknown) => boolean;
  onRetry?: (event: { attempt: number; delayMs: number; error: unknown }) => void;
  signal?: AbortSignal;
}

export function defaultIsRetryable(error: unknown): boolean {
  if (error instanceof CancelledError) return false;
  if (error instanceof TimeoutError) return true;
  if (error instanceof ProviderError) return error.retryable;

  const message = error instanceof Error ? error.message.toLowerCase() : String(error).toLowerCase();
  return (
    message.includes('timeout')
    || message.includes('temporar')
    || message.includes('network')
    || message.includes('econnreset')
    || message.includes('econnrefused')
    || message.includes('429')
    || message.includes('rate limit')
    || message.includes('503')
  );
}

function nextDelayMs(baseDelayMs: number, jitterMs: number, attempt: number): number {
  const expo = baseDelayMs * Math.pow(2, attempt);
  const jitter = jitterMs > 0 ? Math.floor(Math.random() * (jitterMs + 1)) : 0;
  return expo + jitter;
}

export async function retryIdempotent<T>(input: RetryIdempotentInput<T>): Promise<T> {
  const isRetryable = input.isRetryable ?? defaultIsRetryable;

  for (let attempt = 0; attempt <= input.maxRetries; attempt += 1) {
    try {
      return await input.run(attempt);
    } catch (error) {
      const exhausted = attempt >= input.maxRetries;
      if (exhausted || input.signal?.aborted || !isRetryable(error)) {
        throw error;
      }

      const delayMs = nextDelayMs(input.baseDelayMs, input.jitterMs, attempt);
      input.onRetry?.({ attempt, delayMs, error });
      await sleep(delayMs, input.signal);
    }
  }

  throw new Error('retryIdempotent exhausted unexpectedly');
}
