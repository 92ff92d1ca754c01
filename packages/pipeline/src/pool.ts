import { CancelledError } from '@vox/core';

interface QueuedTask {
  start: () => void;
  cancel: () => void;
}

/**
 * Runs tasks with at most `concurrency` in flight. Queued tasks whose signal
 * fires are rejected with CancelledError and never start.
 */
export class WorkerPool {
  private readonly concurrency: number;
  private readonly queue: QueuedTask[] = [];
  private active = 0;

  public constructor(concurrency: number) {
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new RangeError(`Pool concurrency must be a positive integer, got ${concurrency}`);
    }
    this.concurrency = concurrency;
  }

  public get inFlightCount(): number {
    return this.active;
  }

  public get pendingCount(): number {
    return this.queue.length;
  }

  public run<T>(task: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    if (signal?.aborted) {
      return Promise.reject(new CancelledError());
    }

    return new Promise<T>((resolve, reject) => {
      const queued: QueuedTask = {
        start: () => {
          signal?.removeEventListener('abort', onAbort);
          this.active += 1;
          void Promise.resolve()
            .then(task)
            .then(resolve, reject)
            .finally(() => {
              this.active -= 1;
              this.drain();
            });
        },
        cancel: () => {
          reject(new CancelledError());
        }
      };

      const onAbort = () => {
        const position = this.queue.indexOf(queued);
        if (position !== -1) {
          this.queue.splice(position, 1);
          queued.cancel();
        }
      };

      signal?.addEventListener('abort', onAbort, { once: true });
      this.queue.push(queued);
      this.drain();
    });
  }

  private drain(): void {
    while (this.active < this.concurrency) {
      const next = this.queue.shift();
      if (!next) {
        return;
      }
      next.start();
    }
  }
}
