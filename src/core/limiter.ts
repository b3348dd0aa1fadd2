import { PipelineError, describeAbortReason } from "./errors.js";

interface Waiter {
  resolve: () => void;
  reject: (err: PipelineError) => void;
  signal?: AbortSignal;
  onAbort?: () => void;
}

/**
 * Caps how many pipelines may fetch at once.
 * Shared across requests; waiting for a slot is cancellable.
 */
export class ConcurrencyLimiter {
  private active = 0;
  private readonly queue: Waiter[] = [];

  constructor(readonly limit: number) {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new RangeError(`limit must be a positive integer, got ${limit}`);
    }
  }

  get pending(): number {
    return this.queue.length;
  }

  get running(): number {
    return this.active;
  }

  async run<T>(fn: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    await this.acquire(signal);
    try {
      return await fn();
    } finally {
      this.release();
    }
  }

  private acquire(signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      return Promise.reject(abortedWhileWaiting(signal));
    }
    if (this.active < this.limit) {
      this.active++;
      return Promise.resolve();
    }

    return new Promise<void>((resolve, reject) => {
      const waiter: Waiter = { resolve, reject, signal };
      if (signal) {
        waiter.onAbort = () => {
          const index = this.queue.indexOf(waiter);
          if (index !== -1) this.queue.splice(index, 1);
          reject(abortedWhileWaiting(signal));
        };
        signal.addEventListener("abort", waiter.onAbort, { once: true });
      }
      this.queue.push(waiter);
    });
  }

  private release(): void {
    const next = this.queue.shift();
    if (!next) {
      this.active--;
      return;
    }
    // Slot passes straight to the next waiter
    if (next.signal && next.onAbort) {
      next.signal.removeEventListener("abort", next.onAbort);
    }
    next.resolve();
  }
}

function abortedWhileWaiting(signal: AbortSignal): PipelineError {
  return new PipelineError("timeout", `Aborted while waiting for a fetch slot: ${describeAbortReason(signal)}`);
}
