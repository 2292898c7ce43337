import type { LLMRateLimitConfig } from "./llmTypes.js";

const WINDOW_MS = 60_000;

export class LLMTimeoutError extends Error {
  constructor(timeoutMs: number) {
    super(`LLM request timeout after ${timeoutMs}ms`);
    this.name = "LLMTimeoutError";
  }
}

/**
 * Gate in front of every model call: bounded concurrency, a sliding
 * one-minute request budget and a per-call timeout. A failed call is
 * surfaced to the caller as is; nothing is retried here.
 */
export class LLMRateLimiter {
  private readonly config: LLMRateLimitConfig;
  private active = 0;
  private readonly slotWaiters: Array<() => void> = [];
  private readonly startTimes: number[] = [];

  constructor(config: Partial<LLMRateLimitConfig> = {}) {
    this.config = {
      maxConcurrent: Math.max(1, config.maxConcurrent ?? 5),
      requestsPerMinute: Math.max(1, config.requestsPerMinute ?? 60),
      timeoutMs: config.timeoutMs ?? 60_000
    };
  }

  async run<T>(task: () => Promise<T>): Promise<T> {
    await this.acquireSlot();
    try {
      await this.awaitWindowBudget();
      return await withTimeout(task(), this.config.timeoutMs);
    } finally {
      this.releaseSlot();
    }
  }

  private async acquireSlot(): Promise<void> {
    while (this.active >= this.config.maxConcurrent) {
      await new Promise<void>((resolve) => {
        this.slotWaiters.push(resolve);
      });
    }
    this.active += 1;
  }

  private releaseSlot(): void {
    this.active -= 1;
    this.slotWaiters.shift()?.();
  }

  private async awaitWindowBudget(): Promise<void> {
    while (true) {
      const now = Date.now();
      while ((this.startTimes[0] ?? Number.POSITIVE_INFINITY) <= now - WINDOW_MS) {
        this.startTimes.shift();
      }

      const oldest = this.startTimes[0];
      if (oldest === undefined || this.startTimes.length < this.config.requestsPerMinute) {
        this.startTimes.push(now);
        return;
      }

      await delay(oldest + WINDOW_MS - now);
    }
  }
}

function withTimeout<T>(promise: Promise<T>, timeoutMs: number): Promise<T> {
  if (timeoutMs <= 0) {
    return promise;
  }

  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => reject(new LLMTimeoutError(timeoutMs)), timeoutMs);
  });

  return Promise.race([promise, timeout]).finally(() => {
    clearTimeout(timer);
  });
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => {
    setTimeout(resolve, ms);
  });
}
