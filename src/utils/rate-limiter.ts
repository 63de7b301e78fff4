/**
 * Rate limiter with adaptive concurrency
 * Slows down when a collaborator reports rate limiting (429)
 */
import { logger } from './logger.js';
import { sleep } from './retry-handler.js';

interface RateLimitConfig {
  maxConcurrent: number;
  baseDelayMs: number;
  adaptive?: boolean;
  recoveryMs?: number;
}

interface RateLimitState {
  currentConcurrent: number;
  currentDelayMs: number;
  lastRateLimitTime: number | null;
  rateLimitCount: number;
}

type Task = () => Promise<void>;

export class RateLimiter {
  private queue: Task[] = [];
  private running = 0;
  private config: Required<RateLimitConfig>;
  private state: RateLimitState;
  private recoveryTimer: NodeJS.Timeout | null = null;

  constructor(config: RateLimitConfig) {
    this.config = {
      adaptive: true,
      recoveryMs: 5 * 60 * 1000,
      ...config,
    };

    this.state = {
      currentConcurrent: config.maxConcurrent,
      currentDelayMs: config.baseDelayMs,
      lastRateLimitTime: null,
      rateLimitCount: 0,
    };
  }

  /**
   * Execute a function once a slot is free
   */
  execute<T>(fn: () => Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      this.queue.push(async () => {
        try {
          resolve(await fn());
        } catch (error) {
          reject(error);
        }
      });

      this.drain();
    });
  }

  /**
   * Report a rate limit hit (429)
   * Halves concurrency and doubles the delay until the recovery window passes
   */
  reportRateLimit(): void {
    if (!this.config.adaptive) return;

    this.state.rateLimitCount++;
    this.state.lastRateLimitTime = Date.now();

    const oldConcurrent = this.state.currentConcurrent;
    this.state.currentConcurrent = Math.max(1, Math.floor(this.state.currentConcurrent / 2));

    const oldDelay = this.state.currentDelayMs;
    this.state.currentDelayMs = Math.min(2000, Math.max(this.state.currentDelayMs * 2, 100));

    logger.warn(`Rate limit detected! Adjusting: concurrent ${oldConcurrent}→${this.state.currentConcurrent}, delay ${oldDelay}ms→${this.state.currentDelayMs}ms`);

    if (this.recoveryTimer) clearTimeout(this.recoveryTimer);
    this.recoveryTimer = setTimeout(() => {
      this.state.currentConcurrent = this.config.maxConcurrent;
      this.state.currentDelayMs = this.config.baseDelayMs;
      this.state.rateLimitCount = 0;
      this.recoveryTimer = null;
      logger.info('Rate limit reset to normal levels');
    }, this.config.recoveryMs);
    this.recoveryTimer.unref();
  }

  getStats(): RateLimitState {
    return { ...this.state };
  }

  private drain(): void {
    while (this.running < this.state.currentConcurrent) {
      const task = this.queue.shift();
      if (!task) return;

      this.running++;
      void this.run(task);
    }
  }

  private async run(task: Task): Promise<void> {
    try {
      await task();
    } finally {
      if (this.queue.length > 0 && this.state.currentDelayMs > 0) {
        await sleep(this.state.currentDelayMs);
      }
      this.running--;
      this.drain();
    }
  }
}

/**
 * Create a rate limiter with default settings
 */
export function createRateLimiter(maxConcurrent = 4, baseDelayMs = 0): RateLimiter {
  return new RateLimiter({
    maxConcurrent,
    baseDelayMs,
    adaptive: true,
  });
}
