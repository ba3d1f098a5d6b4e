import { sleep } from './index';

export interface RateLimiterOptions {
  /** 桶容量，默认 1（不允许突发） */
  burst?: number;
  clock?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * 令牌桶限速器
 *
 * 所有并发调用方共享一个桶，按 FIFO 顺序排队领取令牌。
 */
export class RateLimiter {
  private readonly capacity: number;
  private readonly clock: () => number;
  private readonly wait: (ms: number) => Promise<void>;
  private tokens: number;
  private lastRefill: number;
  private queue: Promise<void> = Promise.resolve();

  constructor(private readonly ratePerSecond: number, options: RateLimiterOptions = {}) {
    this.capacity = Math.max(1, options.burst ?? 1);
    this.clock = options.clock ?? Date.now;
    this.wait = options.sleep ?? sleep;
    this.tokens = this.capacity;
    this.lastRefill = this.clock();
  }

  get unlimited(): boolean {
    return !(this.ratePerSecond > 0);
  }

  /**
   * 阻塞直到拿到一个令牌
   */
  acquire(): Promise<void> {
    if (this.unlimited) return Promise.resolve();

    const turn = this.queue.then(() => this.take());
    this.queue = turn;
    return turn;
  }

  private refill(): void {
    const now = this.clock();
    const elapsed = Math.max(0, now - this.lastRefill) / 1000;
    this.tokens = Math.min(this.capacity, this.tokens + elapsed * this.ratePerSecond);
    this.lastRefill = now;
  }

  private async take(): Promise<void> {
    this.refill();
    while (this.tokens < 1) {
      const deficit = 1 - this.tokens;
      await this.wait(Math.ceil((deficit / this.ratePerSecond) * 1000));
      this.refill();
    }
    this.tokens -= 1;
  }
}
