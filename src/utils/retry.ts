import { logger, sleep, errorMessage } from './index';
import { isRetryable } from './errors';

export interface RetryOptions {
  /** 总尝试次数（含首次） */
  maxAttempts: number;
  baseDelay: number;
  maxDelay: number;
  /** 抖动比例 0-1，延迟在 [d*(1-j), d*(1+j)] 内浮动 */
  jitter: number;
  isRetryable?: (error: unknown) => boolean;
  /** 每次尝试前调用，通常是限速器的 acquire */
  beforeAttempt?: () => Promise<void>;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
}

/**
 * 指数退避重试策略，抓取与翻译共用
 */
export class RetryPolicy {
  private readonly options: Required<Omit<RetryOptions, 'beforeAttempt'>> &
    Pick<RetryOptions, 'beforeAttempt'>;

  constructor(options: RetryOptions) {
    this.options = {
      isRetryable,
      sleep,
      random: Math.random,
      ...options,
      maxAttempts: Math.max(1, Math.floor(options.maxAttempts)),
    };
  }

  /**
   * 第 attempt 次失败后的等待时间（attempt 从 1 开始）
   */
  delayFor(attempt: number): number {
    const { baseDelay, maxDelay, jitter, random } = this.options;
    const exponential = Math.min(maxDelay, baseDelay * 2 ** (attempt - 1));
    const spread = 1 + jitter * (random() * 2 - 1);
    return Math.max(0, Math.round(exponential * spread));
  }

  /**
   * 执行 fn，可重试错误按策略重试，其余错误直接抛出
   */
  async execute<T>(fn: (attempt: number) => Promise<T>, label = 'request'): Promise<T> {
    const { maxAttempts, beforeAttempt } = this.options;

    for (let attempt = 1; ; attempt++) {
      if (beforeAttempt) await beforeAttempt();
      try {
        return await fn(attempt);
      } catch (error) {
        if (attempt >= maxAttempts || !this.options.isRetryable(error)) {
          throw error;
        }
        const delay = this.delayFor(attempt);
        logger.warn(
          `${label} 第 ${attempt}/${maxAttempts} 次失败，${delay}ms 后重试: ${errorMessage(error)}`
        );
        await this.options.sleep(delay);
      }
    }
  }
}
