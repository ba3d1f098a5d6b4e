import axios, { AxiosInstance } from 'axios';
import { FetchResult, HttpResponse, HttpTransport, PageFetcher } from './types';
import { HttpError, NetworkError, TimeoutError } from './utils/errors';
import { RateLimiter } from './utils/rate-limiter';
import { RetryPolicy } from './utils/retry';
import { logger } from './utils';

/**
 * 基于 axios 的 HTTP 传输层
 *
 * 任何状态码都作为响应返回，由 RetryingFetcher 决定是否重试。
 */
export class AxiosTransport implements HttpTransport {
  private readonly http: AxiosInstance;

  constructor(headers: Record<string, string>) {
    this.http = axios.create({
      headers,
      responseType: 'text',
      maxRedirects: 5,
      validateStatus: () => true,
    });
  }

  async get(url: string, options: { timeoutMs: number }): Promise<HttpResponse> {
    try {
      const response = await this.http.get<string>(url, {
        timeout: options.timeoutMs,
      });
      return {
        status: response.status,
        body: typeof response.data === 'string' ? response.data : String(response.data),
      };
    } catch (error) {
      if (axios.isAxiosError(error)) {
        if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
          throw new TimeoutError(url, options.timeoutMs);
        }
        throw new NetworkError(url, error.code || error.message, { cause: error });
      }
      throw new NetworkError(url, String(error), { cause: error });
    }
  }
}

/**
 * 带超时、限速与重试的页面获取器
 */
export class RetryingFetcher implements PageFetcher {
  private readonly policy: RetryPolicy;

  constructor(
    private readonly transport: HttpTransport,
    limiter: RateLimiter,
    policy: {
      maxAttempts: number;
      baseDelay: number;
      maxDelay: number;
      jitter: number;
      sleep?: (ms: number) => Promise<void>;
    },
    private readonly timeoutMs: number
  ) {
    this.policy = new RetryPolicy({
      ...policy,
      beforeAttempt: () => limiter.acquire(),
    });
  }

  async fetch(url: string): Promise<FetchResult> {
    let attempts = 0;
    const response = await this.policy.execute(async () => {
      attempts++;
      const res = await this.transport.get(url, { timeoutMs: this.timeoutMs });
      if (res.status < 200 || res.status >= 300) {
        throw new HttpError(url, res.status);
      }
      return res;
    }, `GET ${url}`);

    logger.debug(`已获取 ${url} (HTTP ${response.status}, 尝试 ${attempts} 次)`);
    return { url, status: response.status, body: response.body, attempts };
  }
}
