/**
 * 错误分类
 *
 * - transient: 超时、429、5xx，可重试
 * - permanent: 429 以外的 4xx、页面内容异常，不重试
 * - storage: 数据库读写失败，影响单条记录，不中止整轮任务
 * - fatal: 配置错误或数据库不可用，中止整轮任务
 */
export type FailureKind = 'transient' | 'permanent' | 'storage' | 'fatal';

export abstract class HarvestError extends Error {
  abstract readonly kind: FailureKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class TimeoutError extends HarvestError {
  readonly kind = 'transient';

  constructor(readonly url: string, readonly timeoutMs: number) {
    super(`请求超时 (${timeoutMs}ms): ${url}`);
  }
}

export class NetworkError extends HarvestError {
  readonly kind = 'transient';

  constructor(readonly url: string, message: string, options?: { cause?: unknown }) {
    super(`网络错误: ${url} - ${message}`, options);
  }
}

export function isTransientStatus(status: number): boolean {
  return status === 429 || status >= 500;
}

export class HttpError extends HarvestError {
  readonly kind: FailureKind;

  constructor(readonly url: string, readonly status: number) {
    super(`HTTP ${status}: ${url}`);
    this.kind = isTransientStatus(status) ? 'transient' : 'permanent';
  }
}

/**
 * 页面结构异常或缺少摘要
 */
export class ContentError extends HarvestError {
  readonly kind = 'permanent';
}

/**
 * 翻译模型调用失败
 */
export class ModelError extends HarvestError {
  readonly kind: FailureKind;

  constructor(message: string, readonly status?: number, options?: { cause?: unknown; timedOut?: boolean }) {
    super(message, options);
    this.kind =
      options?.timedOut || status === undefined || isTransientStatus(status)
        ? 'transient'
        : 'permanent';
  }
}

export class StorageError extends HarvestError {
  readonly kind = 'storage';
}

export class ConfigurationError extends HarvestError {
  readonly kind = 'fatal';
}

export function isRetryable(error: unknown): boolean {
  return error instanceof HarvestError && error.kind === 'transient';
}

function statusOf(error: object): number | undefined {
  if ('status' in error && typeof error.status === 'number') return error.status;
  if (
    'response' in error &&
    typeof error.response === 'object' &&
    error.response !== null &&
    'status' in error.response &&
    typeof error.response.status === 'number'
  ) {
    return error.response.status;
  }
  return undefined;
}

/**
 * 将模型客户端抛出的错误归类为 ModelError，已分类的错误原样返回
 *
 * 没有 HTTP 状态码的错误（连接中断等）按可重试处理。
 */
export function classifyModelError(error: unknown): HarvestError {
  if (error instanceof HarvestError) return error;
  if (typeof error !== 'object' || error === null) {
    return new ModelError(`模型调用失败: ${String(error)}`);
  }
  const message = error instanceof Error ? error.message : String(error);
  const timedOut =
    error instanceof Error &&
    (error.name === 'TimeoutError' || /timed? ?out/i.test(message));
  const status = statusOf(error);
  return new ModelError(`模型调用失败: ${message}`, status, {
    cause: error,
    timedOut,
  });
}
