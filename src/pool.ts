export interface PoolOptions<T> {
  concurrency: number;
  /** 同一轮中 key 相同的任务只派发一次 */
  keyOf?: (item: T) => string;
  /** 取消后不再派发新任务，已在执行的任务正常结束 */
  signal?: AbortSignal;
}

interface RunState {
  finished: boolean;
  stopped: boolean;
  failure: { error: unknown } | null;
}

function isAsyncIterable<T>(
  source: Iterable<T> | AsyncIterable<T>
): source is AsyncIterable<T> {
  return Symbol.asyncIterator in source;
}

function toAsyncIterator<T>(source: Iterable<T> | AsyncIterable<T>): AsyncIterator<T> {
  if (isAsyncIterable(source)) {
    return source[Symbol.asyncIterator]();
  }
  const iterator = source[Symbol.iterator]();
  return {
    next: async () => iterator.next(),
  };
}

/**
 * 有界并发执行：最多 concurrency 个 worker 同时运行，按完成顺序产出结果
 *
 * worker 应自行把单项失败转换为结果值；worker 抛出的异常会终止整个运行。
 */
export async function* runBounded<T, R>(
  source: Iterable<T> | AsyncIterable<T>,
  worker: (item: T) => Promise<R>,
  options: PoolOptions<T>
): AsyncGenerator<R> {
  const iterator = toAsyncIterator(source);
  const dispatched = new Set<string>();
  const completed: R[] = [];
  const state: RunState = { finished: false, stopped: false, failure: null };
  let notify: (() => void) | null = null;

  const wake = () => {
    const resolve = notify;
    notify = null;
    resolve?.();
  };

  const lane = async () => {
    while (!state.stopped && !state.failure && !options.signal?.aborted) {
      const next = await iterator.next();
      if (next.done || options.signal?.aborted) return;
      if (options.keyOf) {
        const key = options.keyOf(next.value);
        if (dispatched.has(key)) continue;
        dispatched.add(key);
      }
      completed.push(await worker(next.value));
      wake();
    }
  };

  const lanes = Array.from({ length: Math.max(1, Math.floor(options.concurrency)) }, () =>
    lane().catch((error: unknown) => {
      state.failure ??= { error };
    })
  );
  const all = Promise.all(lanes).then(() => {
    state.finished = true;
    wake();
  });

  try {
    for (;;) {
      while (completed.length > 0) {
        const result = completed.shift();
        if (result !== undefined) yield result;
      }
      if (state.finished) break;
      await new Promise<void>((resolve) => {
        notify = resolve;
      });
    }
    await all;
    if (state.failure) throw state.failure.error;
  } finally {
    state.stopped = true;
  }
}
