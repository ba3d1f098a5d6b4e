import { RateLimiter } from '../src/utils/rate-limiter';

function fakeClock() {
  const state = { now: 0, sleeps: [] as number[] };
  return {
    state,
    clock: () => state.now,
    sleep: async (ms: number) => {
      state.sleeps.push(ms);
      state.now += ms;
    },
  };
}

describe('令牌桶限速', () => {
  test('每秒 2 个请求：第一次立即通过，之后每次等待 500ms', async () => {
    const { state, clock, sleep } = fakeClock();
    const limiter = new RateLimiter(2, { clock, sleep });

    await limiter.acquire();
    await limiter.acquire();
    await limiter.acquire();

    expect(state.sleeps).toEqual([500, 500]);
    expect(state.now).toBe(1000);
  });

  test('并发调用按顺序排队领取令牌', async () => {
    const { state, clock, sleep } = fakeClock();
    const limiter = new RateLimiter(4, { clock, sleep });
    const order: number[] = [];

    await Promise.all(
      [1, 2, 3].map((i) => limiter.acquire().then(() => order.push(i)))
    );

    expect(order).toEqual([1, 2, 3]);
    expect(state.sleeps).toEqual([250, 250]);
  });

  test('突发容量内不等待', async () => {
    const { state, clock, sleep } = fakeClock();
    const limiter = new RateLimiter(2, { burst: 3, clock, sleep });

    for (let i = 0; i < 3; i++) await limiter.acquire();
    expect(state.sleeps).toEqual([]);

    await limiter.acquire();
    expect(state.sleeps).toEqual([500]);
  });

  test('空闲期间补充令牌', async () => {
    const { state, clock, sleep } = fakeClock();
    const limiter = new RateLimiter(2, { clock, sleep });

    await limiter.acquire();
    state.now += 2000;
    await limiter.acquire();

    expect(state.sleeps).toEqual([]);
  });

  test('rate <= 0 不限速', async () => {
    const { state, clock, sleep } = fakeClock();
    const limiter = new RateLimiter(0, { clock, sleep });

    expect(limiter.unlimited).toBe(true);
    for (let i = 0; i < 5; i++) await limiter.acquire();
    expect(state.sleeps).toEqual([]);
  });
});
