import { describe, it, expect } from 'vitest';
import { RateLimiter } from '../src/execution/rate-limiter.js';
import { FakeClock } from './helpers/fakes.js';

function limiterWith(maxPerSec: number): { limiter: RateLimiter; clock: FakeClock } {
  const clock = new FakeClock();
  const limiter = new RateLimiter(maxPerSec, () => clock.now(), (ms) => clock.sleep(ms));
  return { limiter, clock };
}

describe('RateLimiter', () => {
  it('should allow immediate requests under limit', async () => {
    const { limiter, clock } = limiterWith(10);
    for (let i = 0; i < 10; i++) {
      await limiter.acquire();
    }
    expect(clock.sleeps).toEqual([]);
  });

  it('should throttle when tokens exhausted', async () => {
    const { limiter, clock } = limiterWith(5);
    for (let i = 0; i < 5; i++) {
      await limiter.acquire();
    }
    await limiter.acquire();
    expect(clock.sleeps).toEqual([200]);
  });

  it('should refill over time', async () => {
    const { limiter, clock } = limiterWith(5);
    for (let i = 0; i < 5; i++) {
      await limiter.acquire();
    }
    clock.current += 1000;
    for (let i = 0; i < 5; i++) {
      await limiter.acquire();
    }
    expect(clock.sleeps).toEqual([]);
  });
});
