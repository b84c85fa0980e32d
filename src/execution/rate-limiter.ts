/**
 * 토큰 버킷 레이트 리미터
 * Bybit Private API: 주문 엔드포인트 기본 10/sec
 */
export class RateLimiter {
  private tokens: number;
  private readonly maxTokens: number;
  private readonly refillRate: number;  // tokens/ms
  private lastRefill: number;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
    maxPerSec: number = 10,
    now: () => number = Date.now,
    sleep: (ms: number) => Promise<void> = defaultSleep,
  ) {
    this.maxTokens = maxPerSec;
    this.tokens = maxPerSec;
    this.refillRate = maxPerSec / 1000;
    this.now = now;
    this.sleep = sleep;
    this.lastRefill = now();
  }

  async acquire(): Promise<void> {
    this.refill();

    if (this.tokens >= 1) {
      this.tokens--;
      return;
    }

    // 토큰 없으면 대기
    const waitMs = Math.ceil((1 - this.tokens) / this.refillRate);
    await this.sleep(waitMs);
    this.refill();
    this.tokens--;
  }

  private refill(): void {
    const now = this.now();
    const elapsed = now - this.lastRefill;
    this.tokens = Math.min(this.maxTokens, this.tokens + elapsed * this.refillRate);
    this.lastRefill = now;
  }
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
