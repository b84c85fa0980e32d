import { createChildLogger } from '../logger.js';
import type { DrawdownReading, ReferencePrice } from '../types/index.js';

const log = createChildLogger('trigger-tracker');

/**
 * 앵커 대비 하락률 (%). 앵커 위 가격은 0으로 클램프.
 * 곱셈을 먼저 해서 정수 가격에서 부동소수 오차가 생기지 않게 한다.
 */
export function drawdownPct(anchorPrice: number, price: number): number {
  if (anchorPrice <= 0) return 0;
  return Math.max(0, ((anchorPrice - price) * 100) / anchorPrice);
}

/**
 * 트리거 기준가 추적
 *
 * - 포지션 없음: 앵커 = 관측 최고가 (상향만)
 * - 포지션 보유(freeze): 사이클 종료까지 앵커 고정, 모든 스케일인 단계가 같은 앵커 기준
 * - reset: 다음 관측부터 새 사이클(새 epoch)
 */
export class TriggerTracker {
  private readonly refs = new Map<string, ReferencePrice>();
  private readonly cycles = new Map<string, number>();
  private readonly now: () => number;

  constructor(now: () => number = Date.now) {
    this.now = now;
  }

  observe(symbol: string, price: number): DrawdownReading {
    if (!Number.isFinite(price) || price <= 0) {
      throw new RangeError(`Invalid price for ${symbol}: ${price}`);
    }

    const ts = this.now();
    let ref = this.refs.get(symbol);
    if (!ref) {
      ref = {
        symbol,
        anchorPrice: price,
        lastObservedPrice: price,
        updatedAt: ts,
        frozen: false,
        epoch: this.nextEpoch(symbol, ts),
      };
      this.refs.set(symbol, ref);
      log.debug({ symbol, anchor: price, epoch: ref.epoch }, 'Anchor created');
    } else {
      if (!ref.frozen && price > ref.anchorPrice) {
        ref.anchorPrice = price;
      }
      ref.lastObservedPrice = price;
      ref.updatedAt = ts;
    }

    return {
      symbol,
      price,
      anchorPrice: ref.anchorPrice,
      pct: drawdownPct(ref.anchorPrice, price),
      epoch: ref.epoch,
    };
  }

  freeze(symbol: string): void {
    const ref = this.refs.get(symbol);
    if (!ref || ref.frozen) return;
    ref.frozen = true;
    log.info({ symbol, anchor: ref.anchorPrice, epoch: ref.epoch }, 'Anchor frozen');
  }

  /** 진입 주문이 거부돼 사이클이 시작되지 않았을 때 */
  unfreeze(symbol: string): void {
    const ref = this.refs.get(symbol);
    if (!ref || !ref.frozen) return;
    ref.frozen = false;
    log.info({ symbol, anchor: ref.anchorPrice, epoch: ref.epoch }, 'Anchor unfrozen');
  }

  reset(symbol: string): void {
    if (this.refs.delete(symbol)) {
      log.info({ symbol }, 'Anchor reset');
    }
  }

  get(symbol: string): Readonly<ReferencePrice> | undefined {
    return this.refs.get(symbol);
  }

  isFrozen(symbol: string): boolean {
    return this.refs.get(symbol)?.frozen ?? false;
  }

  /** epoch = 사이클 시작 시각(base36) + 심볼별 순번 */
  private nextEpoch(symbol: string, ts: number): string {
    const seq = this.cycles.get(symbol) ?? 0;
    this.cycles.set(symbol, seq + 1);
    return `${Math.floor(ts / 1000).toString(36)}${seq.toString(36)}`;
  }
}
