import type { HedgeConfig } from '../../src/config.js';
import type { Clock } from '../../src/engine/clock.js';
import type { ControlLoopOptions } from '../../src/engine/control-loop.js';
import { CollaboratorUnavailableError, fail, ok, type CallResult } from '../../src/errors.js';
import type {
  ExchangeClient,
  ExchangePosition,
  OrderRequest,
  OrderResult,
  PriceSource,
} from '../../src/types/index.js';

export const T0 = 1_700_000_000_000;
/** T0에서 만든 첫 사이클 epoch */
export const EPOCH0 = 's44we80';

export function hedgeConfig(overrides: Partial<HedgeConfig> = {}): HedgeConfig {
  return {
    symbolLong: 'AAAUSDT',
    symbolShort: 'BBBUSDT',
    usdPositionSize: 1500,
    maxUsdPosition: 4500,
    triggerDropPct: 12,
    enableScaleIn: true,
    scaleInLegs: 3,
    scaleInDropStep: 2,
    triggerBasis: 'symbol',
    capScope: 'side',
    minOrderUsd: 1,
    ...overrides,
  };
}

export const loopOptions: ControlLoopOptions = {
  pollIntervalMs: 1000,
  maxRetries: 3,
  backoffBaseMs: 100,
  backoffMaxMs: 1000,
  callTimeoutMs: 1000,
};

/** sleep은 즉시 끝나고 시간만 앞으로 간다 */
export class FakeClock implements Clock {
  readonly sleeps: number[] = [];
  onSleep: ((ms: number) => void) | undefined;

  constructor(public current: number = T0) {}

  now(): number {
    return this.current;
  }

  async sleep(ms: number): Promise<void> {
    this.sleeps.push(ms);
    this.current += ms;
    this.onSleep?.(ms);
  }
}

type PlaceBehaviour = 'ambiguous' | CallResult<OrderResult> | undefined;

/**
 * 메모리 거래소: 시장가 주문 즉시 체결, 같은 키는 기존 결과 반환.
 * hook으로 장애를 주입한다.
 */
export class FakeVenue implements PriceSource, ExchangeClient {
  readonly prices = new Map<string, number>();
  readonly orders = new Map<string, OrderResult>();
  readonly positions = new Map<string, ExchangePosition>();
  readonly placeCalls: OrderRequest[] = [];
  readonly statusCalls: string[] = [];
  priceHook: ((symbol: string) => CallResult<number> | undefined) | undefined;
  placeHook: ((request: OrderRequest, attempt: number) => PlaceBehaviour) | undefined;
  statusHook: ((key: string) => CallResult<OrderResult | null> | undefined) | undefined;
  positionHook: ((symbol: string) => CallResult<ExchangePosition> | undefined) | undefined;
  private seq = 0;

  setPrice(symbol: string, price: number): void {
    this.prices.set(symbol, price);
  }

  /** 실제로 체결된 주문 수 (키 기준) */
  get filledCount(): number {
    return [...this.orders.values()].filter((o) => o.status === 'FILLED').length;
  }

  async getMarkPrice(symbol: string): Promise<CallResult<number>> {
    const hooked = this.priceHook?.(symbol);
    if (hooked) return hooked;
    const price = this.prices.get(symbol);
    if (price === undefined) return fail(new CollaboratorUnavailableError(`no price for ${symbol}`));
    return ok(price);
  }

  async placeOrder(request: OrderRequest): Promise<CallResult<OrderResult>> {
    this.placeCalls.push(request);
    const attempt = this.placeCalls.filter((r) => r.idempotencyKey === request.idempotencyKey).length;
    const hooked = this.placeHook?.(request, attempt);
    if (hooked && hooked !== 'ambiguous') return hooked;

    const result = this.orders.get(request.idempotencyKey) ?? this.fill(request);
    if (hooked === 'ambiguous') {
      return fail(new CollaboratorUnavailableError('connection reset after submit'));
    }
    return ok(result);
  }

  async getOrderStatus(_symbol: string, idempotencyKey: string): Promise<CallResult<OrderResult | null>> {
    this.statusCalls.push(idempotencyKey);
    const hooked = this.statusHook?.(idempotencyKey);
    if (hooked) return hooked;
    return ok(this.orders.get(idempotencyKey) ?? null);
  }

  async getPosition(symbol: string): Promise<CallResult<ExchangePosition>> {
    const hooked = this.positionHook?.(symbol);
    if (hooked) return hooked;
    return ok(this.positions.get(symbol) ?? { symbol, side: null, notionalUsd: 0, avgPrice: 0 });
  }

  private fill(request: OrderRequest): OrderResult {
    const price = this.prices.get(request.symbol) ?? 1;
    const current = this.positions.get(request.symbol);
    let filled = request.notionalUsd;
    if (request.intent === 'CLOSE') {
      filled = current?.notionalUsd ?? 0;
      this.positions.delete(request.symbol);
    } else {
      const total = (current?.notionalUsd ?? 0) + request.notionalUsd;
      this.positions.set(request.symbol, {
        symbol: request.symbol,
        side: request.side === 'BUY' ? 'LONG' : 'SHORT',
        notionalUsd: total,
        avgPrice: price,
      });
    }
    const result: OrderResult = {
      idempotencyKey: request.idempotencyKey,
      orderId: `fake-${++this.seq}`,
      status: 'FILLED',
      filledNotionalUsd: filled,
      avgPrice: price,
    };
    this.orders.set(request.idempotencyKey, result);
    return result;
  }
}
