import { CollaboratorUnavailableError, OrderRejectedError, fail, ok, type CallResult } from '../errors.js';
import { createChildLogger } from '../logger.js';
import type { BybitHttpClient } from '../exchange/bybit/client.js';
import * as bybit from '../exchange/bybit/rest.js';
import type { InstrumentItem, OrderItem, PositionItem } from '../exchange/bybit/schemas.js';
import type {
  ExchangeClient,
  ExchangePosition,
  OrderRequest,
  OrderResult,
  OrderStatus,
  PriceSource,
} from '../types/index.js';
import { waitForFill } from './order-poller.js';
import { RateLimiter } from './rate-limiter.js';

const log = createChildLogger('bybit-api');

/** orderLinkId 중복: 같은 키의 주문이 이미 존재 */
export const DUPLICATE_ORDER_LINK_ID = 110072;

export interface BybitExchangeOptions {
  readonly fillTimeoutMs: number;
  readonly limiter?: RateLimiter;
  readonly now?: () => number;
  readonly sleep?: (ms: number) => Promise<void>;
}

/**
 * 주문 수량 = 금액 / 가격을 qtyStep 단위로 내림, qtyStep 소수 자릿수로 표기
 */
export function toOrderQty(notionalUsd: number, price: number, qtyStep: string): string {
  const step = Number(qtyStep);
  const decimals = qtyStep.split('.')[1]?.length ?? 0;
  const steps = Math.floor(notionalUsd / price / step + 1e-9);
  return (steps * step).toFixed(decimals);
}

/**
 * Bybit 주문 상태 → 공통 상태
 * 부분 체결 후 취소된 주문은 체결분이 있으므로 FILLED
 */
export function mapOrderStatus(orderStatus: string, cumExecQty: number): OrderStatus {
  switch (orderStatus) {
    case 'Filled':
      return 'FILLED';
    case 'PartiallyFilledCanceled':
    case 'Cancelled':
    case 'Deactivated':
      return cumExecQty > 0 ? 'FILLED' : 'CANCELLED';
    case 'Rejected':
      return 'REJECTED';
    default:
      return 'PENDING';
  }
}

function toOrderResult(order: OrderItem): OrderResult {
  const status = mapOrderStatus(order.orderStatus, order.cumExecQty);
  const reason =
    status === 'REJECTED' || status === 'CANCELLED'
      ? order.rejectReason && order.rejectReason !== 'EC_NoError'
        ? order.rejectReason
        : order.orderStatus
      : undefined;
  return {
    idempotencyKey: order.orderLinkId,
    orderId: order.orderId,
    status,
    filledNotionalUsd: order.cumExecValue,
    avgPrice: order.avgPrice,
    ...(reason !== undefined ? { reason } : {}),
  };
}

function toExchangePosition(symbol: string, item: PositionItem | undefined): ExchangePosition {
  if (!item || item.size <= 0 || (item.side !== 'Buy' && item.side !== 'Sell')) {
    return { symbol, side: null, notionalUsd: 0, avgPrice: 0 };
  }
  return {
    symbol,
    side: item.side === 'Buy' ? 'LONG' : 'SHORT',
    notionalUsd: item.positionValue,
    avgPrice: item.avgPrice,
  };
}

/**
 * Bybit v5 USDT 무기한 (linear) 클라이언트
 *
 * 엔드포인트:
 *   GET  /v5/market/tickers         : 마크 가격
 *   GET  /v5/market/instruments-info: 수량 단위 (심볼별 캐시)
 *   POST /v5/order/create           : 시장가 주문 (orderLinkId = 멱등 키)
 *   GET  /v5/order/realtime         : 주문 조회
 *   GET  /v5/order/history          : 주문 내역 (realtime에 없을 때)
 *   GET  /v5/position/list          : 포지션
 *
 * 인증: HMAC-SHA256 (exchange/bybit/auth.ts)
 * 재시도 없음: 실패는 CallResult로 돌려주고 제어 루프가 백오프 재시도
 */
export class BybitExchange implements PriceSource, ExchangeClient {
  private readonly limiter: RateLimiter;
  private readonly instruments = new Map<string, InstrumentItem>();

  constructor(
    private readonly client: BybitHttpClient,
    private readonly options: BybitExchangeOptions,
  ) {
    this.limiter = options.limiter ?? new RateLimiter(10);
  }

  async getMarkPrice(symbol: string): Promise<CallResult<number>> {
    const res = await bybit.getTickers(this.client, symbol);
    if (!res.ok) return res;
    const ticker = res.value.list.find((t) => t.symbol === symbol);
    if (!ticker || !(ticker.markPrice > 0)) {
      return fail(new CollaboratorUnavailableError(`no valid mark price for ${symbol}`));
    }
    return ok(ticker.markPrice);
  }

  async placeOrder(request: OrderRequest): Promise<CallResult<OrderResult>> {
    const instrument = await this.getInstrument(request.symbol);
    if (!instrument.ok) return instrument;
    const { qtyStep, minOrderQty } = instrument.value.lotSizeFilter;

    let qty: string;
    if (request.intent === 'CLOSE') {
      // 청산은 현재 포지션 전량
      const position = await this.fetchPosition(request.symbol);
      if (!position.ok) return position;
      if (!position.value || position.value.size <= 0) {
        log.warn({ symbol: request.symbol, key: request.idempotencyKey }, 'Nothing to close on exchange');
        return ok({
          idempotencyKey: request.idempotencyKey,
          orderId: '',
          status: 'FILLED',
          filledNotionalUsd: 0,
          avgPrice: 0,
          reason: 'no open position',
        });
      }
      qty = String(position.value.size);
    } else {
      const price = await this.getMarkPrice(request.symbol);
      if (!price.ok) return price;
      qty = toOrderQty(request.notionalUsd, price.value, qtyStep);
      if (Number(qty) < minOrderQty) {
        return fail(
          new OrderRejectedError(`quantity ${qty} below minimum ${minOrderQty} for ${request.symbol}`),
        );
      }
    }

    await this.limiter.acquire();
    const created = await bybit.createOrder(this.client, {
      symbol: request.symbol,
      side: request.side === 'BUY' ? 'Buy' : 'Sell',
      qty,
      orderLinkId: request.idempotencyKey,
      reduceOnly: request.reduceOnly,
    });

    if (!created.ok) {
      if (created.error.code !== DUPLICATE_ORDER_LINK_ID) return created;
      log.info({ key: request.idempotencyKey }, 'Order already exists for key, resolving status');
    } else {
      log.info(
        { symbol: request.symbol, side: request.side, qty, orderId: created.value.orderId, key: request.idempotencyKey },
        'Order submitted',
      );
    }

    return waitForFill(this, request.symbol, request.idempotencyKey, {
      timeoutMs: this.options.fillTimeoutMs,
      ...(this.options.now ? { now: this.options.now } : {}),
      ...(this.options.sleep ? { sleep: this.options.sleep } : {}),
    });
  }

  async getOrderStatus(symbol: string, idempotencyKey: string): Promise<CallResult<OrderResult | null>> {
    await this.limiter.acquire();
    const open = await bybit.getOpenOrders(this.client, symbol, idempotencyKey);
    if (!open.ok) return open;
    const live = open.value.list.find((o) => o.orderLinkId === idempotencyKey);
    if (live) return ok(toOrderResult(live));

    await this.limiter.acquire();
    const history = await bybit.getOrderHistory(this.client, symbol, idempotencyKey);
    if (!history.ok) return history;
    const done = history.value.list.find((o) => o.orderLinkId === idempotencyKey);
    return ok(done ? toOrderResult(done) : null);
  }

  async getPosition(symbol: string): Promise<CallResult<ExchangePosition>> {
    const res = await this.fetchPosition(symbol);
    if (!res.ok) return res;
    return ok(toExchangePosition(symbol, res.value));
  }

  private async fetchPosition(symbol: string): Promise<CallResult<PositionItem | undefined>> {
    await this.limiter.acquire();
    const res = await bybit.getPositions(this.client, symbol);
    if (!res.ok) return res;
    return ok(res.value.list.find((p) => p.symbol === symbol && p.size > 0));
  }

  private async getInstrument(symbol: string): Promise<CallResult<InstrumentItem>> {
    const cached = this.instruments.get(symbol);
    if (cached) return ok(cached);
    const res = await bybit.getInstrumentsInfo(this.client, symbol);
    if (!res.ok) return res;
    const item = res.value.list.find((i) => i.symbol === symbol);
    if (!item) {
      return fail(new OrderRejectedError(`unknown instrument ${symbol}`));
    }
    this.instruments.set(symbol, item);
    return ok(item);
  }
}
