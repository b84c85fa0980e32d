import type { CallResult } from '../errors.js';
import type { HedgeSide } from './hedge.js';
import type { OrderRequest, OrderResult } from './order.js';

export interface ExchangePosition {
  readonly symbol: string;
  readonly side: HedgeSide | null;   // null = 포지션 없음
  readonly notionalUsd: number;
  readonly avgPrice: number;
}

/** 시세 제공자 */
export interface PriceSource {
  getMarkPrice(symbol: string): Promise<CallResult<number>>;
}

/**
 * 주문/포지션 협력자
 * placeOrder는 idempotencyKey 기준 멱등이어야 한다 (같은 키 재요청 시 기존 주문 결과 반환).
 */
export interface ExchangeClient {
  placeOrder(request: OrderRequest): Promise<CallResult<OrderResult>>;
  /** null = 거래소에 해당 키의 주문이 없음 */
  getOrderStatus(symbol: string, idempotencyKey: string): Promise<CallResult<OrderResult | null>>;
  getPosition(symbol: string): Promise<CallResult<ExchangePosition>>;
}
