export type OrderSide = 'BUY' | 'SELL';
export type OrderIntent = 'OPEN' | 'SCALE_IN' | 'CLOSE';
/**
 * FILLED: 최종 (체결 금액 > 0, 부분 체결 포함)
 * PENDING: 미확정
 * CANCELLED: 최종, 체결 없음
 * REJECTED: 거래소 거부
 */
export type OrderStatus = 'FILLED' | 'PENDING' | 'CANCELLED' | 'REJECTED';

export interface OrderRequest {
  readonly idempotencyKey: string;
  readonly symbol: string;
  readonly side: OrderSide;
  readonly intent: OrderIntent;
  readonly legIndex: number;       // CLOSE는 -1
  readonly notionalUsd: number;
  readonly reduceOnly: boolean;
}

export interface OrderResult {
  readonly idempotencyKey: string;
  readonly orderId: string;
  readonly status: OrderStatus;
  readonly filledNotionalUsd: number;
  readonly avgPrice: number;
  readonly reason?: string;
}
