/**
 * Bybit v5 REST API: endpoints 상수 + undici + zod 전용.
 * 모든 URL은 endpoints.ts에서만 가져온다.
 */

import type { BybitHttpClient } from './client.js';
import {
  CATEGORY,
  PUBLIC_TICKERS,
  PUBLIC_INSTRUMENTS_INFO,
  PRIVATE_ORDER_CREATE,
  PRIVATE_ORDER_REALTIME,
  PRIVATE_ORDER_HISTORY,
  PRIVATE_POSITION_LIST,
} from './endpoints.js';
import {
  tickersSchema,
  instrumentsInfoSchema,
  orderCreateSchema,
  orderListSchema,
  positionListSchema,
} from './schemas.js';

// ─── PUBLIC ───────────────────────────────────────────────────────────────

export async function getTickers(client: BybitHttpClient, symbol: string) {
  return client.requestPublic(PUBLIC_TICKERS, { category: CATEGORY, symbol }, tickersSchema);
}

export async function getInstrumentsInfo(client: BybitHttpClient, symbol: string) {
  return client.requestPublic(PUBLIC_INSTRUMENTS_INFO, { category: CATEGORY, symbol }, instrumentsInfoSchema);
}

// ─── PRIVATE ──────────────────────────────────────────────────────────────

export interface CreateOrderBody {
  symbol: string;
  side: 'Buy' | 'Sell';
  qty: string;
  orderLinkId: string;
  reduceOnly: boolean;
}

export async function createOrder(client: BybitHttpClient, body: CreateOrderBody) {
  return client.requestPrivate(
    'POST',
    PRIVATE_ORDER_CREATE,
    {
      category: CATEGORY,
      symbol: body.symbol,
      side: body.side,
      orderType: 'Market',
      qty: body.qty,
      orderLinkId: body.orderLinkId,
      reduceOnly: body.reduceOnly,
    },
    orderCreateSchema,
  );
}

export async function getOpenOrders(client: BybitHttpClient, symbol: string, orderLinkId: string) {
  return client.requestPrivate(
    'GET',
    PRIVATE_ORDER_REALTIME,
    { category: CATEGORY, symbol, orderLinkId },
    orderListSchema,
  );
}

export async function getOrderHistory(client: BybitHttpClient, symbol: string, orderLinkId: string) {
  return client.requestPrivate(
    'GET',
    PRIVATE_ORDER_HISTORY,
    { category: CATEGORY, symbol, orderLinkId },
    orderListSchema,
  );
}

export async function getPositions(client: BybitHttpClient, symbol: string) {
  return client.requestPrivate('GET', PRIVATE_POSITION_LIST, { category: CATEGORY, symbol }, positionListSchema);
}
