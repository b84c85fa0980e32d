import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { MockAgent } from 'undici';
import {
  CollaboratorUnavailableError,
  CredentialsInvalidError,
  OrderRejectedError,
} from '../src/errors.js';
import { BybitHttpClient, classifyRetCode } from '../src/exchange/bybit/client.js';
import { BybitExchange, mapOrderStatus, toOrderQty } from '../src/execution/bybit-api.js';
import { RateLimiter } from '../src/execution/rate-limiter.js';
import type { OrderRequest } from '../src/types/index.js';
import { FakeClock, T0 } from './helpers/fakes.js';

const BASE = 'https://api.bybit.test';

function envelope(result: unknown, retCode = 0, retMsg = 'OK') {
  return { retCode, retMsg, result, time: T0 };
}

const instruments = envelope({
  category: 'linear',
  list: [{ symbol: 'AAAUSDT', status: 'Trading', lotSizeFilter: { qtyStep: '0.1', minOrderQty: '1', maxOrderQty: '100000' } }],
});
const tickers = (markPrice: string) =>
  envelope({ category: 'linear', list: [{ symbol: 'AAAUSDT', lastPrice: markPrice, markPrice }] });
const orderList = (list: unknown[]) => envelope({ list });
const filledOrder = {
  orderId: 'b-1',
  orderLinkId: 'k1',
  symbol: 'AAAUSDT',
  side: 'Buy',
  orderStatus: 'Filled',
  avgPrice: '0.8001',
  cumExecQty: '1875.0',
  cumExecValue: '1500.1875',
  rejectReason: 'EC_NoError',
};

const openRequest: OrderRequest = {
  idempotencyKey: 'k1',
  symbol: 'AAAUSDT',
  side: 'BUY',
  intent: 'OPEN',
  legIndex: 0,
  notionalUsd: 1500,
  reduceOnly: false,
};

let agent: MockAgent;
let clock: FakeClock;

beforeEach(() => {
  agent = new MockAgent();
  agent.disableNetConnect();
  clock = new FakeClock();
});

afterEach(async () => {
  await agent.close();
});

function makeExchange(): BybitExchange {
  const client = new BybitHttpClient({
    baseUrl: BASE,
    apiKey: 'test-key',
    apiSecret: 'test-secret',
    recvWindow: 5000,
    timeoutMs: 1000,
    dispatcher: agent,
    now: () => T0,
  });
  return new BybitExchange(client, {
    fillTimeoutMs: 5000,
    limiter: new RateLimiter(10, () => clock.now(), (ms) => clock.sleep(ms)),
    now: () => clock.now(),
    sleep: (ms) => clock.sleep(ms),
  });
}

const pool = () => agent.get(BASE);
const TICKERS_PATH = '/v5/market/tickers?category=linear&symbol=AAAUSDT';
const INSTRUMENTS_PATH = '/v5/market/instruments-info?category=linear&symbol=AAAUSDT';
const REALTIME_PATH = '/v5/order/realtime?category=linear&orderLinkId=k1&symbol=AAAUSDT';
const HISTORY_PATH = '/v5/order/history?category=linear&orderLinkId=k1&symbol=AAAUSDT';
const POSITION_PATH = '/v5/position/list?category=linear&symbol=AAAUSDT';

describe('helpers', () => {
  it('floors the quantity to the step', () => {
    expect(toOrderQty(1500, 0.8, '0.1')).toBe('1875.0');
    expect(toOrderQty(1000, 3, '0.01')).toBe('333.33');
    expect(toOrderQty(1500, 87, '1')).toBe('17');
  });

  it('maps exchange order states', () => {
    expect(mapOrderStatus('Filled', 10)).toBe('FILLED');
    expect(mapOrderStatus('PartiallyFilledCanceled', 4)).toBe('FILLED');
    expect(mapOrderStatus('Cancelled', 0)).toBe('CANCELLED');
    expect(mapOrderStatus('Deactivated', 0)).toBe('CANCELLED');
    expect(mapOrderStatus('Rejected', 0)).toBe('REJECTED');
    expect(mapOrderStatus('New', 0)).toBe('PENDING');
    expect(mapOrderStatus('PartiallyFilled', 3)).toBe('PENDING');
  });

  it('classifies retCodes', () => {
    expect(classifyRetCode('GET /x', { retCode: 10003, retMsg: 'API key is invalid.' })).toBeInstanceOf(CredentialsInvalidError);
    expect(classifyRetCode('GET /x', { retCode: 10006, retMsg: 'Too many visits!' })).toBeInstanceOf(CollaboratorUnavailableError);
    const rejected = classifyRetCode('POST /y', { retCode: 110007, retMsg: 'ab not enough for new order' });
    expect(rejected).toBeInstanceOf(OrderRejectedError);
    expect(rejected.message).toBe('Order rejected: ab not enough for new order (retCode 110007)');
    expect(rejected.code).toBe(110007);
  });
});

describe('BybitExchange: market data', () => {
  it('reads the mark price', async () => {
    pool().intercept({ path: TICKERS_PATH, method: 'GET' }).reply(200, tickers('0.8'));
    await expect(makeExchange().getMarkPrice('AAAUSDT')).resolves.toEqual({ ok: true, value: 0.8 });
  });

  it('treats a missing mark price as unavailable', async () => {
    pool().intercept({ path: TICKERS_PATH, method: 'GET' }).reply(200, envelope({ category: 'linear', list: [] }));
    const res = await makeExchange().getMarkPrice('AAAUSDT');
    expect(res.ok).toBe(false);
    if (!res.ok) expect(res.error.message).toBe('no valid mark price for AAAUSDT');
  });

  it.each([
    { status: 503, body: 'Service Unavailable', kind: CollaboratorUnavailableError, message: 'GET /v5/market/tickers: HTTP 503' },
    { status: 429, body: '', kind: CollaboratorUnavailableError, message: 'GET /v5/market/tickers: HTTP 429' },
    { status: 401, body: '', kind: CredentialsInvalidError, message: 'GET /v5/market/tickers: HTTP 401' },
    { status: 200, body: 'oops', kind: CollaboratorUnavailableError, message: 'GET /v5/market/tickers: malformed response' },
    { status: 404, body: '<html></html>', kind: CollaboratorUnavailableError, message: 'GET /v5/market/tickers: HTTP 404' },
  ])('classifies HTTP $status', async ({ status, body, kind, message }) => {
    pool().intercept({ path: TICKERS_PATH, method: 'GET' }).reply(status, body);
    const res = await makeExchange().getMarkPrice('AAAUSDT');
    expect(res.ok).toBe(false);
    if (!res.ok) {
      expect(res.error).toBeInstanceOf(kind);
      expect(res.error.message).toBe(message);
    }
  });

  it('classifies a non-zero retCode', async () => {
    pool().intercept({ path: TICKERS_PATH, method: 'GET' }).reply(200, envelope({}, 10002, 'invalid request, please check your server timestamp'));
    const res = await makeExchange().getMarkPrice('AAAUSDT');
    expect(res.ok).toBe(false);
    if (!res.ok) {
      expect(res.error).toBeInstanceOf(CollaboratorUnavailableError);
      expect(res.error.code).toBe(10002);
    }
  });

  it('rejects a result that fails validation', async () => {
    pool().intercept({ path: TICKERS_PATH, method: 'GET' }).reply(200, envelope({ category: 'linear', list: [{ symbol: 'AAAUSDT' }] }));
    const res = await makeExchange().getMarkPrice('AAAUSDT');
    expect(res.ok).toBe(false);
    if (!res.ok) expect(res.error.message).toBe('GET /v5/market/tickers: response validation failed');
  });

  it('turns a network error into unavailable', async () => {
    pool().intercept({ path: TICKERS_PATH, method: 'GET' }).replyWithError(new Error('socket hang up'));
    const res = await makeExchange().getMarkPrice('AAAUSDT');
    expect(res.ok).toBe(false);
    if (!res.ok) {
      expect(res.error).toBeInstanceOf(CollaboratorUnavailableError);
      expect(res.error.message).toBe('GET /v5/market/tickers: socket hang up');
    }
  });
});

describe('BybitExchange: orders', () => {
  it('places a signed market order and polls it to a fill', async () => {
    pool().intercept({ path: INSTRUMENTS_PATH, method: 'GET' }).reply(200, instruments);
    pool().intercept({ path: TICKERS_PATH, method: 'GET' }).reply(200, tickers('0.8'));
    pool()
      .intercept({
        path: '/v5/order/create',
        method: 'POST',
        body: '{"category":"linear","symbol":"AAAUSDT","side":"Buy","orderType":"Market","qty":"1875.0","orderLinkId":"k1","reduceOnly":false}',
        headers: {
          'X-BAPI-API-KEY': 'test-key',
          'X-BAPI-TIMESTAMP': '1700000000000',
          'X-BAPI-SIGN': 'a2f6d8e615fc7897a213d7f469e462737190dc330a0004963951377979212d95',
        },
      })
      .reply(200, envelope({ orderId: 'b-1', orderLinkId: 'k1' }));
    pool().intercept({ path: REALTIME_PATH, method: 'GET' }).reply(200, orderList([filledOrder]));

    const res = await makeExchange().placeOrder(openRequest);
    expect(res).toEqual({
      ok: true,
      value: { idempotencyKey: 'k1', orderId: 'b-1', status: 'FILLED', filledNotionalUsd: 1500.1875, avgPrice: 0.8001 },
    });
    expect(clock.sleeps).toEqual([500]);
  });

  it('resolves an existing order when the key is already used', async () => {
    pool().intercept({ path: INSTRUMENTS_PATH, method: 'GET' }).reply(200, instruments);
    pool().intercept({ path: TICKERS_PATH, method: 'GET' }).reply(200, tickers('0.8'));
    pool()
      .intercept({ path: '/v5/order/create', method: 'POST' })
      .reply(200, envelope({}, 110072, 'OrderLinkedID is duplicate'));
    pool().intercept({ path: REALTIME_PATH, method: 'GET' }).reply(200, orderList([]));
    pool().intercept({ path: HISTORY_PATH, method: 'GET' }).reply(200, orderList([filledOrder]));

    const res = await makeExchange().placeOrder(openRequest);
    expect(res.ok && res.value.status).toBe('FILLED');
    expect(res.ok && res.value.orderId).toBe('b-1');
  });

  it('passes an exchange rejection through as terminal', async () => {
    pool().intercept({ path: INSTRUMENTS_PATH, method: 'GET' }).reply(200, instruments);
    pool().intercept({ path: TICKERS_PATH, method: 'GET' }).reply(200, tickers('0.8'));
    pool()
      .intercept({ path: '/v5/order/create', method: 'POST' })
      .reply(200, envelope({}, 110007, 'ab not enough for new order'));

    const res = await makeExchange().placeOrder(openRequest);
    expect(res.ok).toBe(false);
    if (!res.ok) expect(res.error).toBeInstanceOf(OrderRejectedError);
  });

  it('rejects a quantity below the minimum without sending', async () => {
    pool().intercept({ path: INSTRUMENTS_PATH, method: 'GET' }).reply(200, instruments);
    pool().intercept({ path: TICKERS_PATH, method: 'GET' }).reply(200, tickers('2000'));

    const res = await makeExchange().placeOrder(openRequest);
    expect(res.ok).toBe(false);
    if (!res.ok) {
      expect(res.error).toBeInstanceOf(OrderRejectedError);
      expect(res.error.message).toBe('Order rejected: quantity 0.7 below minimum 1 for AAAUSDT');
    }
  });

  it('rejects an unknown instrument', async () => {
    pool().intercept({ path: INSTRUMENTS_PATH, method: 'GET' }).reply(200, envelope({ category: 'linear', list: [] }));
    const res = await makeExchange().placeOrder(openRequest);
    expect(res.ok).toBe(false);
    if (!res.ok) expect(res.error.message).toBe('Order rejected: unknown instrument AAAUSDT');
  });

  it('closes the full exchange position reduce-only', async () => {
    let sent = '';
    pool().intercept({ path: INSTRUMENTS_PATH, method: 'GET' }).reply(200, instruments);
    pool()
      .intercept({ path: POSITION_PATH, method: 'GET' })
      .reply(200, orderList([{ symbol: 'AAAUSDT', side: 'Buy', size: '1875', positionValue: '1500', avgPrice: '0.8' }]));
    pool()
      .intercept({ path: '/v5/order/create', method: 'POST' })
      .reply((opts) => {
        sent = String(opts.body);
        return { statusCode: 200, data: envelope({ orderId: 'b-2', orderLinkId: 'k1' }) };
      });
    pool()
      .intercept({ path: REALTIME_PATH, method: 'GET' })
      .reply(200, orderList([{ ...filledOrder, orderId: 'b-2', side: 'Sell', avgPrice: '0.9', cumExecValue: '1687.5' }]));

    const res = await makeExchange().placeOrder({
      ...openRequest,
      side: 'SELL',
      intent: 'CLOSE',
      legIndex: -1,
      reduceOnly: true,
    });
    expect(JSON.parse(sent)).toEqual({
      category: 'linear',
      symbol: 'AAAUSDT',
      side: 'Sell',
      orderType: 'Market',
      qty: '1875',
      orderLinkId: 'k1',
      reduceOnly: true,
    });
    expect(res.ok && res.value).toMatchObject({ status: 'FILLED', filledNotionalUsd: 1687.5, avgPrice: 0.9 });
  });

  it('treats a close with no position as an empty fill', async () => {
    pool().intercept({ path: INSTRUMENTS_PATH, method: 'GET' }).reply(200, instruments);
    pool()
      .intercept({ path: POSITION_PATH, method: 'GET' })
      .reply(200, orderList([{ symbol: 'AAAUSDT', side: '', size: '0', positionValue: '', avgPrice: '' }]));

    const res = await makeExchange().placeOrder({ ...openRequest, side: 'SELL', intent: 'CLOSE', legIndex: -1, reduceOnly: true });
    expect(res).toEqual({
      ok: true,
      value: { idempotencyKey: 'k1', orderId: '', status: 'FILLED', filledNotionalUsd: 0, avgPrice: 0, reason: 'no open position' },
    });
  });
});

describe('BybitExchange: lookups', () => {
  it('falls back to order history and maps a zero-fill cancel', async () => {
    pool().intercept({ path: REALTIME_PATH, method: 'GET' }).reply(200, orderList([]));
    pool()
      .intercept({ path: HISTORY_PATH, method: 'GET' })
      .reply(200, orderList([{ ...filledOrder, orderStatus: 'Cancelled', avgPrice: '', cumExecQty: '0', cumExecValue: '0' }]));

    const res = await makeExchange().getOrderStatus('AAAUSDT', 'k1');
    expect(res).toEqual({
      ok: true,
      value: { idempotencyKey: 'k1', orderId: 'b-1', status: 'CANCELLED', filledNotionalUsd: 0, avgPrice: 0, reason: 'Cancelled' },
    });
  });

  it('returns null for a key the exchange does not know', async () => {
    pool().intercept({ path: REALTIME_PATH, method: 'GET' }).reply(200, orderList([]));
    pool().intercept({ path: HISTORY_PATH, method: 'GET' }).reply(200, orderList([]));
    await expect(makeExchange().getOrderStatus('AAAUSDT', 'k1')).resolves.toEqual({ ok: true, value: null });
  });

  it('maps a short position', async () => {
    pool()
      .intercept({ path: POSITION_PATH, method: 'GET' })
      .reply(200, orderList([{ symbol: 'AAAUSDT', side: 'Sell', size: '100', positionValue: '870', avgPrice: '8.7' }]));
    await expect(makeExchange().getPosition('AAAUSDT')).resolves.toEqual({
      ok: true,
      value: { symbol: 'AAAUSDT', side: 'SHORT', notionalUsd: 870, avgPrice: 8.7 },
    });
  });

  it('maps an empty position list to flat', async () => {
    pool().intercept({ path: POSITION_PATH, method: 'GET' }).reply(200, orderList([]));
    await expect(makeExchange().getPosition('AAAUSDT')).resolves.toEqual({
      ok: true,
      value: { symbol: 'AAAUSDT', side: null, notionalUsd: 0, avgPrice: 0 },
    });
  });
});
