import { describe, it, expect } from 'vitest';
import { authHeaders, buildQueryString, signRequest } from '../src/exchange/bybit/auth.js';

const base = { timestamp: 1_700_000_000_000, apiKey: 'test-key', recvWindow: 5000 };

describe('buildQueryString', () => {
  it('sorts keys and encodes values', () => {
    expect(buildQueryString({ symbol: 'AAAUSDT', orderLinkId: 'a b', category: 'linear' })).toBe(
      'category=linear&orderLinkId=a%20b&symbol=AAAUSDT',
    );
    expect(buildQueryString({})).toBe('');
  });
});

describe('signRequest', () => {
  it('signs timestamp, key, window and query string', () => {
    expect(signRequest('test-secret', { ...base, payload: 'category=linear&symbol=BTCUSDT' })).toBe(
      '9a7c8cfd6ba1a7c498aa4dd5a7f9cfbba01fcb6eebae734ffe0d775870a1a3fb',
    );
  });

  it('signs a JSON body', () => {
    const body = JSON.stringify({
      category: 'linear',
      symbol: 'AAAUSDT',
      side: 'Buy',
      orderType: 'Market',
      qty: '1875.0',
      orderLinkId: 'k1',
      reduceOnly: false,
    });
    expect(signRequest('test-secret', { ...base, payload: body })).toBe(
      'a2f6d8e615fc7897a213d7f469e462737190dc330a0004963951377979212d95',
    );
  });

  it('changes with the secret', () => {
    const payload = 'category=linear&symbol=BTCUSDT';
    expect(signRequest('other-secret', { ...base, payload })).not.toBe(signRequest('test-secret', { ...base, payload }));
  });
});

describe('authHeaders', () => {
  it('builds the v5 header set', () => {
    expect(authHeaders('test-secret', { ...base, payload: 'category=linear&symbol=BTCUSDT' })).toEqual({
      'X-BAPI-API-KEY': 'test-key',
      'X-BAPI-SIGN': '9a7c8cfd6ba1a7c498aa4dd5a7f9cfbba01fcb6eebae734ffe0d775870a1a3fb',
      'X-BAPI-SIGN-TYPE': '2',
      'X-BAPI-TIMESTAMP': '1700000000000',
      'X-BAPI-RECV-WINDOW': '5000',
    });
  });
});
