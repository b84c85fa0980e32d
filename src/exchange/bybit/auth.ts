import { createHmac } from 'node:crypto';

/** 정렬된 키로 query string (URL 인코딩). 서명 payload와 실제 URL에 같은 문자열을 쓴다 */
export function buildQueryString(query: Record<string, string>): string {
  return Object.keys(query)
    .sort()
    .map((k) => `${encodeURIComponent(k)}=${encodeURIComponent(query[k] ?? '')}`)
    .join('&');
}

export interface SignInput {
  readonly timestamp: number;
  readonly apiKey: string;
  readonly recvWindow: number;
  /** GET: query string, POST: JSON body */
  readonly payload: string;
}

/**
 * v5 서명: HMAC_SHA256(secret, timestamp + apiKey + recvWindow + payload), 소문자 hex
 */
export function signRequest(apiSecret: string, input: SignInput): string {
  return createHmac('sha256', apiSecret)
    .update(`${input.timestamp}${input.apiKey}${input.recvWindow}${input.payload}`)
    .digest('hex');
}

export function authHeaders(apiSecret: string, input: SignInput): Record<string, string> {
  return {
    'X-BAPI-API-KEY': input.apiKey,
    'X-BAPI-SIGN': signRequest(apiSecret, input),
    'X-BAPI-SIGN-TYPE': '2',
    'X-BAPI-TIMESTAMP': String(input.timestamp),
    'X-BAPI-RECV-WINDOW': String(input.recvWindow),
  };
}
