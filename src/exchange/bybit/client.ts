import { request as undiciRequest, type Dispatcher } from 'undici';
import type { z } from 'zod';
import {
  CollaboratorUnavailableError,
  CredentialsInvalidError,
  OrderRejectedError,
  fail,
  ok,
  type CallResult,
} from '../../errors.js';
import { createChildLogger } from '../../logger.js';
import { authHeaders, buildQueryString } from './auth.js';
import { envelopeSchema, type Envelope } from './schemas.js';

const log = createChildLogger('bybit-client');

/** 키/서명/IP 관련 retCode → 설정 오류 */
const CREDENTIAL_RET_CODES: ReadonlySet<number> = new Set([10003, 10004, 10005, 10007, 33004]);

/** 서버 측 일시 장애 retCode (재시도 대상) */
const TRANSIENT_RET_CODES: ReadonlySet<number> = new Set([10000, 10002, 10006, 10016]);

function isRetryableStatus(status: number): boolean {
  return status === 429 || status >= 500;
}

function isAuthError(status: number): boolean {
  return status === 401 || status === 403;
}

export interface BybitClientOptions {
  readonly baseUrl: string;
  readonly apiKey: string;
  readonly apiSecret: string;
  readonly recvWindow: number;
  readonly timeoutMs: number;
  /** 테스트에서 undici MockAgent 주입 */
  readonly dispatcher?: Dispatcher;
  readonly now?: () => number;
}

type Method = 'GET' | 'POST';

/**
 * Bybit v5 REST 호출: 호출당 1회 시도, 재시도는 호출자(제어 루프)가 담당.
 * 모든 실패는 CallResult로 분류해서 반환 (throw하지 않음).
 */
export class BybitHttpClient {
  private readonly now: () => number;

  constructor(private readonly options: BybitClientOptions) {
    this.now = options.now ?? Date.now;
  }

  async requestPublic<T>(
    path: string,
    query: Record<string, string>,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  ): Promise<CallResult<T>> {
    return this.send('GET', path, query, undefined, false, schema);
  }

  async requestPrivate<T>(
    method: Method,
    path: string,
    params: Record<string, string | boolean>,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  ): Promise<CallResult<T>> {
    if (method === 'GET') {
      const query: Record<string, string> = {};
      for (const [k, v] of Object.entries(params)) query[k] = String(v);
      return this.send('GET', path, query, undefined, true, schema);
    }
    return this.send('POST', path, {}, JSON.stringify(params), true, schema);
  }

  private async send<T>(
    method: Method,
    path: string,
    query: Record<string, string>,
    body: string | undefined,
    signed: boolean,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  ): Promise<CallResult<T>> {
    const label = `${method} ${path}`;
    const qs = buildQueryString(query);
    const url = `${this.options.baseUrl}${path}${qs ? `?${qs}` : ''}`;

    const headers: Record<string, string> = { Accept: 'application/json' };
    if (body !== undefined) headers['Content-Type'] = 'application/json';
    if (signed) {
      Object.assign(
        headers,
        authHeaders(this.options.apiSecret, {
          timestamp: this.now(),
          apiKey: this.options.apiKey,
          recvWindow: this.options.recvWindow,
          payload: body ?? qs,
        }),
      );
    }

    let statusCode: number;
    let text: string;
    try {
      const res = await undiciRequest(url, {
        method,
        headers,
        body,
        bodyTimeout: this.options.timeoutMs,
        headersTimeout: this.options.timeoutMs,
        ...(this.options.dispatcher ? { dispatcher: this.options.dispatcher } : {}),
      });
      statusCode = res.statusCode;
      text = await res.body.text();
    } catch (err) {
      log.warn({ err, path }, 'Request failed');
      return fail(new CollaboratorUnavailableError(`${label}: ${errorMessage(err)}`, { cause: err }));
    }

    if (isAuthError(statusCode)) {
      log.error({ statusCode, path }, 'Auth error, check API keys (401/403)');
      return fail(new CredentialsInvalidError(`${label}: HTTP ${statusCode}`, { code: statusCode }));
    }
    if (isRetryableStatus(statusCode)) {
      log.warn({ statusCode, path }, 'Retryable HTTP status');
      return fail(new CollaboratorUnavailableError(`${label}: HTTP ${statusCode}`, { code: statusCode }));
    }

    const envelope = parseEnvelope(text);
    if (!envelope) {
      if (statusCode !== 200) {
        log.warn({ statusCode, path }, 'Request failed');
        return fail(new CollaboratorUnavailableError(`${label}: HTTP ${statusCode}`, { code: statusCode }));
      }
      log.warn({ path, rawLength: text.length, raw: text.slice(0, 500) }, 'Malformed response envelope');
      return fail(new CollaboratorUnavailableError(`${label}: malformed response`));
    }

    if (envelope.retCode !== 0) {
      return fail(classifyRetCode(label, envelope));
    }

    const parsed = schema.safeParse(envelope.result);
    if (!parsed.success) {
      log.warn({ path, issues: parsed.error.issues.slice(0, 5) }, 'Response validation failed');
      return fail(new CollaboratorUnavailableError(`${label}: response validation failed`));
    }
    return ok(parsed.data);
  }
}

function parseEnvelope(text: string): Envelope | null {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch {
    return null;
  }
  const result = envelopeSchema.safeParse(raw);
  return result.success ? result.data : null;
}

/** retCode 분류: 자격 증명 / 일시 장애 / 나머지는 거부 */
export function classifyRetCode(
  label: string,
  envelope: Pick<Envelope, 'retCode' | 'retMsg'>,
): CredentialsInvalidError | CollaboratorUnavailableError | OrderRejectedError {
  const { retCode, retMsg } = envelope;
  if (CREDENTIAL_RET_CODES.has(retCode)) {
    log.error({ retCode, retMsg, label }, 'Credentials rejected by exchange');
    return new CredentialsInvalidError(`${label}: ${retMsg} (retCode ${retCode})`, { code: retCode });
  }
  if (TRANSIENT_RET_CODES.has(retCode)) {
    log.warn({ retCode, retMsg, label }, 'Exchange temporarily unavailable');
    return new CollaboratorUnavailableError(`${label}: ${retMsg} (retCode ${retCode})`, { code: retCode });
  }
  log.warn({ retCode, retMsg, label }, 'Request rejected by exchange');
  return new OrderRejectedError(`${retMsg} (retCode ${retCode})`, { code: retCode });
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
