import { createChildLogger } from '../logger.js';
import { isTerminal, ok, type CallResult } from '../errors.js';
import type { ExchangeClient, OrderResult } from '../types/index.js';

const log = createChildLogger('order-poller');

/** 폴링 간격 백오프 단계 (ms) */
const POLL_INTERVALS = [500, 1000, 2000];

export interface PollOptions {
  readonly timeoutMs: number;
  readonly now?: () => number;
  readonly sleep?: (ms: number) => Promise<void>;
}

/**
 * 주문 체결 확인 폴링
 * - getOrderStatus(symbol, key) 반복 호출
 * - FILLED / CANCELLED / REJECTED면 종료, PENDING·조회 실패·미발견이면 계속
 * - 폴링 간격: 500ms → 1s → 2s 백오프
 * - 타임아웃 시 PENDING 반환 (다음 tick에서 상태 조회로 확정)
 */
export async function waitForFill(
  client: Pick<ExchangeClient, 'getOrderStatus'>,
  symbol: string,
  idempotencyKey: string,
  options: PollOptions,
): Promise<CallResult<OrderResult>> {
  const now = options.now ?? Date.now;
  const sleep = options.sleep ?? defaultSleep;
  const deadline = now() + options.timeoutMs;
  let attempt = 0;
  let last: OrderResult | null = null;

  while (now() < deadline) {
    const interval = POLL_INTERVALS[Math.min(attempt, POLL_INTERVALS.length - 1)] ?? 2000;
    await sleep(interval);
    attempt++;

    const res = await client.getOrderStatus(symbol, idempotencyKey);
    if (!res.ok) {
      if (isTerminal(res.error)) return res;
      log.warn({ err: res.error.message, idempotencyKey, attempt }, 'Poll getOrderStatus failed');
      continue;
    }

    if (!res.value) {
      log.debug({ idempotencyKey, attempt }, 'Order not found yet');
      continue;
    }

    last = res.value;
    log.debug({ idempotencyKey, status: last.status, filled: last.filledNotionalUsd, attempt }, 'Poll result');
    if (last.status !== 'PENDING') return ok(last);
  }

  log.warn({ idempotencyKey, timeoutMs: options.timeoutMs }, 'Order fill polling timed out');
  return ok(
    last ?? {
      idempotencyKey,
      orderId: '',
      status: 'PENDING',
      filledNotionalUsd: 0,
      avgPrice: 0,
    },
  );
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
