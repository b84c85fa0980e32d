import { createChildLogger } from '../logger.js';
import { fail, isTerminal, toUnavailable, CollaboratorUnavailableError, type CallResult } from '../errors.js';
import type { Clock } from './clock.js';

const log = createChildLogger('retry');

export interface RetryPolicy {
  readonly maxRetries: number;
  readonly backoffBaseMs: number;
  readonly backoffMaxMs: number;
  readonly callTimeoutMs: number;
}

/** 지수 백오프: min(max, base × 2^attempt) */
export function backoffDelay(attempt: number, policy: Pick<RetryPolicy, 'backoffBaseMs' | 'backoffMaxMs'>): number {
  return Math.min(policy.backoffMaxMs, policy.backoffBaseMs * Math.pow(2, attempt));
}

/**
 * 호출 타임아웃: 초과 시 일시 장애로 처리.
 * 늦게 끝난 원래 호출의 거부(reject)는 삼켜지지 않도록 결과로 변환해 둔다.
 */
export async function withTimeout<T>(
  call: Promise<CallResult<T>>,
  timeoutMs: number,
  label: string,
): Promise<CallResult<T>> {
  const guarded = call.catch((err: unknown) => fail(toUnavailable(err, label)));
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<CallResult<T>>((resolve) => {
    timer = setTimeout(() => {
      resolve(fail(new CollaboratorUnavailableError(`${label} timed out after ${timeoutMs}ms`)));
    }, timeoutMs);
  });
  try {
    return await Promise.race([guarded, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

export type RetryOutcome<T> = CallResult<T> & { readonly attempts: number };

/**
 * 협력자 호출 + 타임아웃 + 지수 백오프 재시도.
 * terminal 실패는 즉시 반환, transient는 maxRetries까지 재시도 후 마지막 실패 반환.
 * signal이 abort되면 백오프 대기를 끊고 마지막 실패를 반환한다.
 */
export async function callWithRetry<T>(
  label: string,
  call: () => Promise<CallResult<T>>,
  policy: RetryPolicy,
  clock: Clock,
  signal?: AbortSignal,
): Promise<RetryOutcome<T>> {
  let attempt = 0;
  for (;;) {
    const result = await withTimeout(invoke(call, label), policy.callTimeoutMs, label);
    attempt++;
    if (result.ok) return { ...result, attempts: attempt };
    if (isTerminal(result.error)) {
      log.error({ label, err: result.error.message, code: result.error.code }, 'Terminal failure');
      return { ...result, attempts: attempt };
    }
    if (attempt > policy.maxRetries || signal?.aborted) {
      log.warn({ label, attempts: attempt, err: result.error.message }, 'Retries exhausted');
      return { ...result, attempts: attempt };
    }
    const delay = backoffDelay(attempt - 1, policy);
    log.warn({ label, attempt, delay, err: result.error.message }, 'Transient failure, backing off');
    await clock.sleep(delay, signal);
  }
}

/** 동기 throw도 결과로 변환 */
function invoke<T>(call: () => Promise<CallResult<T>>, label: string): Promise<CallResult<T>> {
  try {
    return call();
  } catch (err) {
    return Promise.resolve(fail(toUnavailable(err, label)));
  }
}
