/**
 * 에러 분류
 *
 * - ConfigInvalidError: 기동 시 설정 오류 (루프 시작 전 중단)
 * - CollaboratorUnavailableError: 일시 장애 (백오프 재시도)
 * - OrderRejectedError / CredentialsInvalidError: 해당 사이드 중단 (terminal)
 * - ReconciliationMismatchError: 재시작 정합성 불일치 (거래소 값 우선, 알림만)
 */

export type FailureKind = 'transient' | 'terminal';

export class ConfigInvalidError extends Error {
  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigInvalidError';
    this.issues = issues;
  }
}

/** 외부 협력자(거래소/시세) 호출 실패 공통 베이스 */
export abstract class CollaboratorError extends Error {
  abstract readonly kind: FailureKind;
  /** 거래소 응답 코드 (Bybit retCode 또는 HTTP status) */
  readonly code: number | undefined;

  constructor(message: string, options: { code?: number; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.code = options.code;
  }
}

export class CollaboratorUnavailableError extends CollaboratorError {
  readonly kind = 'transient' as const;

  constructor(message: string, options: { code?: number; cause?: unknown } = {}) {
    super(message, options);
    this.name = 'CollaboratorUnavailableError';
  }
}

export class OrderRejectedError extends CollaboratorError {
  readonly kind = 'terminal' as const;
  readonly reason: string;

  constructor(reason: string, options: { code?: number; cause?: unknown } = {}) {
    super(`Order rejected: ${reason}`, options);
    this.name = 'OrderRejectedError';
    this.reason = reason;
  }
}

export class CredentialsInvalidError extends CollaboratorError {
  readonly kind = 'terminal' as const;

  constructor(message: string, options: { code?: number; cause?: unknown } = {}) {
    super(message, options);
    this.name = 'CredentialsInvalidError';
  }
}

export class ReconciliationMismatchError extends Error {
  readonly symbol: string;
  readonly expectedNotionalUsd: number;
  readonly actualNotionalUsd: number;

  constructor(symbol: string, expectedNotionalUsd: number, actualNotionalUsd: number, detail?: string) {
    super(
      `Reconciliation mismatch on ${symbol}: in-memory ${expectedNotionalUsd} USD, exchange ${actualNotionalUsd} USD` +
        (detail ? ` (${detail})` : ''),
    );
    this.name = 'ReconciliationMismatchError';
    this.symbol = symbol;
    this.expectedNotionalUsd = expectedNotionalUsd;
    this.actualNotionalUsd = actualNotionalUsd;
  }
}

export type TerminalError = OrderRejectedError | CredentialsInvalidError;
export type AnyCollaboratorError = CollaboratorUnavailableError | TerminalError;

/** 협력자 호출 결과: 예외 대신 명시적 성공/실패 변형 */
export type CallResult<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: AnyCollaboratorError };

export function ok<T>(value: T): CallResult<T> {
  return { ok: true, value };
}

export function fail(error: AnyCollaboratorError): { readonly ok: false; readonly error: AnyCollaboratorError } {
  return { ok: false, error };
}

export function isTerminal(error: AnyCollaboratorError): error is TerminalError {
  return error.kind === 'terminal';
}

/** 예상치 못한 예외를 일시 장애로 감싼다 */
export function toUnavailable(err: unknown, context: string): CollaboratorUnavailableError {
  if (err instanceof CollaboratorUnavailableError) return err;
  const message = err instanceof Error ? err.message : String(err);
  return new CollaboratorUnavailableError(`${context}: ${message}`, { cause: err });
}
