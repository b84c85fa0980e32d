import type { LoopConfig } from '../config.js';
import { isTerminal, ok, type AnyCollaboratorError, type CallResult } from '../errors.js';
import type { OrderJournal } from '../db/order-journal.js';
import { createChildLogger } from '../logger.js';
import type { Notifier } from '../notification/notifier.js';
import type { AuditLog } from '../safety/audit-log.js';
import {
  HEDGE_SIDES,
  type ExchangeClient,
  type HedgeSide,
  type OrderRequest,
  type OrderResult,
  type PriceSource,
} from '../types/index.js';
import { systemClock, type Clock } from './clock.js';
import type { HedgeStateMachine } from './hedge-state-machine.js';
import { callWithRetry, type RetryPolicy } from './retry.js';

const log = createChildLogger('control-loop');

export type SideOutcome =
  | 'UNRECONCILED'
  | 'HALTED'
  | 'IDLE'
  | 'ORDER_FILLED'
  | 'ORDER_PENDING'
  | 'REJECTED'
  | 'UNAVAILABLE'
  | 'ERROR';

export interface SideTickReport {
  readonly side: HedgeSide;
  readonly outcome: SideOutcome;
  readonly detail?: string;
}

export type TickReport = Record<HedgeSide, SideTickReport>;

export interface ControlLoopDeps {
  readonly machine: HedgeStateMachine;
  readonly prices: PriceSource;
  readonly exchange: ExchangeClient;
  readonly clock?: Clock;
  readonly journal?: OrderJournal;
  readonly audit?: AuditLog;
  readonly notifier?: Notifier;
}

export type ControlLoopOptions = Pick<
  LoopConfig,
  'pollIntervalMs' | 'maxRetries' | 'backoffBaseMs' | 'backoffMaxMs' | 'callTimeoutMs'
> & {
  /** 주문 호출 타임아웃 (체결 폴링 포함). 기본 callTimeoutMs */
  readonly orderTimeoutMs?: number;
};

type PriceCache = Map<string, CallResult<number>>;

const OTHER: Record<HedgeSide, HedgeSide> = { LONG: 'SHORT', SHORT: 'LONG' };

/**
 * 제어 루프
 *
 * reconcile → (tick → sleep) 반복. 사이드별로 격리:
 * 한 사이드의 장애/거부는 그 사이드만 멈추고 다른 사이드는 계속 돈다.
 */
export class ControlLoop {
  private readonly machine: HedgeStateMachine;
  private readonly prices: PriceSource;
  private readonly exchange: ExchangeClient;
  private readonly clock: Clock;
  private readonly journal: OrderJournal | undefined;
  private readonly audit: AuditLog | undefined;
  private readonly notifier: Notifier | undefined;
  private readonly callPolicy: RetryPolicy;
  private readonly orderPolicy: RetryPolicy;

  private readonly reconciled: Record<HedgeSide, boolean> = { LONG: false, SHORT: false };
  private readonly imbalanceReported = new Set<HedgeSide>();
  private abort = new AbortController();
  private stopped = false;
  private running = false;

  constructor(
    deps: ControlLoopDeps,
    private readonly options: ControlLoopOptions,
  ) {
    this.machine = deps.machine;
    this.prices = deps.prices;
    this.exchange = deps.exchange;
    this.clock = deps.clock ?? systemClock;
    this.journal = deps.journal;
    this.audit = deps.audit;
    this.notifier = deps.notifier;
    this.callPolicy = {
      maxRetries: options.maxRetries,
      backoffBaseMs: options.backoffBaseMs,
      backoffMaxMs: options.backoffMaxMs,
      callTimeoutMs: options.callTimeoutMs,
    };
    this.orderPolicy = { ...this.callPolicy, callTimeoutMs: options.orderTimeoutMs ?? options.callTimeoutMs };
  }

  get isRunning(): boolean {
    return this.running;
  }

  isReconciled(side: HedgeSide): boolean {
    return this.reconciled[side];
  }

  /**
   * 재시작 정합성: 미확정 주문 정리 → 거래소 포지션으로 상태 복구
   */
  async reconcile(): Promise<void> {
    for (const side of HEDGE_SIDES) {
      if (this.stopped) return;
      try {
        await this.reconcileSide(side);
      } catch (err) {
        this.reconciled[side] = false;
        log.error({ err, side }, 'Reconcile failed unexpectedly');
      }
    }
  }

  async tick(): Promise<TickReport> {
    const cache: PriceCache = new Map();
    const report: Partial<Record<HedgeSide, SideTickReport>> = {};

    for (const side of HEDGE_SIDES) {
      if (this.stopped) {
        report[side] = { side, outcome: 'IDLE', detail: 'stopping' };
        continue;
      }
      try {
        report[side] = await this.tickSide(side, cache);
      } catch (err) {
        // 다음 tick에서 이 사이드를 다시 맞춘 뒤 재개
        this.reconciled[side] = false;
        log.error({ err, side }, 'Unexpected error in tick');
        report[side] = { side, outcome: 'ERROR', detail: err instanceof Error ? err.message : String(err) };
      }
    }

    this.checkImbalance();
    return {
      LONG: report.LONG ?? { side: 'LONG', outcome: 'IDLE' },
      SHORT: report.SHORT ?? { side: 'SHORT', outcome: 'IDLE' },
    };
  }

  async run(): Promise<void> {
    if (this.running) return;
    this.running = true;
    this.stopped = false;
    this.abort = new AbortController();
    log.info({ pollIntervalMs: this.options.pollIntervalMs }, 'Control loop started');

    try {
      await this.reconcile();
      while (!this.stopped) {
        try {
          await this.tick();
        } catch (err) {
          log.error({ err }, 'Tick failed');
          for (const side of HEDGE_SIDES) this.reconciled[side] = false;
        }
        if (this.stopped) break;
        await this.clock.sleep(this.options.pollIntervalMs, this.abort.signal);
      }
    } finally {
      this.running = false;
      log.info('Control loop stopped');
    }
  }

  /** 진행 중인 호출이 끝나거나 타임아웃되면 멈춘다. 대기/백오프는 즉시 끊는다 */
  stop(): void {
    if (this.stopped) return;
    this.stopped = true;
    this.abort.abort();
    log.info('Stop requested');
  }

  private async tickSide(side: HedgeSide, cache: PriceCache): Promise<SideTickReport> {
    if (this.machine.isHalted(side)) return { side, outcome: 'HALTED' };
    if (!this.reconciled[side]) {
      await this.reconcileSide(side);
      if (!this.reconciled[side]) return { side, outcome: 'UNRECONCILED' };
      if (this.machine.isHalted(side)) return { side, outcome: 'HALTED' };
    }

    const pending = this.machine.pendingRequest(side);
    if (pending) return this.resolvePending(side, pending);

    const price = await this.triggerPrice(side, cache);
    if (!price.ok) return this.onCallFailure(side, price.error, 'price');

    const evaluation = this.machine.evaluate(side, price.value);
    log.debug(
      {
        side,
        price: price.value,
        anchor: evaluation.reading.anchorPrice,
        pct: Number(evaluation.reading.pct.toFixed(4)),
        state: this.machine.state(side),
      },
      'Evaluated',
    );
    if (evaluation.kind === 'IDLE') return { side, outcome: 'IDLE', detail: evaluation.reason };
    return this.place(side, evaluation.request);
  }

  /** 결과 미확정 주문: 상태 조회, 거래소가 모르면 같은 요청(같은 키)으로 다시 주문 */
  private async resolvePending(side: HedgeSide, request: OrderRequest): Promise<SideTickReport> {
    const status = await this.call(
      `getOrderStatus ${request.idempotencyKey}`,
      () => this.exchange.getOrderStatus(request.symbol, request.idempotencyKey),
    );
    // 조회 실패는 체결 여부를 알 수 없으므로 대기 주문을 유지한다
    if (!status.ok) return this.onCallFailure(side, status.error, 'order status');
    if (status.value === null) {
      log.warn({ side, key: request.idempotencyKey }, 'Pending order unknown to exchange, re-placing');
      return this.place(side, request);
    }
    return this.applyResult(side, status.value);
  }

  private async place(side: HedgeSide, request: OrderRequest): Promise<SideTickReport> {
    this.journal?.recordRequest(side, request);
    this.audit?.info(
      'control-loop',
      'ORDER_SENT',
      `${side} ${request.symbol} ${request.side} ${request.intent} leg=${request.legIndex} usd=${request.notionalUsd} key=${request.idempotencyKey}`,
    );

    const result = await callWithRetry(
      `placeOrder ${request.idempotencyKey}`,
      () => this.exchange.placeOrder(request),
      this.orderPolicy,
      this.clock,
      this.abort.signal,
    );
    if (!result.ok) return this.onOrderFailure(side, request, result.error);
    return this.applyResult(side, result.value);
  }

  private async applyResult(side: HedgeSide, result: OrderResult): Promise<SideTickReport> {
    this.journal?.recordResult(result);
    const pending = this.machine.pendingRequest(side);
    if (
      result.status === 'FILLED' &&
      pending?.intent === 'CLOSE' &&
      pending.idempotencyKey === result.idempotencyKey
    ) {
      // 부분 청산이면 남은 물량이 있으므로 FLAT 전에 거래소 포지션을 다시 읽는다
      const position = await this.call(`getPosition ${pending.symbol}`, () => this.exchange.getPosition(pending.symbol));
      // 읽기 실패: 대기 주문을 유지하고 다음 tick에서 상태 조회부터 다시
      if (!position.ok) return this.onCallFailure(side, position.error, 'position after close');
      this.machine.applyOrderResult(side, result, position.value);
      return { side, outcome: 'ORDER_FILLED', detail: result.idempotencyKey };
    }
    this.machine.applyOrderResult(side, result);
    switch (result.status) {
      case 'FILLED':
        return { side, outcome: 'ORDER_FILLED', detail: result.idempotencyKey };
      case 'PENDING':
        return { side, outcome: 'ORDER_PENDING', detail: result.idempotencyKey };
      case 'CANCELLED':
      case 'REJECTED':
        return { side, outcome: 'REJECTED', detail: result.reason ?? result.status };
    }
  }

  /** 주문 관련 실패: terminal이면 거부 처리(사이드 중단), transient면 대기 주문 유지 */
  private onOrderFailure(side: HedgeSide, request: OrderRequest, error: AnyCollaboratorError): SideTickReport {
    if (isTerminal(error)) {
      this.journal?.recordResult({
        idempotencyKey: request.idempotencyKey,
        orderId: '',
        status: 'REJECTED',
        filledNotionalUsd: 0,
        avgPrice: 0,
        reason: error.message,
      });
      this.machine.applyRejection(side, error);
      return { side, outcome: 'REJECTED', detail: error.message };
    }
    log.warn({ side, key: request.idempotencyKey, err: error.message }, 'Order outcome unknown, will resolve next tick');
    return { side, outcome: 'UNAVAILABLE', detail: error.message };
  }

  private onCallFailure(side: HedgeSide, error: AnyCollaboratorError, what: string): SideTickReport {
    if (isTerminal(error)) {
      this.machine.halt(side, `${what}: ${error.message}`);
      return { side, outcome: 'HALTED', detail: error.message };
    }
    log.warn({ side, what, err: error.message }, 'Tick abandoned for side');
    return { side, outcome: 'UNAVAILABLE', detail: error.message };
  }

  private async reconcileSide(side: HedgeSide): Promise<void> {
    const symbol = this.machine.symbolOf(side);
    const current = this.machine.pendingRequest(side)?.idempotencyKey;
    const stillPending: OrderRequest[] = [];

    for (const entry of this.journal?.findUnresolved(side) ?? []) {
      const key = entry.request.idempotencyKey;
      if (key === current) continue;
      const status = await this.call(`getOrderStatus ${key}`, () => this.exchange.getOrderStatus(symbol, key));
      if (!status.ok) {
        this.onCallFailure(side, status.error, 'reconcile');
        return;
      }
      if (status.value === null) {
        this.journal?.markAbandoned(key, 'not found on exchange');
        log.warn({ side, key }, 'Journaled order unknown to exchange, abandoned');
      } else if (status.value.status === 'PENDING') {
        stillPending.push(entry.request);
      } else {
        this.journal?.recordResult(status.value);
        log.info({ side, key, status: status.value.status }, 'Journaled order resolved');
      }
    }

    const position = await this.call(`getPosition ${symbol}`, () => this.exchange.getPosition(symbol));
    if (!position.ok) {
      this.onCallFailure(side, position.error, 'reconcile');
      return;
    }

    const mismatch = this.machine.restore(side, position.value);
    if (mismatch) {
      log.error({ side, symbol, err: mismatch.message }, 'Reconciliation mismatch, exchange position adopted');
      this.audit?.error('control-loop', 'MISMATCH', mismatch.message);
      this.notifier?.notifyMismatch(mismatch.message);
    }

    const [adopt, ...extra] = stillPending;
    if (adopt) {
      this.machine.adoptPending(side, adopt);
      log.info({ side, key: adopt.idempotencyKey }, 'Unresolved order adopted as pending');
    }
    for (const request of extra) {
      log.error({ side, key: request.idempotencyKey }, 'More than one unresolved order for side');
    }

    this.reconciled[side] = true;
  }

  /** 심볼 기준: 사이드 심볼 마크가, 비율 기준: LONG/SHORT 가격비 (tick 내 캐시) */
  private async triggerPrice(side: HedgeSide, cache: PriceCache): Promise<CallResult<number>> {
    const key = this.machine.triggerKey(side);
    const symbol = this.machine.symbolOf(side);
    if (key === symbol) return this.markPrice(symbol, cache);

    const long = await this.markPrice(this.machine.symbolOf('LONG'), cache);
    if (!long.ok) return long;
    const short = await this.markPrice(this.machine.symbolOf('SHORT'), cache);
    if (!short.ok) return short;
    return ok(long.value / short.value);
  }

  private async markPrice(symbol: string, cache: PriceCache): Promise<CallResult<number>> {
    const cached = cache.get(symbol);
    if (cached) return cached;
    const res = await this.call(`getMarkPrice ${symbol}`, () => this.prices.getMarkPrice(symbol));
    cache.set(symbol, res);
    return res;
  }

  private async call<T>(label: string, fn: () => Promise<CallResult<T>>): Promise<CallResult<T>> {
    return callWithRetry(label, fn, this.callPolicy, this.clock, this.abort.signal);
  }

  /** 한쪽이 중단됐는데 반대쪽이 포지션 보유 → 헤지 불균형 (사이드별 1회 알림) */
  private checkImbalance(): void {
    for (const side of HEDGE_SIDES) {
      const other = OTHER[side];
      const exposed = this.machine.position(other).totalNotionalUsd;
      const imbalanced = this.machine.isHalted(side) && exposed > 0;
      if (!imbalanced) {
        this.imbalanceReported.delete(side);
        continue;
      }
      if (this.imbalanceReported.has(side)) continue;
      this.imbalanceReported.add(side);
      log.error({ haltedSide: side, exposedSide: other, exposedUsd: exposed }, 'Hedge imbalance');
      this.audit?.error('control-loop', 'IMBALANCE', `${side} halted while ${other} holds ${exposed} USD`);
      this.notifier?.notifyImbalance(side, other, exposed);
    }
  }
}
