import type { HedgeConfig } from '../config.js';
import { OrderRejectedError, ReconciliationMismatchError, type TerminalError } from '../errors.js';
import { buildIdempotencyKey } from '../execution/idempotency.js';
import { createChildLogger } from '../logger.js';
import type { Notifier } from '../notification/notifier.js';
import { legThresholdPct, maxLegs, nextAction } from '../risk/position-sizer.js';
import { SideStateMachine } from '../risk/state-machine.js';
import type { TriggerTracker } from '../risk/trigger-tracker.js';
import type { AuditLog } from '../safety/audit-log.js';
import type {
  DrawdownReading,
  ExchangePosition,
  HedgeSide,
  HedgeState,
  OrderIntent,
  OrderRequest,
  OrderResult,
  Position,
} from '../types/index.js';

const log = createChildLogger('hedge');

/** 재시작 복구 시 메모리/거래소 노출 차이 허용 비율 (레그 크기 대비) */
const MISMATCH_TOLERANCE = 0.01;

export type IdleReason =
  | 'HALTED'
  | 'PENDING'
  | 'NO_ACTION'
  | 'CAPPED'
  | 'CAP_REACHED'
  | 'NOTHING_TO_CLOSE'
  | 'DUPLICATE_KEY';

export type Evaluation =
  | { readonly kind: 'ORDER'; readonly request: OrderRequest; readonly reading: DrawdownReading }
  | { readonly kind: 'IDLE'; readonly reason: IdleReason; readonly reading: DrawdownReading };

export interface SideSnapshot {
  readonly side: HedgeSide;
  readonly symbol: string;
  readonly state: HedgeState;
  readonly totalNotionalUsd: number;
  readonly legsFilled: number;
  readonly avgEntryPrice: number;
  readonly halted: string | null;
  readonly pendingKey: string | null;
  readonly closeRequested: boolean;
  readonly anchorPrice: number | null;
  readonly drawdownPct: number | null;
  /** 다음 레그 발동 하락률 (상한 도달 시 null) */
  readonly nextLegPct: number | null;
}

interface PendingOrder {
  readonly request: OrderRequest;
  /** 거부 시 돌아갈 안정 상태 */
  readonly stableState: HedgeState;
}

interface SideRuntime {
  readonly side: HedgeSide;
  readonly fsm: SideStateMachine;
  readonly position: Position;
  readonly issuedKeys: Set<string>;
  pending: PendingOrder | null;
  closeRequested: boolean;
  halted: string | null;
  lastReading: DrawdownReading | null;
  /** 재시작 복구 후 첫 관측에서 앵커 고정 */
  freezeOnObserve: boolean;
  /** 메모리 상태가 의미 있음 (복구 또는 체결 이후) */
  known: boolean;
  capNoticeLogged: boolean;
  duplicateNoticeLogged: boolean;
  /** 이번 사이클에서 부분 청산 뒤 다시 낸 청산 횟수 (청산 키 번호) */
  closeSeq: number;
}

export interface HedgeStateMachineDeps {
  readonly tracker: TriggerTracker;
  readonly audit?: AuditLog;
  readonly notifier?: Notifier;
  readonly now?: () => number;
}

const OTHER_SIDE: Record<HedgeSide, HedgeSide> = { LONG: 'SHORT', SHORT: 'LONG' };

const PENDING_STATE: Record<OrderIntent, HedgeState> = {
  OPEN: 'ENTERING',
  SCALE_IN: 'SCALING_PENDING',
  CLOSE: 'CLOSING',
};

/**
 * 양 사이드 헤지 상태 관리
 *
 * - 사이드마다 상태 머신 1개 + 포지션 + 대기 주문(최대 1개)
 * - 주문은 evaluate가 만들고, 결과는 applyOrderResult / applyRejection으로 반영
 * - 한 번 발행된 멱등 키는 거부로 해제되기 전까지 다시 발행하지 않는다
 */
export class HedgeStateMachine {
  private readonly sides: Record<HedgeSide, SideRuntime>;
  private readonly tracker: TriggerTracker;
  private readonly audit: AuditLog | undefined;
  private readonly notifier: Notifier | undefined;

  constructor(
    private readonly config: HedgeConfig,
    deps: HedgeStateMachineDeps,
  ) {
    this.tracker = deps.tracker;
    this.audit = deps.audit;
    this.notifier = deps.notifier;
    const now = deps.now ?? Date.now;
    this.sides = {
      LONG: this.createRuntime('LONG', now),
      SHORT: this.createRuntime('SHORT', now),
    };
  }

  symbolOf(side: HedgeSide): string {
    return side === 'LONG' ? this.config.symbolLong : this.config.symbolShort;
  }

  /** 트리거 추적 키: 심볼 기준이면 사이드 심볼, 비율 기준이면 "LONG/SHORT" 공용 키 */
  triggerKey(side: HedgeSide): string {
    return this.config.triggerBasis === 'ratio'
      ? `${this.config.symbolLong}/${this.config.symbolShort}`
      : this.symbolOf(side);
  }

  state(side: HedgeSide): HedgeState {
    return this.sides[side].fsm.current;
  }

  position(side: HedgeSide): Readonly<Position> {
    return this.sides[side].position;
  }

  isHalted(side: HedgeSide): boolean {
    return this.sides[side].halted !== null;
  }

  hasPending(side: HedgeSide): boolean {
    return this.sides[side].pending !== null;
  }

  pendingRequest(side: HedgeSide): OrderRequest | null {
    return this.sides[side].pending?.request ?? null;
  }

  /**
   * 가격 관측 → 다음 행동 결정
   * price는 심볼 기준이면 사이드 심볼의 마크가, 비율 기준이면 LONG/SHORT 가격비
   */
  evaluate(side: HedgeSide, price: number): Evaluation {
    const rt = this.sides[side];
    const key = this.triggerKey(side);
    const reading = this.tracker.observe(key, price);
    rt.lastReading = reading;
    if (rt.freezeOnObserve) {
      this.tracker.freeze(key);
      rt.freezeOnObserve = false;
    }

    if (rt.halted !== null) return { kind: 'IDLE', reason: 'HALTED', reading };
    if (rt.pending) return { kind: 'IDLE', reason: 'PENDING', reading };

    const state = rt.fsm.current;

    if (rt.closeRequested) {
      if (state === 'FLAT') {
        rt.closeRequested = false;
        log.info({ side }, 'Close requested but side is flat');
        return { kind: 'IDLE', reason: 'NOTHING_TO_CLOSE', reading };
      }
      return this.issue(rt, 'CLOSE', -1, rt.position.totalNotionalUsd, reading);
    }

    if (state === 'CAPPED') return { kind: 'IDLE', reason: 'CAPPED', reading };

    const action = nextAction(rt.position, reading.pct, this.config, this.otherSideExposure(side));
    switch (action.kind) {
      case 'NONE':
        return { kind: 'IDLE', reason: 'NO_ACTION', reading };
      case 'OPEN_INITIAL':
        return this.issue(rt, 'OPEN', 0, action.notionalUsd, reading);
      case 'SCALE_IN':
        return this.issue(rt, 'SCALE_IN', action.legIndex, action.notionalUsd, reading);
      case 'CAP_REACHED':
        this.onCapReached(rt, reading);
        return { kind: 'IDLE', reason: 'CAP_REACHED', reading };
    }
  }

  /**
   * 주문 결과 반영. 대기 주문과 키가 다르면 무시.
   * 청산 체결이면 remaining(체결 후 거래소 포지션)으로 남은 물량을 판단한다.
   * 없으면 체결 금액만큼 차감한 값으로 본다.
   */
  applyOrderResult(side: HedgeSide, result: OrderResult, remaining?: ExchangePosition): void {
    const rt = this.sides[side];
    const pending = rt.pending;
    if (!pending || pending.request.idempotencyKey !== result.idempotencyKey) {
      log.warn({ side, key: result.idempotencyKey, pending: pending?.request.idempotencyKey }, 'Result for unknown order ignored');
      return;
    }

    switch (result.status) {
      case 'PENDING':
        log.debug({ side, key: result.idempotencyKey }, 'Order still pending');
        return;
      case 'CANCELLED':
      case 'REJECTED':
        this.applyRejection(side, new OrderRejectedError(result.reason ?? result.status.toLowerCase()));
        return;
      case 'FILLED':
        break;
    }

    const request = pending.request;
    const symbol = this.symbolOf(side);
    rt.pending = null;
    rt.known = true;

    if (request.intent === 'CLOSE') {
      const left = this.remainingAfterClose(rt, result, remaining);
      if (left > this.config.usdPositionSize * MISMATCH_TOLERANCE) {
        // 부분 청산: 남은 물량으로 안정 상태 복귀, 청산 요청은 유지 (다음 청산은 새 키)
        rt.position.totalNotionalUsd = left;
        rt.position.legsFilled = this.inferLegs(left);
        if (remaining && remaining.avgPrice > 0) rt.position.avgEntryPrice = remaining.avgPrice;
        rt.closeSeq += 1;
        this.moveTo(rt, pending.stableState);
        log.warn({ side, symbol, filledUsd: result.filledNotionalUsd, leftUsd: left }, 'Partial close, remainder queued');
        this.audit?.warn('hedge', 'PARTIAL_CLOSE', `${side} ${symbol} filled=${result.filledNotionalUsd} left=${left}`);
      } else {
        rt.position.totalNotionalUsd = 0;
        rt.position.legsFilled = 0;
        rt.position.avgEntryPrice = 0;
        rt.closeRequested = false;
        this.moveTo(rt, 'FLAT');
        this.endCycle(side);
      }
    } else {
      const prevTotal = rt.position.totalNotionalUsd;
      const total = prevTotal + result.filledNotionalUsd;
      rt.position.avgEntryPrice = weightedEntry(
        prevTotal,
        rt.position.avgEntryPrice,
        result.filledNotionalUsd,
        result.avgPrice,
      );
      rt.position.totalNotionalUsd = total;
      rt.position.legsFilled = request.legIndex + 1;
      this.freezeAnchor(rt);
      this.moveTo(rt, request.intent === 'OPEN' ? 'ENTERED' : 'SCALING');
    }

    log.info(
      {
        side,
        symbol,
        intent: request.intent,
        legIndex: request.legIndex,
        filledUsd: result.filledNotionalUsd,
        avgPrice: result.avgPrice,
        totalUsd: rt.position.totalNotionalUsd,
      },
      'Order filled',
    );
    this.audit?.info(
      'hedge',
      'ORDER_FILLED',
      `${side} ${symbol} ${request.intent} leg=${request.legIndex} filled=${result.filledNotionalUsd} avg=${result.avgPrice} key=${request.idempotencyKey}`,
    );
    this.notifier?.notifyFill(side, symbol, request.intent, result.filledNotionalUsd, result.avgPrice, request.legIndex);
  }

  /**
   * 주문 거부 (체결 없음): 직전 안정 상태로 복귀, 키 해제, 사이드 중단
   */
  applyRejection(side: HedgeSide, error: TerminalError): void {
    const rt = this.sides[side];
    const pending = rt.pending;
    if (pending) {
      rt.pending = null;
      rt.issuedKeys.delete(pending.request.idempotencyKey);
      if (pending.request.intent === 'CLOSE') rt.closeRequested = false;
      this.moveTo(rt, pending.stableState);
      if (pending.request.intent === 'OPEN') this.releaseAnchor(rt);
      this.audit?.warn(
        'hedge',
        'ORDER_REJECTED',
        `${side} ${pending.request.intent} key=${pending.request.idempotencyKey}: ${error.message}`,
      );
    }
    this.halt(side, error.message);
  }

  requestClose(side: HedgeSide): void {
    const rt = this.sides[side];
    rt.closeRequested = true;
    log.info({ side, state: rt.fsm.current }, 'Close requested');
    this.audit?.info('hedge', 'CLOSE_REQUESTED', `${side} state=${rt.fsm.current}`);
  }

  halt(side: HedgeSide, reason: string): void {
    const rt = this.sides[side];
    if (rt.halted !== null) return;
    rt.halted = reason;
    log.error({ side, reason }, 'Side halted');
    this.audit?.error('hedge', 'SIDE_HALTED', `${side}: ${reason}`);
    this.notifier?.notifySideHalted(side, reason);
  }

  /** @returns 중단 상태였으면 true */
  resume(side: HedgeSide): boolean {
    const rt = this.sides[side];
    if (rt.halted === null) return false;
    rt.halted = null;
    rt.capNoticeLogged = false;
    log.info({ side }, 'Side resumed');
    this.audit?.info('hedge', 'SIDE_RESUMED', side);
    this.notifier?.notifySideResumed(side);
    return true;
  }

  /**
   * 거래소 포지션을 기준으로 사이드 상태 복구
   * @returns 메모리 상태와 달랐으면 ReconciliationMismatchError (거래소 값으로 이미 교체됨)
   */
  restore(side: HedgeSide, exchange: ExchangePosition): ReconciliationMismatchError | null {
    const rt = this.sides[side];
    const symbol = this.symbolOf(side);

    if (rt.pending) {
      log.warn({ side, key: rt.pending.request.idempotencyKey }, 'Restore skipped while an order is pending');
      return null;
    }

    if (exchange.side !== null && exchange.side !== side && exchange.notionalUsd > 0) {
      const mismatch = new ReconciliationMismatchError(
        symbol,
        rt.position.totalNotionalUsd,
        exchange.notionalUsd,
        `exchange holds a ${exchange.side} position on the ${side} side`,
      );
      this.halt(side, mismatch.message);
      return mismatch;
    }

    const notional = exchange.side === null ? 0 : exchange.notionalUsd;
    const before = rt.position.totalNotionalUsd;
    const wasKnown = rt.known;

    if (notional <= 0) {
      rt.position.totalNotionalUsd = 0;
      rt.position.legsFilled = 0;
      rt.position.avgEntryPrice = 0;
      this.moveTo(rt, 'FLAT', 'reconciled: no position on exchange');
      if (this.tracker.isFrozen(this.triggerKey(side))) this.endCycle(side);
    } else {
      const limit = maxLegs(this.config);
      const legs = this.inferLegs(notional);
      const capped = legs >= limit || notional >= this.config.maxUsdPosition;
      rt.position.totalNotionalUsd = notional;
      rt.position.legsFilled = legs;
      rt.position.avgEntryPrice = exchange.avgPrice;
      this.moveTo(rt, capped ? 'CAPPED' : legs === 1 ? 'ENTERED' : 'SCALING', 'reconciled from exchange position');

      this.freezeAnchor(rt);
    }

    rt.known = true;
    log.info(
      { side, symbol, notional, legs: rt.position.legsFilled, state: rt.fsm.current },
      'Side reconciled',
    );
    this.audit?.info(
      'hedge',
      'RECONCILED',
      `${side} ${symbol} notional=${notional} legs=${rt.position.legsFilled} state=${rt.fsm.current}`,
    );

    const tolerance = this.config.usdPositionSize * MISMATCH_TOLERANCE;
    if (wasKnown && Math.abs(before - notional) > tolerance) {
      return new ReconciliationMismatchError(symbol, before, notional);
    }
    return null;
  }

  /**
   * 재시작 전 결과 미확정 주문을 대기 주문으로 다시 잡는다 (다음 tick에서 상태 조회)
   */
  adoptPending(side: HedgeSide, request: OrderRequest): void {
    const rt = this.sides[side];
    if (rt.pending) return;
    rt.pending = { request, stableState: rt.fsm.current };
    rt.issuedKeys.add(request.idempotencyKey);
    this.moveTo(rt, PENDING_STATE[request.intent], `unresolved order ${request.idempotencyKey}`);
    if (request.intent !== 'CLOSE') this.freezeAnchor(rt);
  }

  snapshot(side: HedgeSide): SideSnapshot {
    const rt = this.sides[side];
    const legs = rt.position.legsFilled;
    const reading = rt.lastReading;
    const atCap =
      rt.fsm.current === 'CAPPED' ||
      (legs > 0 && (!this.config.enableScaleIn || legs >= maxLegs(this.config)));
    return {
      side,
      symbol: this.symbolOf(side),
      state: rt.fsm.current,
      totalNotionalUsd: rt.position.totalNotionalUsd,
      legsFilled: legs,
      avgEntryPrice: rt.position.avgEntryPrice,
      halted: rt.halted,
      pendingKey: rt.pending?.request.idempotencyKey ?? null,
      closeRequested: rt.closeRequested,
      anchorPrice: reading?.anchorPrice ?? null,
      drawdownPct: reading?.pct ?? null,
      nextLegPct: atCap ? null : legThresholdPct(legs, this.config),
    };
  }

  private createRuntime(side: HedgeSide, now: () => number): SideRuntime {
    return {
      side,
      fsm: new SideStateMachine(side, now),
      position: {
        side,
        symbol: this.symbolOf(side),
        totalNotionalUsd: 0,
        legsFilled: 0,
        avgEntryPrice: 0,
        state: 'FLAT',
      },
      issuedKeys: new Set(),
      pending: null,
      closeRequested: false,
      halted: null,
      lastReading: null,
      freezeOnObserve: false,
      known: false,
      capNoticeLogged: false,
      duplicateNoticeLogged: false,
      closeSeq: 0,
    };
  }

  private issue(
    rt: SideRuntime,
    intent: OrderIntent,
    legIndex: number,
    notionalUsd: number,
    reading: DrawdownReading,
  ): Evaluation {
    const symbol = this.symbolOf(rt.side);
    const idempotencyKey = buildIdempotencyKey(symbol, reading.epoch, intent === 'CLOSE' ? 'close' : legIndex, rt.closeSeq);
    if (rt.issuedKeys.has(idempotencyKey)) {
      // 상태가 바뀔 때까지 한 번만 (비율 기준에서는 반대 사이드 청산까지 매 tick 반복된다)
      if (!rt.duplicateNoticeLogged) {
        rt.duplicateNoticeLogged = true;
        log.warn({ side: rt.side, key: idempotencyKey, state: rt.fsm.current }, 'Idempotency key already issued');
      }
      return { kind: 'IDLE', reason: 'DUPLICATE_KEY', reading };
    }

    const opening = intent !== 'CLOSE';
    const request: OrderRequest = {
      idempotencyKey,
      symbol,
      side: (rt.side === 'LONG') === opening ? 'BUY' : 'SELL',
      intent,
      legIndex,
      notionalUsd,
      reduceOnly: !opening,
    };

    rt.issuedKeys.add(idempotencyKey);
    rt.pending = { request, stableState: rt.fsm.current };
    this.moveTo(rt, PENDING_STATE[intent]);
    // 진입 주문이 나가는 순간부터 앵커 고정 (체결 확인이 늦어져도 레그 기준이 움직이지 않게)
    if (intent === 'OPEN') this.freezeAnchor(rt);

    log.info(
      { side: rt.side, symbol, intent, legIndex, notionalUsd, pct: reading.pct, anchor: reading.anchorPrice, key: idempotencyKey },
      'Order issued',
    );
    return { kind: 'ORDER', request, reading };
  }

  private onCapReached(rt: SideRuntime, reading: DrawdownReading): void {
    const state = rt.fsm.current;
    if (state === 'ENTERED' || state === 'SCALING') {
      this.moveTo(rt, 'CAPPED');
      const symbol = this.symbolOf(rt.side);
      log.info(
        { side: rt.side, symbol, totalUsd: rt.position.totalNotionalUsd, legs: rt.position.legsFilled, pct: reading.pct },
        'Cap reached',
      );
      this.audit?.info(
        'hedge',
        'CAP_REACHED',
        `${rt.side} ${symbol} total=${rt.position.totalNotionalUsd} legs=${rt.position.legsFilled}`,
      );
      this.notifier?.notifyCapReached(rt.side, symbol, rt.position.totalNotionalUsd, rt.position.legsFilled);
      return;
    }
    // FLAT에서 여유 없음 (combined 상한 또는 최소 주문 금액 미만)
    if (!rt.capNoticeLogged) {
      rt.capNoticeLogged = true;
      log.warn({ side: rt.side, state, pct: reading.pct }, 'Trigger hit but no headroom for an order');
    }
  }

  /** 앵커가 아직 없으면 (재시작 직후) 다음 관측에서 고정 */
  private freezeAnchor(rt: SideRuntime): void {
    const key = this.triggerKey(rt.side);
    if (this.tracker.get(key)) {
      this.tracker.freeze(key);
    } else {
      rt.freezeOnObserve = true;
    }
  }

  /** 진입 거부: 이 키를 쓰는 포지션/대기 주문이 없으면 앵커 고정 해제 */
  private releaseAnchor(rt: SideRuntime): void {
    rt.freezeOnObserve = false;
    if (rt.position.totalNotionalUsd > 0) return;
    if (this.config.triggerBasis === 'ratio') {
      const other = this.sides[OTHER_SIDE[rt.side]];
      if (other.position.totalNotionalUsd > 0 || other.pending !== null) return;
    }
    this.tracker.unfreeze(this.triggerKey(rt.side));
  }

  /** 평가 변동으로 레그 크기를 조금 넘는 노출은 같은 레그 수로 본다 */
  private inferLegs(notional: number): number {
    const legs = Math.ceil(notional / this.config.usdPositionSize - MISMATCH_TOLERANCE);
    return Math.min(maxLegs(this.config), Math.max(1, legs));
  }

  /** 청산 체결 후 남은 노출 (진입 금액 기준) */
  private remainingAfterClose(rt: SideRuntime, result: OrderResult, remaining: ExchangePosition | undefined): number {
    if (remaining) return remaining.side === rt.side ? remaining.notionalUsd : 0;
    // 체결 0 = 거래소에 청산할 포지션이 없었음
    if (result.filledNotionalUsd <= 0) return 0;
    return Math.max(0, rt.position.totalNotionalUsd - result.filledNotionalUsd);
  }

  /** combined 상한 계산용 반대 사이드 노출 (대기 중인 진입 주문 포함) */
  private otherSideExposure(side: HedgeSide): number {
    const other = this.sides[OTHER_SIDE[side]];
    const pending = other.pending && other.pending.request.intent !== 'CLOSE' ? other.pending.request.notionalUsd : 0;
    return other.position.totalNotionalUsd + pending;
  }

  /** 사이클 종료 → 앵커 리셋 (비율 기준이면 양쪽 모두 비었을 때만) */
  private endCycle(side: HedgeSide): void {
    if (this.config.triggerBasis === 'ratio') {
      const bothFlat = (['LONG', 'SHORT'] as const).every(
        (s) => this.sides[s].fsm.current === 'FLAT' && this.sides[s].pending === null,
      );
      if (!bothFlat) return;
      this.tracker.reset(this.triggerKey(side));
      for (const s of ['LONG', 'SHORT'] as const) {
        this.sides[s].issuedKeys.clear();
        this.sides[s].closeSeq = 0;
      }
      return;
    }
    this.tracker.reset(this.triggerKey(side));
    this.sides[side].issuedKeys.clear();
    this.sides[side].closeSeq = 0;
  }

  private moveTo(rt: SideRuntime, to: HedgeState, forcedReason?: string): void {
    if (forcedReason !== undefined) {
      rt.fsm.force(to, forcedReason);
    } else {
      rt.fsm.transition(to);
    }
    rt.position.state = rt.fsm.current;
    rt.capNoticeLogged = false;
    rt.duplicateNoticeLogged = false;
  }
}

/** 체결 금액 가중 평균 진입가 (수량 = 금액 / 가격) */
function weightedEntry(prevNotional: number, prevPrice: number, addNotional: number, addPrice: number): number {
  if (addPrice <= 0 || addNotional <= 0) return prevPrice;
  if (prevNotional <= 0 || prevPrice <= 0) return addPrice;
  const qty = prevNotional / prevPrice + addNotional / addPrice;
  return (prevNotional + addNotional) / qty;
}
