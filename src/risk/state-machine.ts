import { createChildLogger } from '../logger.js';
import type { HedgeSide, HedgeState } from '../types/index.js';

const log = createChildLogger('state-machine');

type StateTransition = [HedgeState, HedgeState];

/** 허용된 상태 전이 */
const VALID_TRANSITIONS: StateTransition[] = [
  ['FLAT', 'ENTERING'],
  ['ENTERING', 'ENTERED'],
  ['ENTERING', 'FLAT'],                // 주문 거부/미체결
  ['ENTERED', 'SCALING_PENDING'],
  ['SCALING', 'SCALING_PENDING'],
  ['SCALING_PENDING', 'SCALING'],
  ['SCALING_PENDING', 'ENTERED'],      // 추가 레그 거부 (이전 안정 상태 복귀)
  ['ENTERED', 'CAPPED'],               // 스케일인 꺼짐 → 최초 레그가 곧 상한
  ['SCALING', 'CAPPED'],
  // 외부 청산 신호: 안정 상태에서만
  ['ENTERED', 'CLOSING'],
  ['SCALING', 'CLOSING'],
  ['CAPPED', 'CLOSING'],
  ['CLOSING', 'FLAT'],
  // 청산 거부 시 복귀
  ['CLOSING', 'ENTERED'],
  ['CLOSING', 'SCALING'],
  ['CLOSING', 'CAPPED'],
];

const TRANSIENT_STATES: ReadonlySet<HedgeState> = new Set(['ENTERING', 'SCALING_PENDING', 'CLOSING']);

export interface TransitionRecord {
  readonly from: HedgeState;
  readonly to: HedgeState;
  readonly at: number;
  readonly forced?: string;
}

/**
 * 사이드별 헤지 상태 머신
 * 잘못된 전이 시도 시 에러 (안전장치)
 */
export class SideStateMachine {
  private state: HedgeState = 'FLAT';
  private stateEnteredAt: number;
  private history: TransitionRecord[] = [];
  private readonly now: () => number;

  constructor(
    readonly side: HedgeSide,
    now: () => number = Date.now,
  ) {
    this.now = now;
    this.stateEnteredAt = now();
  }

  get current(): HedgeState {
    return this.state;
  }

  get stateAge(): number {
    return this.now() - this.stateEnteredAt;
  }

  transition(to: HedgeState): void {
    if (this.state === to) return; // noop

    if (!this.canTransition(to)) {
      const msg = `Invalid state transition: ${this.state} → ${to}`;
      log.error({ side: this.side, from: this.state, to }, msg);
      throw new Error(msg);
    }

    log.info({ side: this.side, from: this.state, to }, 'State transition');
    this.record({ from: this.state, to, at: this.now() });
  }

  /**
   * 재시작 정합성 복구 전용: 전이 표를 거치지 않고 거래소 기준 상태로 맞춘다
   */
  force(to: HedgeState, reason: string): void {
    if (this.state === to) return;
    log.warn({ side: this.side, from: this.state, to, reason }, 'Forced state');
    this.record({ from: this.state, to, at: this.now(), forced: reason });
  }

  canTransition(to: HedgeState): boolean {
    return VALID_TRANSITIONS.some(([from, target]) => from === this.state && target === to);
  }

  /** 주문 진행 중 (새 행동 계산 금지) */
  isTransient(): boolean {
    return TRANSIENT_STATES.has(this.state);
  }

  isFlat(): boolean {
    return this.state === 'FLAT';
  }

  getHistory(): ReadonlyArray<TransitionRecord> {
    return this.history;
  }

  private record(entry: TransitionRecord): void {
    this.history.push(entry);
    this.state = entry.to;
    this.stateEnteredAt = entry.at;

    // 히스토리 100개 제한
    if (this.history.length > 100) {
      this.history = this.history.slice(-50);
    }
  }
}
