export type HedgeSide = 'LONG' | 'SHORT';

export const HEDGE_SIDES: readonly HedgeSide[] = ['LONG', 'SHORT'];

export type HedgeState =
  | 'FLAT'             // 포지션 없음, 트리거 대기
  | 'ENTERING'         // 최초 진입 주문 대기
  | 'ENTERED'          // 최초 레그 체결
  | 'SCALING_PENDING'  // 추가 레그 주문 대기
  | 'SCALING'          // 추가 레그 체결
  | 'CAPPED'           // 상한 도달 (청산 전까지 유지)
  | 'CLOSING';         // 청산 주문 대기

/** 기준가(앵커): 심볼(또는 비율 키)별 1개 */
export interface ReferencePrice {
  readonly symbol: string;
  anchorPrice: number;
  lastObservedPrice: number;
  updatedAt: number;       // Unix ms
  frozen: boolean;         // 포지션 보유 중에는 앵커 고정
  readonly epoch: string;  // 사이클 식별자 (멱등 키에 포함)
}

export interface DrawdownReading {
  readonly symbol: string;
  readonly price: number;
  readonly anchorPrice: number;
  readonly pct: number;    // 0 이상 (앵커 대비 하락률 %)
  readonly epoch: string;
}

export interface Position {
  readonly side: HedgeSide;
  readonly symbol: string;
  totalNotionalUsd: number;
  legsFilled: number;
  avgEntryPrice: number;
  state: HedgeState;
}

export type SizerAction =
  | { readonly kind: 'NONE' }
  | { readonly kind: 'OPEN_INITIAL'; readonly notionalUsd: number }
  | { readonly kind: 'SCALE_IN'; readonly legIndex: number; readonly notionalUsd: number }
  | { readonly kind: 'CAP_REACHED' };
