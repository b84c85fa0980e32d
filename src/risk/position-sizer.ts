import type { HedgeConfig } from '../config.js';
import type { Position, SizerAction } from '../types/index.js';

export type SizingConfig = Pick<
  HedgeConfig,
  | 'usdPositionSize'
  | 'maxUsdPosition'
  | 'triggerDropPct'
  | 'enableScaleIn'
  | 'scaleInLegs'
  | 'scaleInDropStep'
  | 'capScope'
  | 'minOrderUsd'
>;

/** 퍼센트 비교 허용 오차 */
const EPSILON = 1e-9;

/** 사이클당 최대 레그 수 (최초 진입 포함) */
export function maxLegs(config: SizingConfig): number {
  return config.enableScaleIn ? config.scaleInLegs : 1;
}

/** 레그 k(0부터)가 발동하는 하락률 */
export function legThresholdPct(legIndex: number, config: SizingConfig): number {
  return config.triggerDropPct + legIndex * (config.enableScaleIn ? config.scaleInDropStep : 0);
}

/** 남은 상한 여유 (USD). combined이면 반대 사이드 노출까지 합산 */
export function capHeadroomUsd(
  totalNotionalUsd: number,
  config: SizingConfig,
  otherSideNotionalUsd: number = 0,
): number {
  const used = totalNotionalUsd + (config.capScope === 'combined' ? otherSideNotionalUsd : 0);
  return Math.max(0, config.maxUsdPosition - used);
}

/**
 * 다음 행동 결정 (순서대로 평가)
 *
 * 1. 하락률 < trigger → NONE
 * 2. 레그 0개 → OPEN_INITIAL(min(size, 여유))
 * 3. 스케일인 꺼짐 / 레그 수 한도 / 노출 한도 → CAP_REACHED
 * 4. 하락률 ≥ trigger + legsFilled × step → SCALE_IN(legsFilled, min(size, 여유))
 * 5. 그 외 NONE
 *
 * 최소 주문 금액 미만으로 잘리는 주문은 CAP_REACHED로 본다.
 */
export function nextAction(
  position: Pick<Position, 'legsFilled' | 'totalNotionalUsd'>,
  drawdownPct: number,
  config: SizingConfig,
  otherSideNotionalUsd: number = 0,
): SizerAction {
  if (drawdownPct + EPSILON < config.triggerDropPct) {
    return { kind: 'NONE' };
  }

  const headroom = capHeadroomUsd(position.totalNotionalUsd, config, otherSideNotionalUsd);

  if (position.legsFilled === 0) {
    const notionalUsd = Math.min(config.usdPositionSize, headroom);
    if (notionalUsd <= 0 || notionalUsd < config.minOrderUsd) return { kind: 'CAP_REACHED' };
    return { kind: 'OPEN_INITIAL', notionalUsd };
  }

  if (
    !config.enableScaleIn ||
    position.legsFilled >= config.scaleInLegs ||
    position.totalNotionalUsd >= config.maxUsdPosition ||
    headroom <= 0
  ) {
    return { kind: 'CAP_REACHED' };
  }

  if (drawdownPct + EPSILON >= legThresholdPct(position.legsFilled, config)) {
    const notionalUsd = Math.min(config.usdPositionSize, headroom);
    if (notionalUsd < config.minOrderUsd) return { kind: 'CAP_REACHED' };
    return { kind: 'SCALE_IN', legIndex: position.legsFilled, notionalUsd };
  }

  return { kind: 'NONE' };
}
