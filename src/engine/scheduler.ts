import cron, { type ScheduledTask } from 'node-cron';
import { createChildLogger } from '../logger.js';
import { HEDGE_SIDES } from '../types/index.js';
import type { HedgeStateMachine, SideSnapshot } from './hedge-state-machine.js';

const log = createChildLogger('scheduler');

/** 사이드 상태 한 줄 요약 */
export function statusLine(s: SideSnapshot): string {
  const pct = s.drawdownPct === null ? '-' : `${s.drawdownPct.toFixed(2)}%`;
  const anchor = s.anchorPrice === null ? '-' : String(s.anchorPrice);
  const next = s.nextLegPct === null ? 'capped' : `next ≥ ${s.nextLegPct}%`;
  const flags = [s.halted !== null ? 'HALTED' : '', s.pendingKey ? `pending ${s.pendingKey}` : '', s.closeRequested ? 'close queued' : '']
    .filter(Boolean)
    .join(', ');
  return (
    `${s.side} ${s.symbol} ${s.state} | ${s.totalNotionalUsd.toFixed(2)} USD, ${s.legsFilled} legs | ` +
    `drawdown ${pct} from ${anchor} (${next})` +
    (flags ? ` [${flags}]` : '')
  );
}

/**
 * 정기 상태 리포트: 양 사이드 스냅샷을 로그로 남긴다
 */
export function startStatusReport(expression: string, machine: HedgeStateMachine): ScheduledTask {
  const task = cron.schedule(expression, () => {
    for (const side of HEDGE_SIDES) {
      const snapshot = machine.snapshot(side);
      log.info({ ...snapshot }, statusLine(snapshot));
    }
  });
  log.info({ expression }, 'Status report scheduler started');
  return task;
}
