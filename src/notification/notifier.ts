import type { TelegramSettings, TradingMode } from '../config.js';
import { createChildLogger } from '../logger.js';
import type { HedgeSide, OrderIntent } from '../types/index.js';
import { TelegramNotifier, type MessageSender } from './telegram.js';

const log = createChildLogger('notifier');

const INTENT_LABEL: Record<OrderIntent, string> = {
  OPEN: '최초 진입',
  SCALE_IN: '추가 진입',
  CLOSE: '청산',
};

function usd(value: number): string {
  return value.toLocaleString('en-US', { maximumFractionDigits: 2 });
}

/**
 * 알림 허브: TelegramNotifier 래핑 + 이벤트별 메시지 포맷
 * enabled=false이거나 토큰/채팅 ID가 없으면 모든 호출 무시
 */
export class Notifier {
  private readonly tg: MessageSender | null;

  constructor(settings: TelegramSettings, sender?: MessageSender) {
    if (settings.enabled && settings.botToken && settings.chatId) {
      this.tg = sender ?? new TelegramNotifier(settings.botToken, settings.chatId);
      log.info('Telegram notifier enabled');
    } else {
      this.tg = null;
      log.debug('Telegram notifier disabled');
    }
  }

  get enabled(): boolean {
    return this.tg !== null;
  }

  notifyFill(side: HedgeSide, symbol: string, intent: OrderIntent, notionalUsd: number, avgPrice: number, legIndex: number): void {
    const leg = intent === 'CLOSE' ? '' : ` (레그 ${legIndex + 1})`;
    this.send(
      `${side === 'LONG' ? '📈' : '📉'} <b>${side} ${INTENT_LABEL[intent]} 체결</b>${leg}\n` +
      `심볼: ${symbol}\n` +
      `금액: ${usd(notionalUsd)} USD\n` +
      `평균가: ${avgPrice}`,
    );
  }

  notifyCapReached(side: HedgeSide, symbol: string, totalNotionalUsd: number, legsFilled: number): void {
    this.send(
      `🧱 <b>${side} 상한 도달</b>\n` +
      `심볼: ${symbol}\n` +
      `노출: ${usd(totalNotionalUsd)} USD (${legsFilled} 레그)`,
    );
  }

  notifySideHalted(side: HedgeSide, reason: string): void {
    this.send(`🚨 <b>${side} 사이드 중단</b>\n사유: ${reason}`);
  }

  notifySideResumed(side: HedgeSide): void {
    this.send(`✅ <b>${side} 사이드 재개</b>`);
  }

  notifyMismatch(message: string): void {
    this.send(`⚠️ <b>포지션 불일치</b> (거래소 기준으로 복구)\n${message}`);
  }

  notifyImbalance(haltedSide: HedgeSide, exposedSide: HedgeSide, exposedNotionalUsd: number): void {
    this.send(
      `⚠️ <b>헤지 불균형</b>\n` +
      `${haltedSide} 중단, ${exposedSide} 노출 ${usd(exposedNotionalUsd)} USD, 수동 확인 필요`,
    );
  }

  notifyStartup(mode: TradingMode, symbolLong: string, symbolShort: string): void {
    this.send(`🤖 <b>봇 시작</b>\n모드: ${mode}\nLONG ${symbolLong} / SHORT ${symbolShort}`);
  }

  notifyShutdown(): void {
    this.send('🛑 <b>봇 종료</b>');
  }

  /** 종료 직전: 대기 중인 알림 전송을 최대 timeoutMs까지 기다린다 */
  async flush(timeoutMs: number): Promise<void> {
    if (!this.tg?.flush) return;
    await this.tg.flush(timeoutMs);
  }

  private send(text: string): void {
    if (!this.tg) return;
    try {
      this.tg.send(text);
    } catch (err) {
      log.warn({ err }, 'Notifier send error');
    }
  }
}
