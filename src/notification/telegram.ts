import { createChildLogger } from '../logger.js';

const log = createChildLogger('telegram');

export interface MessageSender {
  send(text: string): void;
  /** 큐가 빌 때까지 대기. 시간 안에 비면 true */
  flush?(timeoutMs: number): Promise<boolean>;
}

/**
 * Telegram Bot API를 통한 메시지 전송
 * - 큐 + 초당 1건 제한 (rate limit 준수)
 * - 전송 실패 시 로그만 남김 (알림 실패로 봇이 죽으면 안 됨)
 */
export class TelegramNotifier implements MessageSender {
  private readonly botToken: string;
  private readonly chatId: string;
  private readonly queue: string[] = [];
  private processing = false;
  private drained: Promise<void> = Promise.resolve();

  constructor(botToken: string, chatId: string) {
    this.botToken = botToken;
    this.chatId = chatId;
  }

  send(text: string): void {
    this.queue.push(text);
    if (!this.processing) {
      this.drained = this.processQueue().catch((err: unknown) => {
        this.processing = false;
        log.error({ err }, 'Telegram queue stopped');
      });
    }
  }

  async flush(timeoutMs: number): Promise<boolean> {
    let timer: NodeJS.Timeout | undefined;
    const timedOut = new Promise<boolean>((resolve) => {
      timer = setTimeout(() => resolve(false), timeoutMs);
    });
    try {
      const done = await Promise.race([this.drained.then(() => true), timedOut]);
      if (!done) log.warn({ queued: this.queue.length, timeoutMs }, 'Telegram queue not drained');
      return done;
    } finally {
      clearTimeout(timer);
    }
  }

  private async processQueue(): Promise<void> {
    this.processing = true;
    let msg = this.queue.shift();
    while (msg !== undefined) {
      try {
        await this.doSend(msg);
      } catch (err) {
        log.warn({ err }, 'Telegram send failed');
      }
      // 초당 1건 제한
      if (this.queue.length > 0) {
        await new Promise((r) => setTimeout(r, 1000));
      }
      msg = this.queue.shift();
    }
    this.processing = false;
  }

  private async doSend(text: string): Promise<void> {
    const url = `https://api.telegram.org/bot${this.botToken}/sendMessage`;
    const res = await fetch(url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ chat_id: this.chatId, text, parse_mode: 'HTML' }),
    });
    if (!res.ok) {
      const body = await res.text().catch(() => '');
      log.warn({ status: res.status, body }, 'Telegram API error');
    }
  }
}
