import type Database from 'better-sqlite3';
import { getDb } from './database.js';
import type { TradingMode } from '../config.js';
import type { HedgeSide, OrderIntent, OrderRequest, OrderResult, OrderSide, OrderStatus } from '../types/index.js';

/** SENT: 요청 기록만 있음, ABANDONED: 거래소가 모르는 키 (재시작 후 정리) */
export type JournalStatus = OrderStatus | 'SENT' | 'ABANDONED';

interface OrderRow {
  idempotency_key: string;
  hedge_side: HedgeSide;
  symbol: string;
  side: OrderSide;
  intent: OrderIntent;
  leg_index: number;
  notional_usd: number;
  reduce_only: number;
  status: JournalStatus;
  order_id: string | null;
  filled_notional_usd: number | null;
  avg_price: number | null;
  reason: string | null;
  created_at: number;
  updated_at: number;
}

export interface JournalEntry {
  readonly hedgeSide: HedgeSide;
  readonly request: OrderRequest;
  readonly status: JournalStatus;
  readonly orderId: string | null;
  readonly filledNotionalUsd: number | null;
  readonly updatedAt: number;
}

/**
 * 주문 저널 (orders 테이블)
 * 재시작 시 결과가 확정되지 않은 주문을 찾아 상태 조회로 정리하기 위해 사용
 */
export class OrderJournal {
  private readonly db: Database.Database;
  private readonly mode: TradingMode | undefined;
  private readonly now: () => number;

  constructor(db: Database.Database = getDb(), mode?: TradingMode, now: () => number = Date.now) {
    this.db = db;
    this.mode = mode;
    this.now = now;
  }

  /**
   * 같은 키 재기록은 같은 행을 다시 SENT로 연다 (요청 내용과 created_at은 유지).
   * 거부 후 재개로 다시 보낸 주문도 재시작 시 미확정 주문으로 잡힌다.
   */
  recordRequest(hedgeSide: HedgeSide, request: OrderRequest): void {
    const ts = this.now();
    this.db.prepare(`
      INSERT INTO orders
        (idempotency_key, mode, hedge_side, symbol, side, intent, leg_index,
         notional_usd, reduce_only, status, created_at, updated_at)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, 'SENT', ?, ?)
      ON CONFLICT(idempotency_key) DO UPDATE SET
        status = 'SENT',
        order_id = NULL,
        filled_notional_usd = NULL,
        avg_price = NULL,
        reason = NULL,
        updated_at = excluded.updated_at
    `).run(
      request.idempotencyKey,
      this.mode ?? null,
      hedgeSide,
      request.symbol,
      request.side,
      request.intent,
      request.legIndex,
      request.notionalUsd,
      request.reduceOnly ? 1 : 0,
      ts,
      ts,
    );
  }

  recordResult(result: OrderResult): void {
    this.db.prepare(`
      UPDATE orders
         SET status = ?, order_id = ?, filled_notional_usd = ?, avg_price = ?, reason = ?, updated_at = ?
       WHERE idempotency_key = ?
    `).run(
      result.status,
      result.orderId,
      result.filledNotionalUsd,
      result.avgPrice,
      result.reason ?? null,
      this.now(),
      result.idempotencyKey,
    );
  }

  markAbandoned(idempotencyKey: string, reason: string): void {
    this.db.prepare(`
      UPDATE orders SET status = 'ABANDONED', reason = ?, updated_at = ? WHERE idempotency_key = ?
    `).run(reason, this.now(), idempotencyKey);
  }

  get(idempotencyKey: string): JournalEntry | undefined {
    const row = this.db
      .prepare<[string], OrderRow>('SELECT * FROM orders WHERE idempotency_key = ?')
      .get(idempotencyKey);
    return row ? toEntry(row) : undefined;
  }

  /** 결과 미확정 주문 (오래된 순) */
  findUnresolved(hedgeSide: HedgeSide): JournalEntry[] {
    return this.db
      .prepare<[HedgeSide], OrderRow>(`
        SELECT * FROM orders
         WHERE hedge_side = ? AND status IN ('SENT', 'PENDING')
         ORDER BY created_at ASC, rowid ASC
      `)
      .all(hedgeSide)
      .map(toEntry);
  }
}

function toEntry(row: OrderRow): JournalEntry {
  return {
    hedgeSide: row.hedge_side,
    request: {
      idempotencyKey: row.idempotency_key,
      symbol: row.symbol,
      side: row.side,
      intent: row.intent,
      legIndex: row.leg_index,
      notionalUsd: row.notional_usd,
      reduceOnly: row.reduce_only === 1,
    },
    status: row.status,
    orderId: row.order_id,
    filledNotionalUsd: row.filled_notional_usd,
    updatedAt: row.updated_at,
  };
}
