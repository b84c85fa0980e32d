import type Database from 'better-sqlite3';
import { getDb } from '../db/database.js';
import type { TradingMode } from '../config.js';

export type AuditLevel = 'INFO' | 'WARN' | 'ERROR' | 'CRITICAL';

export type AuditAction =
  | 'BOT_STARTED'
  | 'ORDER_SENT'
  | 'ORDER_FILLED'
  | 'ORDER_REJECTED'
  | 'CAP_REACHED'
  | 'SIDE_HALTED'
  | 'SIDE_RESUMED'
  | 'CLOSE_REQUESTED'
  | 'PARTIAL_CLOSE'
  | 'RECONCILED'
  | 'MISMATCH'
  | 'IMBALANCE'
  | 'SHUTDOWN';

export interface AuditEntry {
  id: number;
  timestamp: number;
  level: AuditLevel;
  module: string;
  action: AuditAction;
  detail: string | null;
  mode: TradingMode | null;
}

/**
 * SQLite audit log: 모든 중요 이벤트 기록
 */
export class AuditLog {
  private readonly db: Database.Database;
  private readonly mode: TradingMode | undefined;

  constructor(db: Database.Database = getDb(), mode?: TradingMode) {
    this.db = db;
    this.mode = mode;
  }

  log(level: AuditLevel, module: string, action: AuditAction, detail?: string): void {
    this.db.prepare(`
      INSERT INTO audit_log (timestamp, level, module, action, detail, mode)
      VALUES (?, ?, ?, ?, ?, ?)
    `).run(Date.now(), level, module, action, detail ?? null, this.mode ?? null);
  }

  info(module: string, action: AuditAction, detail?: string): void {
    this.log('INFO', module, action, detail);
  }

  warn(module: string, action: AuditAction, detail?: string): void {
    this.log('WARN', module, action, detail);
  }

  error(module: string, action: AuditAction, detail?: string): void {
    this.log('ERROR', module, action, detail);
  }

  critical(module: string, action: AuditAction, detail?: string): void {
    this.log('CRITICAL', module, action, detail);
  }

  getRecent(limit: number = 50): AuditEntry[] {
    return this.db
      .prepare<[number], AuditEntry>('SELECT * FROM audit_log ORDER BY id DESC LIMIT ?')
      .all(limit);
  }
}
