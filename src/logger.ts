import pino from 'pino';
import { env } from './config.js';

// 설정 검증 실패도 로그로 남길 수 있도록 LOG_LEVEL만 직접 읽는다
export const logger = pino({
  level: env('LOG_LEVEL', 'info'),
  formatters: {
    level(label) {
      return { level: label };
    },
  },
  timestamp: pino.stdTimeFunctions.isoTime,
});

export function createChildLogger(module: string) {
  return logger.child({ module });
}
