import { createHash } from 'node:crypto';

/** Bybit orderLinkId 제한: 최대 36자, [A-Za-z0-9_-] */
export const MAX_KEY_LENGTH = 36;

const KEY_PREFIX = 'ph';

/**
 * 주문 멱등 키: (심볼, 앵커 epoch, 레그 인덱스)에서 결정적으로 생성.
 * 같은 논리적 행동의 재시도는 항상 같은 키를 만든다. 청산은 레그 대신 'c',
 * 부분 청산 뒤 남은 물량의 재청산은 'c1', 'c2'...
 */
export function buildIdempotencyKey(symbol: string, epoch: string, leg: number | 'close', closeSeq = 0): string {
  const legPart = leg === 'close' ? (closeSeq > 0 ? `c${closeSeq}` : 'c') : `l${leg}`;
  const key = `${KEY_PREFIX}-${symbol}-${epoch}-${legPart}`;
  if (key.length <= MAX_KEY_LENGTH) return key;

  // 긴 심볼: 해시로 축약 (결정적 유지)
  const digest = createHash('sha256').update(key).digest('hex');
  return `${KEY_PREFIX}-${digest.slice(0, MAX_KEY_LENGTH - KEY_PREFIX.length - 1)}`;
}
