/**
 * Bybit v5 REST 엔드포인트: 단일 정의.
 * 코드 어디에서도 문자열 URL을 직접 쓰지 않고 이 상수만 사용한다.
 */

export const BYBIT_REST_BASE = 'https://api.bybit.com';

/** USDT 무기한 선물 */
export const CATEGORY = 'linear';

// ─── PUBLIC ─────────────────────────────────────────────────────────────

/** GET 티커 (markPrice 포함) */
export const PUBLIC_TICKERS = '/v5/market/tickers';

/** GET 상품 정보 (수량 단위, 최소 수량) */
export const PUBLIC_INSTRUMENTS_INFO = '/v5/market/instruments-info';

// ─── PRIVATE ────────────────────────────────────────────────────────────

/** POST 주문하기 */
export const PRIVATE_ORDER_CREATE = '/v5/order/create';

/** GET 미체결/최근 주문 조회 */
export const PRIVATE_ORDER_REALTIME = '/v5/order/realtime';

/** GET 주문 내역 조회 */
export const PRIVATE_ORDER_HISTORY = '/v5/order/history';

/** GET 포지션 조회 */
export const PRIVATE_POSITION_LIST = '/v5/position/list';
