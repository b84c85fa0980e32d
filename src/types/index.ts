export type {
  HedgeSide,
  HedgeState,
  ReferencePrice,
  DrawdownReading,
  Position,
  SizerAction,
} from './hedge.js';
export { HEDGE_SIDES } from './hedge.js';
export type {
  OrderSide,
  OrderIntent,
  OrderStatus,
  OrderRequest,
  OrderResult,
} from './order.js';
export type {
  ExchangePosition,
  PriceSource,
  ExchangeClient,
} from './exchange.js';
