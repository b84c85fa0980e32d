import { z } from 'zod';

/** Bybit는 숫자를 문자열로 준다. 빈 문자열은 0 */
const decimal = z
  .string()
  .transform((v) => (v === '' ? 0 : Number(v)))
  .refine((n) => Number.isFinite(n), 'not a number');

// ─── 공통 envelope ─────────────────────────────────────────────────────────

export const envelopeSchema = z.object({
  retCode: z.number(),
  retMsg: z.string(),
  result: z.unknown(),
  time: z.number().optional(),
});
export type Envelope = z.infer<typeof envelopeSchema>;

// ─── PUBLIC 응답 ───────────────────────────────────────────────────────────

export const tickerItemSchema = z.object({
  symbol: z.string(),
  lastPrice: decimal,
  markPrice: decimal,
});
export const tickersSchema = z.object({
  category: z.string(),
  list: z.array(tickerItemSchema),
});

export const instrumentItemSchema = z.object({
  symbol: z.string(),
  status: z.string().optional(),
  lotSizeFilter: z.object({
    qtyStep: z.string().regex(/^\d+(\.\d+)?$/),
    minOrderQty: decimal,
    maxOrderQty: decimal.optional(),
  }),
});
export type InstrumentItem = z.infer<typeof instrumentItemSchema>;
export const instrumentsInfoSchema = z.object({
  category: z.string(),
  list: z.array(instrumentItemSchema),
});

// ─── PRIVATE 응답 ──────────────────────────────────────────────────────────

export const orderCreateSchema = z.object({
  orderId: z.string(),
  orderLinkId: z.string(),
});

export const orderItemSchema = z.object({
  orderId: z.string(),
  orderLinkId: z.string(),
  symbol: z.string(),
  side: z.enum(['Buy', 'Sell']),
  orderStatus: z.string(),
  avgPrice: decimal,
  cumExecQty: decimal,
  cumExecValue: decimal,
  rejectReason: z.string().optional(),
});
export type OrderItem = z.infer<typeof orderItemSchema>;
export const orderListSchema = z.object({
  list: z.array(orderItemSchema),
});

export const positionItemSchema = z.object({
  symbol: z.string(),
  /** 단방향 모드에서 포지션 없으면 "" 또는 "None" */
  side: z.enum(['Buy', 'Sell', 'None', '']),
  size: decimal,
  positionValue: decimal,
  avgPrice: decimal,
});
export type PositionItem = z.infer<typeof positionItemSchema>;
export const positionListSchema = z.object({
  list: z.array(positionItemSchema),
});
