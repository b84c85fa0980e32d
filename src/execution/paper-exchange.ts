import { ok, type CallResult } from '../errors.js';
import { createChildLogger } from '../logger.js';
import type {
  ExchangeClient,
  ExchangePosition,
  OrderRequest,
  OrderResult,
  OrderSide,
  PriceSource,
} from '../types/index.js';

const log = createChildLogger('paper-exchange');

export interface PaperExchangeConfig {
  readonly slippageBps: number;    // 기본 슬리피지 bps (예: 5 = 0.05%)
}

interface PaperPosition {
  /** 부호 있는 수량: 양수 = 롱, 음수 = 숏 */
  qty: number;
  avgPrice: number;
}

/**
 * 페이퍼 거래소: 시장가 주문을 마크 가격 ± 슬리피지로 즉시 체결
 * 포지션은 심볼별 메모리 보관, 같은 키 재주문은 저장된 결과 반환
 */
export class PaperExchange implements ExchangeClient {
  private readonly results = new Map<string, OrderResult>();
  private readonly positions = new Map<string, PaperPosition>();
  private seq = 0;

  constructor(
    private readonly prices: PriceSource,
    private readonly config: PaperExchangeConfig,
  ) {}

  async placeOrder(request: OrderRequest): Promise<CallResult<OrderResult>> {
    const existing = this.results.get(request.idempotencyKey);
    if (existing) {
      log.info({ key: request.idempotencyKey }, 'Duplicate key, returning stored result');
      return ok(existing);
    }

    const mark = await this.prices.getMarkPrice(request.symbol);
    if (!mark.ok) return mark;
    const price = this.fillPrice(mark.value, request.side);

    const position = this.positions.get(request.symbol);
    let qty: number;
    if (request.intent === 'CLOSE') {
      qty = position ? Math.abs(position.qty) : 0;
    } else {
      qty = request.notionalUsd / price;
    }

    const result: OrderResult = {
      idempotencyKey: request.idempotencyKey,
      orderId: `paper-${++this.seq}`,
      status: 'FILLED',
      filledNotionalUsd: qty * price,
      avgPrice: qty > 0 ? price : 0,
      ...(qty > 0 ? {} : { reason: 'no open position' }),
    };
    if (qty > 0) this.applyFill(request.symbol, request.side === 'BUY' ? qty : -qty, price);
    this.results.set(request.idempotencyKey, result);

    log.info(
      { symbol: request.symbol, side: request.side, intent: request.intent, qty, price, key: request.idempotencyKey },
      'Paper order filled',
    );
    return ok(result);
  }

  async getOrderStatus(_symbol: string, idempotencyKey: string): Promise<CallResult<OrderResult | null>> {
    return ok(this.results.get(idempotencyKey) ?? null);
  }

  async getPosition(symbol: string): Promise<CallResult<ExchangePosition>> {
    const position = this.positions.get(symbol);
    if (!position) return ok({ symbol, side: null, notionalUsd: 0, avgPrice: 0 });
    return ok({
      symbol,
      side: position.qty > 0 ? 'LONG' : 'SHORT',
      notionalUsd: Math.abs(position.qty) * position.avgPrice,
      avgPrice: position.avgPrice,
    });
  }

  private fillPrice(mark: number, side: OrderSide): number {
    const slippage = mark * (this.config.slippageBps / 10000);
    return side === 'BUY' ? mark + slippage : mark - slippage;
  }

  private applyFill(symbol: string, signedQty: number, price: number): void {
    const position = this.positions.get(symbol);
    if (!position) {
      this.positions.set(symbol, { qty: signedQty, avgPrice: price });
      return;
    }

    const nextQty = position.qty + signedQty;
    if (Math.abs(nextQty) < 1e-12) {
      this.positions.delete(symbol);
      return;
    }
    if (Math.sign(position.qty) === Math.sign(signedQty)) {
      position.avgPrice = (Math.abs(position.qty) * position.avgPrice + Math.abs(signedQty) * price) / Math.abs(nextQty);
    } else if (Math.sign(nextQty) !== Math.sign(position.qty)) {
      // 방향 전환: 남은 수량은 이번 체결가 기준
      position.avgPrice = price;
    }
    position.qty = nextQty;
  }
}
