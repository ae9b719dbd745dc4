import { Injectable, Logger } from '@nestjs/common';
import { OrderExecutor, OrderRequest, validateOrderRequest } from './order-executor';
import { Order, OrderSide, createOrder } from '../position/entities/order.entity';
import { PositionManagerService } from '../position/position-manager.service';
import { MarketPriceService } from '../market-price/market-price.service';
import { InstrumentConfig } from '../instruments/entities/instrument.entity';
import { OrderRejectedError } from '../common/errors';
import { toDecimal } from '../common/utils/decimal.util';

export const PAPER_ORDER_STATUS = 'Paper Executed';

// Simulated execution against the current quote: BUY lifts the ask,
// SELL hits the bid, either falls back to ltp.
@Injectable()
export class PaperOrderExecutor implements OrderExecutor {
  readonly simulated = true;
  private readonly logger = new Logger(PaperOrderExecutor.name);
  private orderCounter = 1;

  constructor(
    private readonly positionManager: PositionManagerService,
    private readonly marketPriceService: MarketPriceService,
  ) {}

  async execute(request: OrderRequest, instrument: InstrumentConfig): Promise<Order> {
    validateOrderRequest(request, this.logger);

    const units = request.lots * instrument.lotSize;
    this.logger.log({
      message: `[PAPER] Placing ${request.side} order for ${request.lots} lots (${units} units) of ${instrument.symbol}`,
    });

    const execPrice = this.marketPriceService.getExecutionPrice(request.side);
    if (execPrice === undefined || execPrice <= 0) {
      const touch = request.side === OrderSide.BUY ? 'ASK' : 'BID';
      throw new OrderRejectedError(
        `Could not determine execution price - no ${touch} or LTP available`,
        { symbol: instrument.symbol, side: request.side },
      );
    }

    const order = createOrder({
      timestamp: new Date(),
      side: request.side,
      lots: request.lots,
      price: toDecimal(execPrice),
      orderId: `PAPER${String(this.orderCounter++).padStart(6, '0')}`,
      status: PAPER_ORDER_STATUS,
    });

    await this.positionManager.bookFill(order, instrument.lotSize);

    this.logger.log({
      message: `[PAPER] Order executed: ${order.lots} lots @ ${execPrice.toFixed(2)}`,
      orderId: order.orderId,
    });
    return order;
  }
}
