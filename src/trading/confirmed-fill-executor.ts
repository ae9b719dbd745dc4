import { Injectable, Logger } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import { OrderExecutor, OrderRequest, validateOrderRequest } from './order-executor';
import { Order, createOrder } from '../position/entities/order.entity';
import { PositionManagerService } from '../position/position-manager.service';
import { InstrumentConfig } from '../instruments/entities/instrument.entity';
import { OrderRejectedError } from '../common/errors';
import { toDecimal } from '../common/utils/decimal.util';

export const CONFIRMED_ORDER_STATUS = 'Traded';

/**
 * Live variant. Routing happens in the broker integration; this only
 * books fills the broker has already confirmed, at the confirmed price.
 */
@Injectable()
export class ConfirmedFillExecutor implements OrderExecutor {
  readonly simulated = false;
  private readonly logger = new Logger(ConfirmedFillExecutor.name);

  constructor(private readonly positionManager: PositionManagerService) {}

  async execute(request: OrderRequest, instrument: InstrumentConfig): Promise<Order> {
    validateOrderRequest(request, this.logger);
    if (request.price === undefined || !(request.price > 0)) {
      throw new OrderRejectedError('Confirmed fills require a positive execution price', {
        price: request.price,
      });
    }

    const order = createOrder({
      timestamp: new Date(),
      side: request.side,
      lots: request.lots,
      price: toDecimal(request.price),
      orderId: request.orderId ?? uuidv4(),
      status: request.status ?? CONFIRMED_ORDER_STATUS,
    });

    await this.positionManager.bookFill(order, instrument.lotSize);

    this.logger.log({
      message: `Order executed: ${order.lots} lots @ ${request.price.toFixed(2)}`,
      orderId: order.orderId,
      symbol: instrument.symbol,
    });
    return order;
  }
}
