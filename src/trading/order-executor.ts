import { Logger } from '@nestjs/common';
import { Order, OrderSide } from '../position/entities/order.entity';
import { InstrumentConfig } from '../instruments/entities/instrument.entity';
import { OrderRejectedError } from '../common/errors';

export const ORDER_EXECUTOR = Symbol('ORDER_EXECUTOR');

export interface OrderRequest {
  side: OrderSide;
  lots: number;
  price?: number;        // broker-confirmed execution price (live fills)
  orderId?: string;      // broker order id (live fills)
  status?: string;
}

/**
 * Capability the trading session places orders through. One variant is
 * chosen at startup from TRADING_MODE; the ledger does not know which.
 */
export interface OrderExecutor {
  readonly simulated: boolean;
  execute(request: OrderRequest, instrument: InstrumentConfig): Promise<Order>;
}

/** Boundary checks the ledger relies on callers to make. */
export function validateOrderRequest(request: OrderRequest, logger: Logger): void {
  if (!Number.isInteger(request.lots) || request.lots <= 0) {
    logger.error({ message: 'Invalid lots quantity', lots: request.lots });
    throw new OrderRejectedError('Lots must be greater than 0', { lots: request.lots });
  }
  if (request.side !== OrderSide.BUY && request.side !== OrderSide.SELL) {
    logger.error({ message: 'Invalid side', side: request.side });
    throw new OrderRejectedError("Side must be 'BUY' or 'SELL'", { side: request.side });
  }
}
