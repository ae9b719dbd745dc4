import { Order } from './entities/order.entity';
import { Trade } from './entities/trade.entity';
import { Position } from './entities/position.entity';
import { PositionResponseDto } from './dto/position-response.dto';
import { OrderResponseDto } from './dto/order-response.dto';
import { TradeResponseDto } from './dto/trade-response.dto';
import { toMoney } from '../common/utils/decimal.util';
import { formatDateTime } from '../common/utils/time.util';

// Plain JSON-ready copies; nothing returned references ledger state.

export function toPositionResponse(position: Position): PositionResponseDto {
  return {
    qtyLots: position.qtyLots,
    qtyUnits: position.qtyUnits,
    totalValue: toMoney(position.totalValue),
    avgPrice: toMoney(position.avgPrice),
    cmp: toMoney(position.cmp),
    mtm: toMoney(position.mtm),
    mtmChangePercent: toMoney(position.mtmChangePercent),
  };
}

export function toOrderResponse(order: Order): OrderResponseDto {
  return {
    timestamp: order.timestamp.toISOString(),
    side: order.side,
    lots: order.lots,
    price: toMoney(order.price),
    orderId: order.orderId,
    status: order.status,
  };
}

export function toTradeResponse(trade: Trade): TradeResponseDto {
  return {
    entryTime: formatDateTime(trade.entryTime),
    entryPrice: toMoney(trade.entryPrice),
    entryQty: trade.entryQty,
    exitTime: formatDateTime(trade.exitTime),
    exitPrice: toMoney(trade.exitPrice),
    exitQty: trade.exitQty,
    qty: trade.qty,
    pnl: toMoney(trade.pnl),
    pnlPercent: toMoney(trade.pnlPercent),
    durationSeconds: Math.trunc(trade.durationSeconds),
    turnover: toMoney(trade.turnover),
  };
}
