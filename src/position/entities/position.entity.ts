import Decimal from 'decimal.js';

// Pending buy fill awaiting a matching sell (simulation mode only).
// qty is in units and is decremented in place as sells consume it.
export interface PendingBuyLot {
  timestamp: Date;
  price: Decimal;
  qty: number;
}

// Aggregate holding for the active instrument.
// qtyUnits is always qtyLots × lotSize.
export interface Position {
  qtyLots: number;
  qtyUnits: number;
  totalValue: Decimal;         // qtyUnits × avgPrice
  avgPrice: Decimal;           // weighted average of open buy cost
  cmp: Decimal;                // last observed market price
  mtm: Decimal;                // qtyUnits × cmp - totalValue
  mtmChangePercent: Decimal;
}

export function emptyPosition(): Position {
  return {
    qtyLots: 0,
    qtyUnits: 0,
    totalValue: new Decimal(0),
    avgPrice: new Decimal(0),
    cmp: new Decimal(0),
    mtm: new Decimal(0),
    mtmChangePercent: new Decimal(0),
  };
}
