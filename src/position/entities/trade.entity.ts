import Decimal from 'decimal.js';

export interface TradeLegs {
  entryTime: Date;
  entryPrice: Decimal;     // volume-weighted over the matched buy lots
  entryQty: number;        // units
  exitTime: Date;
  exitPrice: Decimal;
  exitQty: number;         // units
}

// Closed round trip synthesized by the lot matcher.
// Derived fields are computed once here and never change.
export interface Trade extends Readonly<TradeLegs> {
  readonly qty: number;              // min(entryQty, exitQty)
  readonly pnl: Decimal;             // (exitPrice - entryPrice) × qty
  readonly pnlPercent: Decimal;      // relative to entry price
  readonly durationSeconds: number;
  readonly turnover: Decimal;        // (entryPrice + exitPrice) × qty
}

export function createTrade(legs: TradeLegs): Trade {
  const qty = Math.min(legs.entryQty, legs.exitQty);
  if (qty <= 0) {
    throw new Error(`Trade quantity must be positive, got ${qty}`);
  }

  const priceMove = legs.exitPrice.minus(legs.entryPrice);
  return Object.freeze({
    ...legs,
    qty,
    pnl: priceMove.times(qty),
    pnlPercent: legs.entryPrice.greaterThan(0)
      ? priceMove.dividedBy(legs.entryPrice).times(100)
      : new Decimal(0),
    durationSeconds: (legs.exitTime.getTime() - legs.entryTime.getTime()) / 1000,
    turnover: legs.entryPrice.plus(legs.exitPrice).times(qty),
  });
}
