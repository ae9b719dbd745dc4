import Decimal from 'decimal.js';

export enum OrderSide {
  BUY = 'BUY',
  SELL = 'SELL',
}

// One executed fill as reported by the order executor.
// Frozen on creation; the ledger only ever appends these.
export interface Order {
  readonly timestamp: Date;
  readonly side: OrderSide;
  readonly lots: number;
  readonly price: Decimal;
  readonly orderId: string;      // broker id, or PAPERnnnnnn when simulated
  readonly status: string;
}

export function createOrder(fields: Order): Order {
  return Object.freeze({ ...fields });
}
