import { Injectable } from '@nestjs/common';
import { OrderSide } from '../position/entities/order.entity';
import { InvalidPriceError } from '../common/errors';

export interface QuoteUpdate {
  ltp: number;           // last traded price
  bid?: number;          // best bid
  ask?: number;          // best ask
}

export interface Quote extends QuoteUpdate {
  updatedAt: Date;
}

/**
 * Latest quote for the active instrument.
 * Manual updates via REST API - no live feeds; the price ticker reads
 * ltp from here on its own cadence.
 */
@Injectable()
export class MarketPriceService {
  private quote: Quote | null = null;

  /**
   * Replaces the quote. Validates all fields before applying.
   * @throws InvalidPriceError if any supplied price <= 0
   */
  updateQuote(update: QuoteUpdate): Quote {
    MarketPriceService.assertPositive('ltp', update.ltp);
    if (update.bid !== undefined) {
      MarketPriceService.assertPositive('bid', update.bid);
    }
    if (update.ask !== undefined) {
      MarketPriceService.assertPositive('ask', update.ask);
    }

    this.quote = { ...update, updatedAt: new Date() };
    return { ...this.quote };
  }

  /** Returns a copy, or null before the first update */
  getQuote(): Quote | null {
    return this.quote ? { ...this.quote } : null;
  }

  getLastTradedPrice(): number | undefined {
    return this.quote?.ltp;
  }

  /**
   * Price a market order would fill at: best ask for BUY, best bid
   * for SELL, falling back to ltp when that side is empty.
   */
  getExecutionPrice(side: OrderSide): number | undefined {
    if (!this.quote) {
      return undefined;
    }
    const touch = side === OrderSide.BUY ? this.quote.ask : this.quote.bid;
    return touch !== undefined && touch > 0 ? touch : this.quote.ltp;
  }

  getLastUpdateTime(): Date | null {
    return this.quote ? this.quote.updatedAt : null;
  }

  /** Drops the quote, e.g. on instrument change */
  clear(): void {
    this.quote = null;
  }

  private static assertPositive(field: string, price: number): void {
    if (!(price > 0)) {
      throw new InvalidPriceError(field, price);
    }
  }
}
