import { Logger } from '@nestjs/common';
import Decimal from 'decimal.js';
import { PendingBuyLot } from './entities/position.entity';
import { Trade, createTrade } from './entities/trade.entity';
import { divide } from '../common/utils/decimal.util';

const logger = new Logger('LotMatcher');

/**
 * Matches a sell against pending buy lots, newest first (LIFO).
 *
 * Consumed lots are decremented in place and removed once empty. Everything
 * matched by one sell collapses into a single Trade: entry price is the
 * volume-weighted price of the consumed lots, entry time the earliest of them.
 * A sell larger than the pending lots matches whatever exists.
 *
 * Returns null when nothing matched or the inputs are unusable; never throws.
 */
export function matchSellAgainstLots(
  lots: PendingBuyLot[],
  sellQty: number,
  sellPrice: Decimal,
  exitTime: Date,
): Trade | null {
  if (sellQty <= 0) {
    logger.warn({ message: 'Invalid sell quantity for trade matching', sellQty });
    return null;
  }
  if (sellPrice.lessThanOrEqualTo(0)) {
    logger.warn({ message: 'Invalid sell price for trade matching', sellPrice: sellPrice.toString() });
    return null;
  }

  let remainingQty = sellQty;
  let matchedQty = 0;
  let matchedValue = new Decimal(0);
  let earliestEntry: Date | null = null;

  for (let idx = lots.length - 1; idx >= 0 && remainingQty > 0; idx--) {
    const lot = lots[idx];
    const matched = Math.min(remainingQty, lot.qty);
    if (matched <= 0) {
      continue;
    }

    matchedQty += matched;
    matchedValue = matchedValue.plus(lot.price.times(matched));
    if (earliestEntry === null || lot.timestamp.getTime() < earliestEntry.getTime()) {
      earliestEntry = lot.timestamp;
    }

    lot.qty -= matched;
    remainingQty -= matched;
    if (lot.qty <= 0) {
      lots.splice(idx, 1);
    }
  }

  if (matchedQty === 0 || earliestEntry === null) {
    return null;
  }

  // history is best-effort; the caller still applies the position change
  try {
    return createTrade({
      entryTime: earliestEntry,
      entryPrice: divide(matchedValue, matchedQty),
      entryQty: matchedQty,
      exitTime,
      exitPrice: sellPrice,
      exitQty: matchedQty,
    });
  } catch (error) {
    logger.error({
      message: 'Error creating trade record',
      matchedQty,
      error: error instanceof Error ? error.message : String(error),
    });
    return null;
  }
}
