import Decimal from 'decimal.js';
import { Trade } from './entities/trade.entity';
import { SessionStatsDto } from './dto/session-stats.dto';
import { add, divide, toDecimal, toMoney } from '../common/utils/decimal.util';

/**
 * Session statistics over the closed-trade history.
 * Recomputed on every call; only sessionNetPnl is carried by the engine,
 * accumulated as trades are created.
 */
export function computeSessionStats(
  trades: readonly Trade[],
  sessionNetPnl: Decimal,
): SessionStatsDto {
  const totalTrades = trades.length;
  const winningTrades = trades.filter((trade) => trade.pnl.greaterThan(0)).length;
  const losingTrades = trades.filter((trade) => trade.pnl.lessThan(0)).length;
  const totalTurnover = add(...trades.map((trade) => trade.turnover));

  const winRate = totalTrades > 0
    ? divide(toDecimal(winningTrades), totalTrades).times(100)
    : new Decimal(0);
  const avgPnl = totalTrades > 0 ? divide(sessionNetPnl, totalTrades) : new Decimal(0);

  return {
    netPnl: toMoney(sessionNetPnl),
    totalTrades,
    winningTrades,
    losingTrades,
    winRate: toMoney(winRate),
    totalTurnover: toMoney(totalTurnover),
    avgPnl: toMoney(avgPnl),
  };
}
