import { SessionStatsDto } from './session-stats.dto';

// Closed round trip; quantities in units
export interface TradeResponseDto {
  entryTime: string;             // YYYY-MM-DD HH:MM:SS
  entryPrice: number;
  entryQty: number;
  exitTime: string;
  exitPrice: number;
  exitQty: number;
  qty: number;
  pnl: number;
  pnlPercent: number;
  durationSeconds: number;
  turnover: number;
}

export interface TradeHistoryResponseDto {
  trades: TradeResponseDto[];
  stats: SessionStatsDto | null;  // only reported in simulation mode
}
