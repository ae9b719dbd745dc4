export interface SessionStatsDto {
  netPnl: number;
  totalTrades: number;
  winningTrades: number;
  losingTrades: number;
  winRate: number;               // percent
  totalTurnover: number;
  avgPnl: number;
}
