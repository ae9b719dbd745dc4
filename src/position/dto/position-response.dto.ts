// Current holding as served to the dashboard
export interface PositionResponseDto {
  qtyLots: number;
  qtyUnits: number;
  totalValue: number;            // cost value of the open units
  avgPrice: number;
  cmp: number;                   // last market price
  mtm: number;                   // unrealized P&L
  mtmChangePercent: number;
}
