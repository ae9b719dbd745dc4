// Tradable instrument; lotSize is fixed for a position's lifetime.
export interface InstrumentConfig {
  symbol: string;        // broker symbol, e.g. NSE:SBIN-EQ
  exchange: string;
  lotSize: number;       // units per lot
  product: string;       // INTRADAY, CNC, ...
}
