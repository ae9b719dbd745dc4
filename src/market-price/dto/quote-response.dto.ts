export interface QuoteResponseDto {
  ltp: number | null;
  bid: number | null;
  ask: number | null;
  lastUpdated: string | null;     // ISO timestamp
  source: string;                 // "manual"
}
