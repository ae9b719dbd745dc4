export const LEDGER_ERROR_CODES = {
  /** Order request failed validation or could not be priced */
  ORDER_REJECTED: 1001,
  /** Quote or tick carried a non-positive price */
  INVALID_PRICE: 1002,
  /** Instrument switch refused (open position or unknown symbol) */
  INSTRUMENT_CHANGE_REFUSED: 1101,
  /** Trade CSV could not be written */
  TRADE_EXPORT_FAILED: 2001,
  /** Configuration or instruments file invalid at startup */
  CONFIG_INVALID: 3001,
} as const;
