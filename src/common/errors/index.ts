export { LedgerError } from './ledger-error';
export type { ErrorSeverity } from './ledger-error';
export { LEDGER_ERROR_CODES } from './error-codes';
export { OrderRejectedError } from './order-rejected.error';
export { InvalidPriceError } from './invalid-price.error';
export { InstrumentChangeError } from './instrument-change.error';
export { TradeExportError } from './trade-export.error';
export { ConfigValidationError } from './config-validation.error';
