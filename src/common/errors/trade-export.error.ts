import { LedgerError } from './ledger-error';
import { LEDGER_ERROR_CODES } from './error-codes';

/**
 * Carried inside a failed export result. Export is best-effort,
 * so this is returned to the caller rather than thrown.
 */
export class TradeExportError extends LedgerError {
  constructor(message: string, metadata?: Record<string, unknown>) {
    super(LEDGER_ERROR_CODES.TRADE_EXPORT_FAILED, message, 'error', metadata);
  }
}
