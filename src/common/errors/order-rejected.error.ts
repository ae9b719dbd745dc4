import { LedgerError } from './ledger-error';
import { LEDGER_ERROR_CODES } from './error-codes';

/**
 * Raised before the engine is touched when an order cannot be filled:
 * bad lots/side, or no executable price.
 */
export class OrderRejectedError extends LedgerError {
  constructor(message: string, metadata?: Record<string, unknown>) {
    super(LEDGER_ERROR_CODES.ORDER_REJECTED, message, 'warning', metadata);
  }
}
