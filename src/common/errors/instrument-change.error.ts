import { LedgerError } from './ledger-error';
import { LEDGER_ERROR_CODES } from './error-codes';

export class InstrumentChangeError extends LedgerError {
  constructor(message: string, metadata?: Record<string, unknown>) {
    super(LEDGER_ERROR_CODES.INSTRUMENT_CHANGE_REFUSED, message, 'warning', metadata);
  }
}
