import { LedgerError } from './ledger-error';
import { LEDGER_ERROR_CODES } from './error-codes';

/**
 * Thrown when configuration or the instruments file fails validation at startup.
 * Severity: critical; the service cannot trade without a valid instrument.
 */
export class ConfigValidationError extends LedgerError {
  constructor(message: string, validationErrors: string[]) {
    super(LEDGER_ERROR_CODES.CONFIG_INVALID, message, 'critical', { validationErrors });
  }
}
