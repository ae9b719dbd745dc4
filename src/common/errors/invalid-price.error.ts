import { LedgerError } from './ledger-error';
import { LEDGER_ERROR_CODES } from './error-codes';

export class InvalidPriceError extends LedgerError {
  constructor(field: string, price: number) {
    super(
      LEDGER_ERROR_CODES.INVALID_PRICE,
      `Price must be positive, got ${price} for ${field}`,
      'warning',
      { field, price },
    );
  }
}
