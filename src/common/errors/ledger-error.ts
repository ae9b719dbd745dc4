export type ErrorSeverity = 'critical' | 'error' | 'warning';

/**
 * Base error class for all ledger-service errors.
 * Code ranges:
 * - 1000-1099: order validation
 * - 1100-1199: trading session
 * - 2000-2999: persistence / export
 * - 3000-3999: configuration
 */
export abstract class LedgerError extends Error {
  constructor(
    public readonly code: number,
    message: string,
    public readonly severity: ErrorSeverity,
    public readonly metadata?: Record<string, unknown>,
  ) {
    super(message);
    this.name = this.constructor.name;
  }
}
