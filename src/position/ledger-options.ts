export const LEDGER_OPTIONS = Symbol('LEDGER_OPTIONS');

export interface LedgerOptions {
  /** Fixed for the engine's life: enables trade reconstruction from fills. */
  simulationMode: boolean;
  /** Directory for exports that are not given an explicit path. */
  exportDir: string;
}
