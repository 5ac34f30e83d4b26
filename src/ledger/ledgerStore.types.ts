import { LedgerState, TradeAction } from '../core/types';

/** The (portfolio, symbol, action) a mutation is attributed to; used in errors and logs. */
export interface LedgerUnit {
  portfolioName: string;
  symbol?: string;
  action: TradeAction | 'EXTERNAL_SALE' | 'RECONCILE' | 'SNAPSHOT' | 'REMOVE';
}

export interface LedgerStore {
  readonly persistent: boolean;
  snapshot(): Promise<LedgerState>;
  /**
   * Runs `fn` against a private copy of the state and commits it only if `fn` returns.
   * A throw leaves the stored state untouched and is rethrown.
   */
  transact<T>(unit: LedgerUnit, fn: (draft: LedgerState) => T): Promise<T>;
}

export const emptyLedgerState = (): LedgerState => ({
  ownership: {},
  trades: [],
  externalSales: [],
  snapshots: {}
});

export const describeUnit = (unit: LedgerUnit) =>
  [unit.portfolioName, unit.symbol, unit.action].filter(Boolean).join('/');
