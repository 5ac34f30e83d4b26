import fs from 'fs';
import os from 'os';
import path from 'path';
import { BotConfig, LedgerState, OwnershipRecord, TradeRecord } from '../src/core/types';
import { parseConfig } from '../src/core/config';
import { emptyLedgerState } from '../src/ledger/ledgerStore.types';

export const T0 = '2026-01-05T14:30:00.000Z';

export const fixedClock = (iso: string = T0) => () => new Date(iso);

export const makeConfig = (overrides: Record<string, unknown> = {}): BotConfig =>
  parseConfig(
    {
      portfolios: [{ portfolioName: 'alpha', indexId: '13', initialCapital: 10000 }],
      ledgerStore: 'memory',
      ...overrides
    },
    {}
  );

export const tmpDir = (label: string) => fs.mkdtempSync(path.join(os.tmpdir(), `rebalancer-${label}-`));

export const ownershipRecord = (portfolioName: string, symbol: string, quantity: number, totalCost = quantity * 100): OwnershipRecord => ({
  portfolioName,
  symbol,
  quantity,
  totalCost,
  firstPurchaseAt: '2025-12-01T14:30:00.000Z',
  lastPurchaseAt: '2025-12-01T14:30:00.000Z',
  updatedAt: '2025-12-01T14:30:00.000Z'
});

/** { alpha: { TSLA: 6 } } → ledger state with cost basis 100 per share. */
export const ownershipState = (holdings: Record<string, Record<string, number>>): LedgerState => {
  const state = emptyLedgerState();
  for (const [portfolioName, book] of Object.entries(holdings)) {
    state.ownership[portfolioName] = {};
    for (const [symbol, quantity] of Object.entries(book)) {
      state.ownership[portfolioName][symbol] = ownershipRecord(portfolioName, symbol, quantity);
    }
  }
  return state;
};

export const tradeRecord = (overrides: Partial<TradeRecord> & Pick<TradeRecord, 'id' | 'symbol'>): TradeRecord => ({
  portfolioName: 'alpha',
  action: 'BUY',
  quantity: 1,
  price: 100,
  total: 100,
  submittedAt: '2025-12-01T14:30:00.000Z',
  ...overrides
});
