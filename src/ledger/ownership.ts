import {
  ExternalSaleRecord,
  LedgerState,
  OwnershipRecord,
  TradeAction,
  TradeRecord
} from '../core/types';
import { isZeroQuantity } from '../core/utils';

// Pure helpers over a LedgerState; OwnershipLedger runs them inside store transactions.

export const portfolioOwnership = (state: LedgerState, portfolioName: string): Record<string, OwnershipRecord> =>
  state.ownership[portfolioName] ?? {};

export const ownershipRecords = (state: LedgerState, portfolioName: string): OwnershipRecord[] =>
  Object.values(portfolioOwnership(state, portfolioName)).sort((a, b) => a.symbol.localeCompare(b.symbol));

export const removeOwnership = (state: LedgerState, portfolioName: string, symbol: string) => {
  const book = state.ownership[portfolioName];
  if (!book) return;
  delete book[symbol];
  if (!Object.keys(book).length) {
    delete state.ownership[portfolioName];
  }
};

/**
 * BUY adds quantity × price to the cost basis. SELL clamps to the held quantity and removes
 * cost in proportion (average-cost method).
 */
export const applyToOwnership = (
  state: LedgerState,
  portfolioName: string,
  symbol: string,
  action: TradeAction,
  quantity: number,
  price: number,
  at: string
): OwnershipRecord | undefined => {
  if (quantity < 0 || !Number.isFinite(quantity)) {
    throw new Error(`Invalid quantity ${quantity} for ${portfolioName}/${symbol}`);
  }
  const book = (state.ownership[portfolioName] = state.ownership[portfolioName] ?? {});
  const existing = book[symbol];

  if (action === 'BUY') {
    const next: OwnershipRecord = existing
      ? {
          ...existing,
          quantity: existing.quantity + quantity,
          totalCost: existing.totalCost + quantity * price,
          lastPurchaseAt: at,
          updatedAt: at
        }
      : {
          portfolioName,
          symbol,
          quantity,
          totalCost: quantity * price,
          firstPurchaseAt: at,
          lastPurchaseAt: at,
          updatedAt: at
        };
    book[symbol] = next;
    return next;
  }

  if (!existing) {
    if (!Object.keys(book).length) delete state.ownership[portfolioName];
    return undefined;
  }
  const sold = Math.min(quantity, existing.quantity);
  const remaining = existing.quantity - sold;
  if (isZeroQuantity(remaining)) {
    removeOwnership(state, portfolioName, symbol);
    return undefined;
  }
  const next: OwnershipRecord = {
    ...existing,
    quantity: remaining,
    totalCost: existing.totalCost * (remaining / existing.quantity),
    updatedAt: at
  };
  book[symbol] = next;
  return next;
};

export const averageCost = (record: OwnershipRecord) => (record.quantity > 0 ? record.totalCost / record.quantity : 0);

export const hasTraded = (state: LedgerState, portfolioName: string) =>
  state.trades.some((t) => t.portfolioName === portfolioName);

export const unconsumedExternalSales = (state: LedgerState, portfolioName: string): ExternalSaleRecord[] =>
  state.externalSales.filter((s) => s.portfolioName === portfolioName && !s.usedForReinvestment);

export const consumeExternalSales = (state: LedgerState, saleIds: string[], at: string) => {
  for (const id of saleIds) {
    const sale = state.externalSales.find((s) => s.id === id);
    if (!sale) {
      throw new Error(`Unknown external sale ${id}`);
    }
    if (sale.usedForReinvestment) {
      throw new Error(`External sale ${id} was already reinvested`);
    }
    sale.usedForReinvestment = true;
    sale.reinvestedAt = at;
  }
};

export const tradeMentions = (state: LedgerState, symbol: string) => state.trades.some((t: TradeRecord) => t.symbol === symbol);

export const symbolInAnyLedger = (state: LedgerState, symbol: string) =>
  Object.values(state.ownership).some((book) => Boolean(book[symbol]));
