import {
  ExternalSaleRecord,
  LeaderboardSnapshot,
  LedgerState,
  OwnershipRecord,
  TradeAction,
  TradeRecord
} from '../core/types';
import { LedgerStore } from './ledgerStore.types';
import {
  applyToOwnership,
  consumeExternalSales,
  hasTraded,
  ownershipRecords,
  portfolioOwnership,
  removeOwnership,
  unconsumedExternalSales
} from './ownership';

export type TradeUpdate = Pick<TradeRecord, 'id'> &
  Partial<Pick<TradeRecord, 'brokerTradeId' | 'reconciledAt' | 'actualPrice' | 'actualQuantity'>>;

/** Which holdings the bot itself bought, per portfolio. Every write is one store transaction. */
export class OwnershipLedger {
  constructor(private readonly store: LedgerStore) {}

  get persistent() {
    return this.store.persistent;
  }

  state(): Promise<LedgerState> {
    return this.store.snapshot();
  }

  async get(portfolioName: string, symbol: string): Promise<OwnershipRecord | undefined> {
    const state = await this.store.snapshot();
    return portfolioOwnership(state, portfolioName)[symbol];
  }

  async records(portfolioName: string): Promise<OwnershipRecord[]> {
    return ownershipRecords(await this.store.snapshot(), portfolioName);
  }

  async ownedSymbols(portfolioName: string): Promise<string[]> {
    return (await this.records(portfolioName)).map((r) => r.symbol);
  }

  async hasTraded(portfolioName: string): Promise<boolean> {
    return hasTraded(await this.store.snapshot(), portfolioName);
  }

  async unconsumedExternalSales(portfolioName: string): Promise<ExternalSaleRecord[]> {
    return unconsumedExternalSales(await this.store.snapshot(), portfolioName);
  }

  async getSnapshot(portfolioName: string): Promise<LeaderboardSnapshot | undefined> {
    return (await this.store.snapshot()).snapshots[portfolioName];
  }

  apply(
    portfolioName: string,
    symbol: string,
    action: TradeAction,
    quantity: number,
    price: number,
    at = new Date().toISOString()
  ): Promise<OwnershipRecord | undefined> {
    return this.store.transact({ portfolioName, symbol, action }, (draft) =>
      applyToOwnership(draft, portfolioName, symbol, action, quantity, price, at)
    );
  }

  remove(portfolioName: string, symbol: string): Promise<void> {
    return this.store.transact({ portfolioName, symbol, action: 'REMOVE' }, (draft) => {
      removeOwnership(draft, portfolioName, symbol);
    });
  }

  /** Trade row, ownership change and consumed external sales commit together or not at all. */
  recordTrade(trade: TradeRecord, consumedExternalSaleIds: string[] = []): Promise<OwnershipRecord | undefined> {
    const unit = { portfolioName: trade.portfolioName, symbol: trade.symbol, action: trade.action };
    return this.store.transact(unit, (draft) => {
      if (draft.trades.some((t) => t.id === trade.id)) {
        throw new Error(`Trade ${trade.id} already recorded`);
      }
      draft.trades.push({ ...trade });
      const record = applyToOwnership(
        draft,
        trade.portfolioName,
        trade.symbol,
        trade.action,
        trade.quantity,
        trade.price,
        trade.submittedAt
      );
      consumeExternalSales(draft, consumedExternalSaleIds, trade.submittedAt);
      return record;
    });
  }

  /** Shrinks the holding to `remainingQuantity`, scaling cost basis, and files the sale. */
  recordExternalSale(sale: ExternalSaleRecord, remainingQuantity: number): Promise<OwnershipRecord | undefined> {
    const unit = { portfolioName: sale.portfolioName, symbol: sale.symbol, action: 'EXTERNAL_SALE' as const };
    return this.store.transact(unit, (draft) => {
      const existing = portfolioOwnership(draft, sale.portfolioName)[sale.symbol];
      if (!existing) {
        throw new Error(`No ownership of ${sale.symbol} in ${sale.portfolioName}`);
      }
      draft.externalSales.push({ ...sale });
      return applyToOwnership(
        draft,
        sale.portfolioName,
        sale.symbol,
        'SELL',
        Math.max(0, existing.quantity - remainingQuantity),
        0,
        sale.detectedAt
      );
    });
  }

  updateTrades(updates: TradeUpdate[]): Promise<number> {
    if (!updates.length) return Promise.resolve(0);
    return this.store.transact({ portfolioName: '*', action: 'RECONCILE' }, (draft) => {
      let applied = 0;
      for (const update of updates) {
        const trade = draft.trades.find((t) => t.id === update.id);
        if (!trade) continue;
        Object.assign(trade, update);
        applied += 1;
      }
      return applied;
    });
  }

  saveSnapshot(snapshot: LeaderboardSnapshot): Promise<void> {
    return this.store.transact({ portfolioName: snapshot.portfolioName, action: 'SNAPSHOT' }, (draft) => {
      draft.snapshots[snapshot.portfolioName] = { ...snapshot, symbols: [...snapshot.symbols] };
    });
  }
}
