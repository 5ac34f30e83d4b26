import { BrokerTrade, ReconciliationMismatch, TradeRecord } from '../core/types';
import { errorMessage } from '../core/errors';
import { minutesBetween } from '../core/time';
import { Broker } from '../broker/broker.types';
import { OwnershipLedger, TradeUpdate } from '../ledger/ownershipLedger';

export interface TradeHistoryOptions {
  lookbackDays: number;
  toleranceMinutes: number;
  graceMinutes: number;
  /** Restrict UNFILLED_TRADE reporting to these portfolios. */
  portfolioNames?: string[];
  now?: Date;
}

export interface TradeHistoryResult {
  examined: number;
  matched: number;
  updates: TradeUpdate[];
  mismatches: ReconciliationMismatch[];
}

const DAY_MS = 24 * 60 * 60 * 1000;

const findMatch = (
  trade: BrokerTrade,
  records: TradeRecord[],
  used: Set<string>,
  toleranceMinutes: number
): TradeRecord | undefined => {
  if (trade.tradeId) {
    const byId = records.find((r) => r.brokerTradeId === trade.tradeId);
    if (byId) return byId;
  }
  let best: { record: TradeRecord; gap: number } | undefined;
  for (const record of records) {
    if (used.has(record.id)) continue;
    if (record.brokerTradeId && trade.tradeId && record.brokerTradeId !== trade.tradeId) continue;
    if (record.symbol !== trade.symbol || record.action !== trade.action) continue;
    const gap = minutesBetween(record.submittedAt, trade.timestamp);
    if (gap > toleranceMinutes) continue;
    if (!best || gap < best.gap) best = { record, gap };
  }
  return best?.record;
};

/**
 * Best effort: matches recent broker trades to recorded trades and back-fills the actual fill.
 * Never throws; an unreachable broker or store becomes a TRADE_HISTORY_UNAVAILABLE mismatch.
 */
export const reconcileTradeHistory = async (
  ledger: OwnershipLedger,
  broker: Broker,
  options: TradeHistoryOptions
): Promise<TradeHistoryResult> => {
  const now = options.now ?? new Date();
  const since = new Date(now.getTime() - options.lookbackDays * DAY_MS);
  const result: TradeHistoryResult = { examined: 0, matched: 0, updates: [], mismatches: [] };

  try {
    const brokerTrades = (await broker.getTradeHistory(since)).sort(
      (a, b) => new Date(a.timestamp).getTime() - new Date(b.timestamp).getTime()
    );
    const state = await ledger.state();
    const records = state.trades.filter((t) => new Date(t.submittedAt).getTime() >= since.getTime());
    const used = new Set<string>();
    result.examined = brokerTrades.length;

    for (const trade of brokerTrades) {
      const match = findMatch(trade, records, used, options.toleranceMinutes);
      if (!match) {
        result.mismatches.push({
          code: 'MISSING_TRADE',
          symbol: trade.symbol,
          message: `broker ${trade.action} of ${trade.quantity} ${trade.symbol} at ${trade.timestamp} has no recorded trade`,
          observed: { ...trade }
        });
        continue;
      }
      used.add(match.id);
      result.matched += 1;
      if (match.reconciledAt) continue;
      result.updates.push({
        id: match.id,
        brokerTradeId: match.brokerTradeId ?? trade.tradeId,
        actualPrice: trade.price,
        actualQuantity: trade.quantity,
        reconciledAt: now.toISOString()
      });
    }

    const scope = options.portfolioNames ? new Set(options.portfolioNames) : undefined;
    for (const record of records) {
      if (used.has(record.id) || record.reconciledAt) continue;
      if (scope && !scope.has(record.portfolioName)) continue;
      if (minutesBetween(record.submittedAt, now.toISOString()) <= options.graceMinutes) continue;
      result.mismatches.push({
        code: 'UNFILLED_TRADE',
        portfolioName: record.portfolioName,
        symbol: record.symbol,
        message: `${record.action} ${record.symbol} submitted ${record.submittedAt} has no matching broker fill`,
        observed: { tradeId: record.id }
      });
    }

    await ledger.updateTrades(result.updates);
  } catch (err) {
    console.warn(`[reconcile] Trade history reconciliation skipped: ${errorMessage(err)}`);
    result.mismatches.push({
      code: 'TRADE_HISTORY_UNAVAILABLE',
      message: `trade history reconciliation skipped: ${errorMessage(err)}`
    });
  }
  return result;
};
