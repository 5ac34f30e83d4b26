import { LedgerState, PortfolioPerformance } from '../core/types';
import { errorMessage } from '../core/errors';
import { roundCents, roundTo, sum } from '../core/utils';
import { ownershipRecords } from '../ledger/ownership';

export type PriceLookup = (symbol: string) => Promise<number>;

/**
 * Marks bot-owned holdings to market. Return is measured against initial capital:
 * (market value + sale proceeds + external-sale proceeds − purchases) / initial capital.
 * Symbols without a quote are carried at cost.
 */
export const computePerformance = async (
  state: LedgerState,
  portfolioName: string,
  initialCapital: number,
  priceOf: PriceLookup
): Promise<PortfolioPerformance> => {
  const records = ownershipRecords(state, portfolioName);
  let marketValue = 0;
  for (const record of records) {
    try {
      marketValue += record.quantity * (await priceOf(record.symbol));
    } catch (err) {
      console.warn(`[${portfolioName}] No quote for ${record.symbol}, valuing at cost: ${errorMessage(err)}`);
      marketValue += record.totalCost;
    }
  }
  const trades = state.trades.filter((t) => t.portfolioName === portfolioName);
  const totalBought = sum(trades.filter((t) => t.action === 'BUY').map((t) => t.total));
  const totalSold = sum(trades.filter((t) => t.action === 'SELL').map((t) => t.total));
  const externalProceeds = sum(
    state.externalSales.filter((s) => s.portfolioName === portfolioName).map((s) => s.estimatedProceeds)
  );
  const costBasis = sum(records.map((r) => r.totalCost));
  const gain = marketValue + totalSold + externalProceeds - totalBought;
  return {
    portfolioName,
    initialCapital,
    costBasis: roundCents(costBasis),
    marketValue: roundCents(marketValue),
    unrealizedPnl: roundCents(marketValue - costBasis),
    totalBought: roundCents(totalBought),
    totalSold: roundCents(totalSold),
    totalReturnPct: initialCapital > 0 ? roundTo((gain / initialCapital) * 100, 2) : 0
  };
};
