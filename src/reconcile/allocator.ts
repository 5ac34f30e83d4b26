import { LedgerState, PortfolioView, SymbolShare } from '../core/types';
import { QUANTITY_EPSILON } from '../core/utils';

interface Claim {
  portfolioName: string;
  ledgerQuantity: number;
}

/**
 * Splits `brokerQuantity` across claims in integer units of 10^-decimals, in proportion to each
 * claim's ledger quantity. Floors first; the leftover units go to the largest fraction
 * (portfolio name ascending on ties). Returns portfolio → apportioned share.
 */
export const apportionQuantity = (brokerQuantity: number, claims: Claim[], decimals: number): Record<string, number> => {
  const factor = 10 ** decimals;
  const total = claims.reduce((acc, c) => acc + c.ledgerQuantity, 0);
  const result: Record<string, number> = {};
  if (!claims.length) return result;
  const brokerUnits = Math.max(0, Math.round(brokerQuantity * factor));
  if (total <= 0) {
    claims.forEach((c) => (result[c.portfolioName] = 0));
    return result;
  }
  let assigned = 0;
  const units: Record<string, number> = {};
  for (const claim of claims) {
    // the epsilon keeps exact ratios such as 6/10 of 10 units from flooring to 5.999…
    const share = Math.floor((brokerUnits * claim.ledgerQuantity) / total + 1e-9);
    units[claim.portfolioName] = share;
    assigned += share;
  }
  const leftover = brokerUnits - assigned;
  if (leftover > 0) {
    const largest = [...claims].sort(
      (a, b) => b.ledgerQuantity - a.ledgerQuantity || a.portfolioName.localeCompare(b.portfolioName)
    )[0];
    units[largest.portfolioName] += leftover;
  }
  for (const claim of claims) {
    result[claim.portfolioName] = units[claim.portfolioName] / factor;
  }
  return result;
};

/**
 * Builds each portfolio's view of the broker account from one ledger snapshot. Runs once per run,
 * before any portfolio trades, so every portfolio sees the same apportionment.
 */
export const apportionPositions = (
  state: LedgerState,
  brokerPositions: Record<string, number>,
  portfolioNames: string[],
  quantityDecimals: number
): Record<string, PortfolioView> => {
  const names = Array.from(new Set([...portfolioNames, ...Object.keys(state.ownership)]));
  const views: Record<string, PortfolioView> = {};
  names.forEach((portfolioName) => {
    views[portfolioName] = { portfolioName, shares: {}, externallyHeld: [] };
  });

  const claimsBySymbol = new Map<string, Claim[]>();
  for (const [portfolioName, book] of Object.entries(state.ownership)) {
    for (const record of Object.values(book)) {
      if (record.quantity <= QUANTITY_EPSILON) continue;
      const claims = claimsBySymbol.get(record.symbol) ?? [];
      claims.push({ portfolioName, ledgerQuantity: record.quantity });
      claimsBySymbol.set(record.symbol, claims);
    }
  }

  for (const [symbol, claims] of claimsBySymbol) {
    const brokerQuantity = brokerPositions[symbol] ?? 0;
    const total = claims.reduce((acc, c) => acc + c.ledgerQuantity, 0);
    // an intact holding is never split; rounding would read as an external sale
    const intact = brokerQuantity >= total - QUANTITY_EPSILON;
    const shares = intact
      ? Object.fromEntries(claims.map((c) => [c.portfolioName, c.ledgerQuantity]))
      : apportionQuantity(brokerQuantity, claims, quantityDecimals);
    for (const claim of claims) {
      const share: SymbolShare = {
        symbol,
        ledgerQuantity: claim.ledgerQuantity,
        brokerQuantity: Math.min(claim.ledgerQuantity, shares[claim.portfolioName]),
        ownershipFraction: claim.ledgerQuantity / total
      };
      views[claim.portfolioName].shares[symbol] = share;
    }
  }

  const held = Object.entries(brokerPositions)
    .filter(([, qty]) => qty > QUANTITY_EPSILON)
    .map(([symbol]) => symbol)
    .sort();
  for (const view of Object.values(views)) {
    view.externallyHeld = held.filter((symbol) => !view.shares[symbol]);
  }
  return views;
};
