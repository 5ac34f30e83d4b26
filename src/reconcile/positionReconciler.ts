import {
  ExternalSaleRecord,
  LedgerState,
  PortfolioView,
  ReconciliationMismatch
} from '../core/types';
import { errorMessage } from '../core/errors';
import { QUANTITY_EPSILON, roundCents, safeUuid } from '../core/utils';
import { Broker } from '../broker/broker.types';
import { OwnershipLedger } from '../ledger/ownershipLedger';
import { averageCost, portfolioOwnership, symbolInAnyLedger, tradeMentions } from '../ledger/ownership';

export interface PositionReconcileInput {
  portfolioName: string;
  view: PortfolioView;
  /** Snapshot the view was built from. */
  state: LedgerState;
  ledger: OwnershipLedger;
  broker: Broker;
  now?: Date;
}

export interface PositionReconcileResult {
  externalSales: ExternalSaleRecord[];
  mismatches: ReconciliationMismatch[];
  /** At the broker, not bot-owned by this portfolio. */
  heldNotOwned: string[];
}

/**
 * Brings the ledger down to the apportioned broker quantity. Never raises a ledger quantity:
 * extra shares at the broker are someone else's.
 */
export const reconcilePositions = async (input: PositionReconcileInput): Promise<PositionReconcileResult> => {
  const { portfolioName, view, state, ledger, broker } = input;
  const detectedAt = (input.now ?? new Date()).toISOString();
  const externalSales: ExternalSaleRecord[] = [];
  const mismatches: ReconciliationMismatch[] = [];
  const book = portfolioOwnership(state, portfolioName);

  for (const share of Object.values(view.shares).sort((a, b) => a.symbol.localeCompare(b.symbol))) {
    const delta = share.ledgerQuantity - share.brokerQuantity;
    if (delta <= QUANTITY_EPSILON) continue;
    const record = book[share.symbol];
    let price: number;
    try {
      price = await broker.getCurrentPrice(share.symbol);
    } catch (err) {
      price = record ? averageCost(record) : 0;
      mismatches.push({
        code: 'PRICE_FALLBACK',
        portfolioName,
        symbol: share.symbol,
        message: `quote unavailable (${errorMessage(err)}); external sale valued at average cost ${roundCents(price)}`
      });
    }
    const sale: ExternalSaleRecord = {
      id: safeUuid('ext'),
      portfolioName,
      symbol: share.symbol,
      quantity: delta,
      estimatedProceeds: roundCents(delta * price),
      usedForReinvestment: false,
      detectedAt
    };
    await ledger.recordExternalSale(sale, share.brokerQuantity);
    externalSales.push(sale);
    console.warn(
      `[${portfolioName}] External sale detected: ${share.symbol} ledger ${share.ledgerQuantity} > broker ${share.brokerQuantity}`
    );
    mismatches.push({
      code: 'EXTERNAL_SALE',
      portfolioName,
      symbol: share.symbol,
      message: `${delta} shares sold outside the bot; est. proceeds ${sale.estimatedProceeds}`,
      observed: {
        ledgerQuantity: share.ledgerQuantity,
        brokerQuantity: share.brokerQuantity,
        ownershipFraction: share.ownershipFraction
      }
    });
  }

  for (const symbol of view.externallyHeld) {
    if (symbolInAnyLedger(state, symbol) || tradeMentions(state, symbol)) continue;
    mismatches.push({
      code: 'EXTERNAL_HOLDING',
      portfolioName,
      symbol,
      message: `${symbol} is held at the broker but was never bought by the bot`
    });
  }

  return { externalSales, mismatches, heldNotOwned: [...view.externallyHeld] };
};
