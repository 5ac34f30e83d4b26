import {
  ExecutedLeg,
  JournalEventType,
  OrderAck,
  RebalancePlan,
  SkippedLeg,
  TradeAction,
  TradeRecord
} from '../core/types';
import { OrderRejectedError, errorCode, errorMessage } from '../core/errors';
import { floorCents, roundCents, safeUuid } from '../core/utils';
import { Broker } from '../broker/broker.types';
import { OwnershipLedger } from '../ledger/ownershipLedger';

export interface ExecutionOptions {
  dryRun?: boolean;
  minOrderNotional: number;
  journal?: (type: JournalEventType, details: Record<string, unknown>) => void;
  now?: () => Date;
}

export interface ExecutionResult {
  executed: ExecutedLeg[];
  skipped: SkippedLeg[];
  proceeds: number;
  invested: number;
  consumedExternalSaleIds: string[];
}

type LegOutcome = { ok: true; leg: ExecutedLeg; consumed: string[] } | { ok: false; skip: SkippedLeg };

interface LegRequest {
  symbol: string;
  action: TradeAction;
  quantity: number;
  price: number;
  amount: number;
  consume: string[];
}

export const emptyExecutionResult = (): ExecutionResult => ({
  executed: [],
  skipped: [],
  proceeds: 0,
  invested: 0,
  consumedExternalSaleIds: []
});

/**
 * Sells first, then buys, each leg recorded on acceptance. A failed leg is skipped and reported;
 * nothing already done is rolled back. Legs land in `result` as they complete, so a caller that
 * passes its own result still sees them if execution throws part way.
 */
export const executePlan = async (
  plan: RebalancePlan,
  broker: Broker,
  ledger: OwnershipLedger,
  options: ExecutionOptions,
  result: ExecutionResult = emptyExecutionResult()
): Promise<ExecutionResult> => {
  const now = options.now ?? (() => new Date());
  const journal = options.journal ?? (() => undefined);
  const prefix = `[${plan.portfolioName}]`;

  const submit = async (req: LegRequest): Promise<LegOutcome> => {
    const fail = (code: string, reason: string): LegOutcome => {
      console.warn(`${prefix} ${req.action} ${req.symbol} skipped (${code}): ${reason}`);
      journal('ORDER_FAILED', { symbol: req.symbol, action: req.action, code, reason });
      return { ok: false, skip: { symbol: req.symbol, action: req.action, code, reason } };
    };

    let ack: OrderAck;
    if (options.dryRun) {
      ack = { accepted: true };
    } else {
      try {
        ack = req.action === 'SELL' ? await broker.sell(req.symbol, req.quantity) : await broker.buy(req.symbol, req.amount);
      } catch (err) {
        return fail(errorCode(err), errorMessage(err));
      }
    }
    if (!ack.accepted) {
      const rejected = new OrderRejectedError(req.symbol, ack.reason);
      return fail(rejected.code, rejected.message);
    }

    const trade: TradeRecord = {
      id: safeUuid('trd'),
      portfolioName: plan.portfolioName,
      symbol: req.symbol,
      action: req.action,
      quantity: req.quantity,
      price: req.price,
      total: roundCents(req.quantity * req.price),
      submittedAt: now().toISOString(),
      brokerTradeId: ack.orderId
    };
    try {
      await ledger.recordTrade(trade, req.consume);
    } catch (err) {
      // The order is live at the broker; trade-history reconciliation reports it as MISSING_TRADE.
      console.error(`${prefix} ${req.action} ${req.symbol} accepted but not recorded: ${errorMessage(err)}`);
      return fail('LEDGER_WRITE_FAILED', errorMessage(err));
    }
    journal('ORDER_SUBMITTED', {
      symbol: req.symbol,
      action: req.action,
      quantity: req.quantity,
      price: req.price,
      orderId: ack.orderId,
      simulated: Boolean(options.dryRun)
    });
    console.log(
      `${prefix} ${options.dryRun ? '[dry-run] ' : ''}${req.action} ${req.quantity} ${req.symbol} @ ${req.price} (${trade.total})`
    );
    return {
      ok: true,
      consumed: req.consume,
      leg: {
        symbol: req.symbol,
        action: req.action,
        quantity: req.quantity,
        price: req.price,
        total: trade.total,
        orderId: ack.orderId,
        tradeId: trade.id,
        simulated: Boolean(options.dryRun)
      }
    };
  };

  const collect = (outcome: LegOutcome) => {
    if (!outcome.ok) {
      result.skipped.push(outcome.skip);
      return false;
    }
    result.executed.push(outcome.leg);
    result.consumedExternalSaleIds.push(...outcome.consumed);
    return true;
  };

  let realized = 0;
  for (const sell of plan.sells) {
    const outcome = await submit({
      symbol: sell.symbol,
      action: 'SELL',
      quantity: sell.quantity,
      price: sell.estPrice,
      amount: sell.estProceeds,
      consume: []
    });
    if (collect(outcome) && outcome.ok) {
      realized += outcome.leg.total;
      result.proceeds = roundCents(realized);
    }
  }

  // Actual sale proceeds replace the estimates the plan was sized with.
  let perBuy: number | undefined;
  if (plan.kind === 'ROTATION' && plan.sells.length && plan.buys.length) {
    perBuy = floorCents((realized + plan.externalProceeds) / plan.buys.length);
  }

  let pooledPending = plan.pooledExternalSaleIds.length > 0;
  for (const buy of plan.buys) {
    const amount = perBuy ?? buy.amount;
    if (amount <= 0) {
      result.skipped.push({ symbol: buy.symbol, action: 'BUY', code: 'NO_CAPITAL', reason: 'no proceeds to reinvest' });
      continue;
    }
    if (amount < options.minOrderNotional) {
      result.skipped.push({
        symbol: buy.symbol,
        action: 'BUY',
        code: 'BELOW_MIN_NOTIONAL',
        reason: `${amount} is below the minimum order of ${options.minOrderNotional}`
      });
      continue;
    }
    let price: number;
    try {
      price = await broker.getCurrentPrice(buy.symbol);
    } catch (err) {
      const reason = errorMessage(err);
      console.warn(`${prefix} BUY ${buy.symbol} skipped (${errorCode(err)}): ${reason}`);
      journal('ORDER_FAILED', { symbol: buy.symbol, action: 'BUY', code: errorCode(err), reason });
      result.skipped.push({ symbol: buy.symbol, action: 'BUY', code: errorCode(err), reason });
      continue;
    }
    const consume = pooledPending ? [...buy.externalSaleIds, ...plan.pooledExternalSaleIds] : [...buy.externalSaleIds];
    const outcome = await submit({ symbol: buy.symbol, action: 'BUY', quantity: amount / price, price, amount, consume });
    if (collect(outcome)) {
      pooledPending = false;
      result.invested = roundCents(result.invested + amount);
    }
  }
  return result;
};
