import { StubBroker } from '../src/broker/broker.stub';
import { withTimeouts } from '../src/broker/timeoutBroker';
import { ExternalSaleRecord, OrderAck, RebalancePlan } from '../src/core/types';
import { MemoryLedgerStore } from '../src/ledger/memoryStore';
import { OwnershipLedger } from '../src/ledger/ownershipLedger';
import { executePlan } from '../src/execution/executionEngine';
import { planRebalance } from '../src/execution/rebalancePlanner';
import { fixedClock, ownershipState } from './fixtures';

const externalSale: ExternalSaleRecord = {
  id: 'ext-1',
  portfolioName: 'alpha',
  symbol: 'EEE',
  quantity: 2,
  estimatedProceeds: 500,
  usedForReinvestment: false,
  detectedAt: '2026-01-05T14:29:00.000Z'
};

// EEE leaves the board after 2 of its 6 shares were sold outside the bot.
const setup = () => {
  const state = ownershipState({ alpha: { EEE: 4 } });
  state.externalSales.push({ ...externalSale });
  const ledger = new OwnershipLedger(new MemoryLedgerStore(state));
  const broker = new StubBroker({ prices: { EEE: 250, FFF: 100 }, positions: { EEE: 4 } });
  const plan: RebalancePlan = planRebalance({
    portfolioName: 'alpha',
    previous: ['EEE'],
    current: ['FFF'],
    owned: { EEE: { quantity: 4, estPrice: 250 } },
    heldNotOwned: [],
    externalSales: [externalSale],
    hasTraded: true,
    initialCapital: 10000,
    minOrderNotional: 1
  });
  return { ledger, broker, plan };
};

class HangingBroker extends StubBroker {
  buy(): Promise<OrderAck> {
    return new Promise<OrderAck>(() => undefined);
  }
}

describe('executePlan', () => {
  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('splits realized proceeds across buys rounded down to the cent', async () => {
    const ledger = new OwnershipLedger(new MemoryLedgerStore(ownershipState({ alpha: { EEE: 1 } })));
    const broker = new StubBroker({ prices: { EEE: 200, AAA: 100, BBB: 100, CCC: 100 }, positions: { EEE: 1 } });
    const plan = planRebalance({
      portfolioName: 'alpha',
      previous: ['EEE'],
      current: ['AAA', 'BBB', 'CCC'],
      owned: { EEE: { quantity: 1, estPrice: 200 } },
      heldNotOwned: [],
      externalSales: [],
      hasTraded: true,
      initialCapital: 10000,
      minOrderNotional: 1
    });

    const result = await executePlan(plan, broker, ledger, { minOrderNotional: 1, now: fixedClock() });

    expect(broker.orders.filter((o) => o.side === 'BUY').map((o) => o.amount)).toEqual([66.66, 66.66, 66.66]);
    expect(result.proceeds).toBe(200);
    expect(result.invested).toBe(199.98);
  });

  it('sells the leaver then reinvests sale and external proceeds', async () => {
    const { ledger, broker, plan } = setup();
    const result = await executePlan(plan, broker, ledger, { minOrderNotional: 1, now: fixedClock() });

    expect(broker.orders).toEqual([
      { symbol: 'EEE', side: 'SELL', quantity: 4 },
      { symbol: 'FFF', side: 'BUY', amount: 1500 }
    ]);
    expect(result.executed.map((l) => [l.action, l.symbol, l.quantity, l.total])).toEqual([
      ['SELL', 'EEE', 4, 1000],
      ['BUY', 'FFF', 15, 1500]
    ]);
    expect(result.proceeds).toBe(1000);
    expect(result.invested).toBe(1500);
    expect(result.consumedExternalSaleIds).toEqual(['ext-1']);
    expect(result.skipped).toEqual([]);

    const state = await ledger.state();
    expect(state.ownership.alpha.EEE).toBeUndefined();
    expect(state.ownership.alpha.FFF).toMatchObject({ quantity: 15, totalCost: 1500 });
    expect(state.externalSales[0]).toMatchObject({ usedForReinvestment: true, reinvestedAt: '2026-01-05T14:30:00.000Z' });
    expect(state.trades.map((t) => t.brokerTradeId)).toEqual(result.executed.map((l) => l.orderId));
  });

  it('reports a rejected buy and keeps its external sale for the next run', async () => {
    const { ledger, broker, plan } = setup();
    broker.rejectSymbol('FFF');
    const result = await executePlan(plan, broker, ledger, { minOrderNotional: 1 });

    expect(result.executed.map((l) => l.symbol)).toEqual(['EEE']);
    expect(result.skipped).toEqual([
      { symbol: 'FFF', action: 'BUY', code: 'ORDER_REJECTED', reason: 'FFF is not tradable' }
    ]);
    expect(result.consumedExternalSaleIds).toEqual([]);
    expect(await ledger.unconsumedExternalSales('alpha')).toHaveLength(1);
  });

  it('skips a leg whose broker call times out', async () => {
    const { ledger, plan } = setup();
    const broker = withTimeouts(new HangingBroker({ prices: { EEE: 250, FFF: 100 }, positions: { EEE: 4 } }), 20);
    const result = await executePlan(plan, broker, ledger, { minOrderNotional: 1 });

    expect(result.skipped).toEqual([
      {
        symbol: 'FFF',
        action: 'BUY',
        code: 'SOURCE_UNAVAILABLE',
        reason: 'stub broker buy(FFF): timed out after 20ms'
      }
    ]);
    expect(await ledger.get('alpha', 'FFF')).toBeUndefined();
  });

  it('simulates every leg on a dry run', async () => {
    const { ledger, broker, plan } = setup();
    const events: string[] = [];
    const result = await executePlan(plan, broker, ledger, {
      dryRun: true,
      minOrderNotional: 1,
      journal: (type) => events.push(type)
    });

    expect(broker.orders).toEqual([]);
    expect(result.executed.map((l) => [l.symbol, l.simulated])).toEqual([
      ['EEE', true],
      ['FFF', true]
    ]);
    expect(events).toEqual(['ORDER_SUBMITTED', 'ORDER_SUBMITTED']);
  });

  it('skips buys when the realized proceeds fall below the minimum order', async () => {
    const { ledger, broker, plan } = setup();
    const result = await executePlan(plan, broker, ledger, { minOrderNotional: 2000 });

    expect(result.skipped).toEqual([
      { symbol: 'FFF', action: 'BUY', code: 'BELOW_MIN_NOTIONAL', reason: '1500 is below the minimum order of 2000' }
    ]);
  });
});
