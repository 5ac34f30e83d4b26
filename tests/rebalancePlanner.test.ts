import { ExternalSaleRecord } from '../src/core/types';
import { OwnedHolding, PlannerInput, RebalancePlanner, planRebalance } from '../src/execution/rebalancePlanner';

const TOP5 = ['AAA', 'BBB', 'CCC', 'DDD', 'EEE'];

const holdings = (symbols: string[], quantity = 10, estPrice = 100): Record<string, OwnedHolding> =>
  Object.fromEntries(symbols.map((s) => [s, { quantity, estPrice }]));

const sale = (id: string, symbol: string, estimatedProceeds: number): ExternalSaleRecord => ({
  id,
  portfolioName: 'alpha',
  symbol,
  quantity: estimatedProceeds / 250,
  estimatedProceeds,
  usedForReinvestment: false,
  detectedAt: '2026-01-05T14:30:00.000Z'
});

const input = (overrides: Partial<PlannerInput>): PlannerInput => ({
  portfolioName: 'alpha',
  previous: TOP5,
  current: TOP5,
  owned: holdings(TOP5),
  heldNotOwned: [],
  externalSales: [],
  hasTraded: true,
  initialCapital: 10000,
  minOrderNotional: 1,
  ...overrides
});

describe('RebalancePlanner', () => {
  it('splits initial capital equally on the first run', () => {
    const plan = planRebalance(input({ previous: [], owned: {}, hasTraded: false }));
    expect(plan.kind).toBe('INITIAL');
    expect(plan.sells).toEqual([]);
    expect(plan.buys).toEqual(TOP5.map((symbol) => ({ symbol, amount: 2000, reason: 'INITIAL', externalSaleIds: [] })));
    expect(plan.transitions).toEqual(['IDLE', 'DETECTING_CHANGES', 'BUYING', 'DONE']);
  });

  it('rounds each buy down so the buys never spend more than the capital', () => {
    const plan = planRebalance(
      input({ previous: [], current: ['AAA', 'BBB', 'CCC'], owned: {}, hasTraded: false, initialCapital: 200 })
    );
    expect(plan.buys.map((b) => b.amount)).toEqual([66.66, 66.66, 66.66]);
  });

  it('plans nothing when the leaderboard is unchanged and fully owned', () => {
    const plan = planRebalance(input({}));
    expect(plan.kind).toBe('NOOP');
    expect(plan.sells).toEqual([]);
    expect(plan.buys).toEqual([]);
    expect(plan.skipped).toEqual([]);
    expect(plan.transitions).toEqual(['IDLE', 'DETECTING_CHANGES', 'DONE']);
  });

  it('sells leavers and reinvests their proceeds in entrants', () => {
    const owned = { ...holdings(['AAA', 'BBB', 'CCC', 'DDD']), EEE: { quantity: 10, estPrice: 120 } };
    const plan = planRebalance(input({ current: ['AAA', 'BBB', 'CCC', 'DDD', 'FFF'], owned }));

    expect(plan.leavers).toEqual(['EEE']);
    expect(plan.entrants).toEqual(['FFF']);
    expect(plan.sells).toEqual([{ symbol: 'EEE', quantity: 10, estPrice: 120, estProceeds: 1200 }]);
    expect(plan.buys).toEqual([{ symbol: 'FFF', amount: 1200, reason: 'ENTRANT', externalSaleIds: [] }]);
    expect(plan.transitions).toEqual(['IDLE', 'DETECTING_CHANGES', 'SELLING', 'BUYING', 'DONE']);
  });

  it('buys back an externally sold symbol that stays in the top 5 without selling it', () => {
    const owned = { ...holdings(['AAA', 'BBB', 'CCC', 'DDD']), EEE: { quantity: 4, estPrice: 250 } };
    const plan = planRebalance(input({ owned, externalSales: [sale('ext-1', 'EEE', 500)] }));

    expect(plan.sells).toEqual([]);
    expect(plan.buys).toEqual([{ symbol: 'EEE', amount: 500, reason: 'BUYBACK', externalSaleIds: ['ext-1'] }]);
    expect(plan.externalSalesConsumed).toEqual(['ext-1']);
    expect(plan.pooledExternalSaleIds).toEqual([]);
  });

  it('sells the rest of an externally reduced leaver and pools both proceeds', () => {
    const owned = { ...holdings(['AAA', 'BBB', 'CCC', 'DDD']), EEE: { quantity: 4, estPrice: 250 } };
    const plan = planRebalance(
      input({ current: ['AAA', 'BBB', 'CCC', 'DDD', 'FFF'], owned, externalSales: [sale('ext-1', 'EEE', 500)] })
    );

    expect(plan.sells).toEqual([{ symbol: 'EEE', quantity: 4, estPrice: 250, estProceeds: 1000 }]);
    expect(plan.externalProceeds).toBe(500);
    expect(plan.availableCapital).toBe(1500);
    expect(plan.buys).toEqual([{ symbol: 'FFF', amount: 1500, reason: 'ENTRANT', externalSaleIds: [] }]);
    expect(plan.pooledExternalSaleIds).toEqual(['ext-1']);
    expect(plan.externalSalesConsumed).toEqual(['ext-1']);
  });

  it('treats a manually held top-5 symbol as a buy target', () => {
    const plan = planRebalance(
      input({
        owned: holdings(['AAA', 'BBB', 'CCC', 'DDD']),
        heldNotOwned: ['EEE'],
        externalSales: [sale('ext-a', 'AAA', 600)]
      })
    );
    expect(plan.buys).toEqual([
      { symbol: 'AAA', amount: 300, reason: 'BUYBACK', externalSaleIds: ['ext-a'] },
      { symbol: 'EEE', amount: 300, reason: 'HELD_NOT_OWNED', externalSaleIds: [] }
    ]);
  });

  it('skips buys when there is no capital', () => {
    const plan = planRebalance(input({ owned: holdings(['AAA', 'BBB', 'CCC', 'DDD']) }));
    expect(plan.kind).toBe('NOOP');
    expect(plan.buys).toEqual([]);
    expect(plan.skipped).toEqual([{ symbol: 'EEE', action: 'BUY', reason: 'NO_CAPITAL' }]);
    expect(plan.externalSalesConsumed).toEqual([]);
  });

  it('skips buys below the minimum order notional', () => {
    const plan = planRebalance(
      input({ owned: holdings(['AAA', 'BBB', 'CCC']), externalSales: [sale('ext-z', 'ZZZ', 1.5)] })
    );
    expect(plan.skipped).toEqual([
      { symbol: 'DDD', action: 'BUY', reason: 'BELOW_MIN_NOTIONAL' },
      { symbol: 'EEE', action: 'BUY', reason: 'BELOW_MIN_NOTIONAL' }
    ]);
    expect(plan.pooledExternalSaleIds).toEqual([]);
  });

  it('refuses to plan twice', () => {
    const planner = new RebalancePlanner();
    planner.plan(input({}));
    expect(planner.currentState).toBe('DONE');
    expect(() => planner.plan(input({}))).toThrow('Illegal planner transition DONE -> DETECTING_CHANGES');
  });
});
