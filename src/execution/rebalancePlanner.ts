import {
  BuyReason,
  ExternalSaleRecord,
  PlanSkip,
  PlannedBuy,
  PlannedSell,
  PlannerState,
  RebalancePlan
} from '../core/types';
import { QUANTITY_EPSILON, floorCents, roundCents, sum } from '../core/utils';

export interface OwnedHolding {
  quantity: number;
  /** Current price, or average cost when no quote was available. */
  estPrice: number;
}

export interface PlannerInput {
  portfolioName: string;
  previous: string[];
  current: string[];
  owned: Record<string, OwnedHolding>;
  heldNotOwned: string[];
  externalSales: ExternalSaleRecord[];
  hasTraded: boolean;
  initialCapital: number;
  minOrderNotional: number;
}

type BuyTarget = Omit<PlannedBuy, 'amount'>;

const TRANSITIONS: Record<PlannerState, PlannerState[]> = {
  IDLE: ['DETECTING_CHANGES'],
  DETECTING_CHANGES: ['SELLING', 'BUYING', 'DONE'],
  SELLING: ['BUYING', 'DONE'],
  BUYING: ['DONE'],
  DONE: []
};

export const diffLeaderboards = (previous: string[], current: string[]) => ({
  leavers: previous.filter((s) => !current.includes(s)),
  entrants: current.filter((s) => !previous.includes(s))
});

/** One planner per portfolio per run; a finished planner cannot plan again. */
export class RebalancePlanner {
  private state: PlannerState = 'IDLE';
  private readonly history: PlannerState[] = ['IDLE'];

  get currentState(): PlannerState {
    return this.state;
  }

  get transitions(): PlannerState[] {
    return [...this.history];
  }

  private transition(next: PlannerState) {
    if (!TRANSITIONS[this.state].includes(next)) {
      throw new Error(`Illegal planner transition ${this.state} -> ${next}`);
    }
    this.state = next;
    this.history.push(next);
  }

  plan(input: PlannerInput): RebalancePlan {
    this.transition('DETECTING_CHANGES');
    const { leavers, entrants } = diffLeaderboards(input.previous, input.current);
    const owned = Object.entries(input.owned).filter(([, h]) => h.quantity > QUANTITY_EPSILON);
    const isOwned = (symbol: string) => owned.some(([s]) => s === symbol);
    const externalProceeds = roundCents(sum(input.externalSales.map((s) => s.estimatedProceeds)));
    const firstRun = owned.length === 0 && !input.hasTraded;

    const sells: PlannedSell[] = [];
    const buys: PlannedBuy[] = [];
    const skipped: PlanSkip[] = [];
    let pooledExternalSaleIds: string[] = [];
    let availableCapital: number;

    if (firstRun) {
      availableCapital = roundCents(input.initialCapital + externalProceeds);
      pooledExternalSaleIds = input.externalSales.map((s) => s.id);
      this.allocate(
        input.current.map((symbol): BuyTarget => ({ symbol, reason: 'INITIAL', externalSaleIds: [] })),
        availableCapital,
        input.minOrderNotional,
        buys,
        skipped
      );
    } else {
      for (const symbol of leavers) {
        const holding = input.owned[symbol];
        if (!holding || holding.quantity <= QUANTITY_EPSILON) continue;
        sells.push({
          symbol,
          quantity: holding.quantity,
          estPrice: holding.estPrice,
          estProceeds: roundCents(holding.quantity * holding.estPrice)
        });
      }
      availableCapital = roundCents(sum(sells.map((s) => s.estProceeds)) + externalProceeds);

      const salesBySymbol = new Map<string, ExternalSaleRecord[]>();
      input.externalSales.forEach((sale) => {
        salesBySymbol.set(sale.symbol, [...(salesBySymbol.get(sale.symbol) ?? []), sale]);
      });
      const targets = input.current
        .filter((symbol) => !isOwned(symbol) || salesBySymbol.has(symbol))
        .map((symbol) => {
          const sales = salesBySymbol.get(symbol);
          let reason: BuyReason = 'UNOWNED';
          if (sales) reason = 'BUYBACK';
          else if (entrants.includes(symbol)) reason = 'ENTRANT';
          else if (input.heldNotOwned.includes(symbol)) reason = 'HELD_NOT_OWNED';
          return { symbol, reason, externalSaleIds: (sales ?? []).map((s) => s.id) };
        });
      const tied = new Set(targets.flatMap((t) => t.externalSaleIds));
      pooledExternalSaleIds = input.externalSales.filter((s) => !tied.has(s.id)).map((s) => s.id);
      this.allocate(targets, availableCapital, input.minOrderNotional, buys, skipped);
    }

    if (sells.length) this.transition('SELLING');
    if (buys.length) this.transition('BUYING');
    this.transition('DONE');

    const externalSalesConsumed = buys.length
      ? [...buys.flatMap((b) => b.externalSaleIds), ...pooledExternalSaleIds]
      : [];
    return {
      portfolioName: input.portfolioName,
      kind: firstRun && buys.length ? 'INITIAL' : sells.length || buys.length ? 'ROTATION' : 'NOOP',
      previous: [...input.previous],
      current: [...input.current],
      leavers,
      entrants,
      sells,
      buys,
      externalSalesConsumed,
      pooledExternalSaleIds: buys.length ? pooledExternalSaleIds : [],
      externalProceeds,
      availableCapital,
      skipped,
      transitions: this.transitions
    };
  }

  private allocate(
    targets: BuyTarget[],
    capital: number,
    minOrderNotional: number,
    buys: PlannedBuy[],
    skipped: PlanSkip[]
  ) {
    if (!targets.length) return;
    if (capital <= 0) {
      targets.forEach((t) => skipped.push({ symbol: t.symbol, action: 'BUY', reason: 'NO_CAPITAL' }));
      return;
    }
    const amount = floorCents(capital / targets.length);
    if (amount < minOrderNotional || amount <= 0) {
      targets.forEach((t) => skipped.push({ symbol: t.symbol, action: 'BUY', reason: 'BELOW_MIN_NOTIONAL' }));
      return;
    }
    targets.forEach((t) => buys.push({ ...t, amount }));
  }
}

export const planRebalance = (input: PlannerInput): RebalancePlan => new RebalancePlanner().plan(input);
