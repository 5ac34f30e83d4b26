export type TradeAction = 'BUY' | 'SELL';

export interface PortfolioConfig {
  portfolioName: string;
  indexId: string;
  initialCapital: number;
  enabled: boolean;
}

export interface ScheduleConfig {
  cron: string;
  timezone: string;
  rebalanceDay: string;
  marketOpenGuard: boolean;
}

export type LedgerStoreKind = 'file' | 'memory';
export type BrokerProvider = 'stub' | 'alpaca';
export type LeaderboardProvider = 'stub' | 'http';

export interface BotConfig {
  portfolios: PortfolioConfig[];
  topN: number;
  quantityDecimals: number; // 0 = whole shares only
  minOrderNotionalUSD: number;
  brokerTimeoutMs: number;
  tradeHistoryLookbackDays: number;
  tradeMatchToleranceMinutes: number;
  unfilledGraceMinutes: number;
  ledgerStore: LedgerStoreKind;
  ledgerFile: string;
  brokerProvider: BrokerProvider;
  leaderboardProvider: LeaderboardProvider;
  stubLeaderboardFile: string;
  stubBrokerFile?: string;
  schedule: ScheduleConfig;
  webhookPort: number;
  webhookBind: string;
}

export interface OwnershipRecord {
  portfolioName: string;
  symbol: string;
  quantity: number;
  totalCost: number;
  firstPurchaseAt: string;
  lastPurchaseAt: string;
  updatedAt: string;
}

export interface TradeRecord {
  id: string;
  portfolioName: string;
  symbol: string;
  action: TradeAction;
  quantity: number;
  price: number;
  total: number;
  submittedAt: string;
  brokerTradeId?: string;
  // written only by trade-history reconciliation
  reconciledAt?: string;
  actualPrice?: number;
  actualQuantity?: number;
}

export interface ExternalSaleRecord {
  id: string;
  portfolioName: string;
  symbol: string;
  quantity: number;
  estimatedProceeds: number;
  usedForReinvestment: boolean;
  detectedAt: string;
  reinvestedAt?: string;
}

export interface LeaderboardSnapshot {
  portfolioName: string;
  indexId: string;
  symbols: string[];
  capturedAt: string;
}

export interface LedgerState {
  ownership: Record<string, Record<string, OwnershipRecord>>; // portfolio -> symbol -> record
  trades: TradeRecord[];
  externalSales: ExternalSaleRecord[];
  snapshots: Record<string, LeaderboardSnapshot>;
}

export interface BrokerTrade {
  tradeId?: string;
  symbol: string;
  action: TradeAction;
  quantity: number;
  price: number;
  total: number;
  timestamp: string;
}

export type OrderAck = { accepted: true; orderId?: string } | { accepted: false; reason: string };

export type MismatchCode =
  | 'EXTERNAL_SALE'
  | 'EXTERNAL_HOLDING'
  | 'MISSING_TRADE'
  | 'UNFILLED_TRADE'
  | 'PRICE_FALLBACK'
  | 'TRADE_HISTORY_UNAVAILABLE';

export interface ReconciliationMismatch {
  code: MismatchCode;
  symbol?: string;
  portfolioName?: string;
  message: string;
  observed?: Record<string, unknown>;
}

export interface SymbolShare {
  symbol: string;
  ledgerQuantity: number;
  brokerQuantity: number; // apportioned to this portfolio, never above ledgerQuantity
  ownershipFraction: number;
}

export interface PortfolioView {
  portfolioName: string;
  shares: Record<string, SymbolShare>;
  externallyHeld: string[]; // at the broker, absent from this portfolio's ledger
}

export type PlannerState = 'IDLE' | 'DETECTING_CHANGES' | 'SELLING' | 'BUYING' | 'DONE';
export type PlanKind = 'INITIAL' | 'ROTATION' | 'NOOP';
export type BuyReason = 'INITIAL' | 'ENTRANT' | 'BUYBACK' | 'HELD_NOT_OWNED' | 'UNOWNED';

export interface PlannedSell {
  symbol: string;
  quantity: number;
  estPrice: number;
  estProceeds: number;
}

export interface PlannedBuy {
  symbol: string;
  amount: number;
  reason: BuyReason;
  externalSaleIds: string[];
}

export interface PlanSkip {
  symbol: string;
  action: TradeAction;
  reason: string;
}

export interface RebalancePlan {
  portfolioName: string;
  kind: PlanKind;
  previous: string[];
  current: string[];
  leavers: string[];
  entrants: string[];
  sells: PlannedSell[];
  buys: PlannedBuy[];
  externalSalesConsumed: string[];
  pooledExternalSaleIds: string[]; // not tied to a buy-back symbol
  externalProceeds: number;
  availableCapital: number;
  skipped: PlanSkip[];
  transitions: PlannerState[];
}

export interface ExecutedLeg {
  symbol: string;
  action: TradeAction;
  quantity: number;
  price: number;
  total: number;
  orderId?: string;
  tradeId?: string;
  simulated: boolean;
}

export interface SkippedLeg {
  symbol: string;
  action: TradeAction;
  reason: string;
  code: string;
}

export type PortfolioRunStatus = 'COMPLETED' | 'PARTIAL' | 'NOOP' | 'FAILED';

export interface PortfolioPerformance {
  portfolioName: string;
  initialCapital: number;
  costBasis: number;
  marketValue: number;
  unrealizedPnl: number;
  totalBought: number;
  totalSold: number;
  totalReturnPct: number;
}

export interface PortfolioRunSummary {
  portfolioName: string;
  status: PortfolioRunStatus;
  previous: string[];
  current: string[];
  plan?: RebalancePlan;
  executed: ExecutedLeg[];
  skipped: SkippedLeg[];
  externalSales: ExternalSaleRecord[];
  mismatches: ReconciliationMismatch[];
  proceeds: number;
  invested: number;
  ledger: OwnershipRecord[];
  performance?: PortfolioPerformance;
  error?: { code: string; message: string };
}

export interface RunSummary {
  runId: string;
  startedAt: string;
  finishedAt: string;
  dryRun: boolean;
  portfolios: PortfolioRunSummary[];
  mismatches: ReconciliationMismatch[];
}

export type JournalEventType =
  | 'RUN_STARTED'
  | 'RUN_REJECTED'
  | 'TRADE_HISTORY_RECONCILED'
  | 'PORTFOLIO_STARTED'
  | 'EXTERNAL_SALE_DETECTED'
  | 'PLAN_CREATED'
  | 'ORDER_SUBMITTED'
  | 'ORDER_FAILED'
  | 'PORTFOLIO_COMPLETED'
  | 'PORTFOLIO_FAILED'
  | 'RUN_COMPLETED'
  | 'RUN_FAILED';

export interface JournalEvent {
  id: string;
  runId: string;
  timestamp: string;
  type: JournalEventType;
  details?: Record<string, unknown>;
}
