import { z } from 'zod';

const portfolioSchema = z.object({
  portfolioName: z.string().min(1),
  indexId: z.string().min(1),
  initialCapital: z.number().positive(),
  enabled: z.boolean().default(true)
});

export const botConfigSchema = z
  .object({
    portfolios: z.array(portfolioSchema).nonempty(),
    topN: z.number().int().min(1).default(5),
    quantityDecimals: z.number().int().min(0).max(9).default(6),
    minOrderNotionalUSD: z.number().min(0).default(1),
    brokerTimeoutMs: z.number().int().positive().default(30000),
    tradeHistoryLookbackDays: z.number().int().positive().default(7),
    tradeMatchToleranceMinutes: z.number().positive().default(60),
    unfilledGraceMinutes: z.number().min(0).default(60),
    ledgerStore: z.enum(['file', 'memory']).default('file'),
    ledgerFile: z.string().default('ledger/ledger.json'),
    brokerProvider: z.enum(['stub', 'alpaca']).default('stub'),
    leaderboardProvider: z.enum(['stub', 'http']).default('stub'),
    stubLeaderboardFile: z.string().default('src/config/leaderboard.stub.json'),
    stubBrokerFile: z.string().optional(),
    schedule: z
      .object({
        cron: z.string().default('30 9 * * 1'),
        timezone: z.string().default('America/New_York'),
        rebalanceDay: z.string().default('MONDAY'),
        marketOpenGuard: z.boolean().default(true)
      })
      .default({}),
    webhookPort: z.number().int().min(0).default(8080),
    webhookBind: z.string().default('127.0.0.1')
  })
  .superRefine((cfg, ctx) => {
    const seen = new Set<string>();
    cfg.portfolios.forEach((p, idx) => {
      if (seen.has(p.portfolioName)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['portfolios', idx, 'portfolioName'],
          message: `duplicate portfolio name ${p.portfolioName}`
        });
      }
      seen.add(p.portfolioName);
    });
  });

const leaderboardItemSchema = z.union([
  z.string(),
  z
    .object({
      symbol: z.string().optional(),
      ticker: z.string().optional(),
      stock: z.string().optional(),
      code: z.string().optional()
    })
    .passthrough()
]);

export const leaderboardResponseSchema = z.union([
  z.array(leaderboardItemSchema),
  z
    .object({
      data: z.array(leaderboardItemSchema).optional(),
      results: z.array(leaderboardItemSchema).optional(),
      symbols: z.array(leaderboardItemSchema).optional(),
      stocks: z.array(leaderboardItemSchema).optional()
    })
    .passthrough()
]);

export type LeaderboardItem = z.infer<typeof leaderboardItemSchema>;

export const stubLeaderboardFileSchema = z.record(z.string(), z.array(z.string()));

export const stubBrokerFileSchema = z.object({
  prices: z.record(z.string(), z.number().positive()).default({}),
  positions: z.record(z.string(), z.number().min(0)).default({}),
  trades: z
    .array(
      z.object({
        tradeId: z.string().optional(),
        symbol: z.string(),
        action: z.enum(['BUY', 'SELL']),
        quantity: z.number(),
        price: z.number(),
        total: z.number(),
        timestamp: z.string()
      })
    )
    .default([])
});

export type StubBrokerFile = z.infer<typeof stubBrokerFileSchema>;

export const formatIssues = (error: z.ZodError): string[] =>
  error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
