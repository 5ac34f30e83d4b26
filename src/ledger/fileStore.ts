import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { LedgerState } from '../core/types';
import { SourceUnavailableError, errorMessage } from '../core/errors';
import { writeJSONFileAtomic } from '../core/utils';
import { LedgerStore, LedgerUnit, describeUnit, emptyLedgerState } from './ledgerStore.types';

const ownershipRecordSchema = z.object({
  portfolioName: z.string(),
  symbol: z.string(),
  quantity: z.number(),
  totalCost: z.number(),
  firstPurchaseAt: z.string(),
  lastPurchaseAt: z.string(),
  updatedAt: z.string()
});

const ledgerStateSchema = z.object({
  ownership: z.record(z.string(), z.record(z.string(), ownershipRecordSchema)).default({}),
  trades: z
    .array(
      z.object({
        id: z.string(),
        portfolioName: z.string(),
        symbol: z.string(),
        action: z.enum(['BUY', 'SELL']),
        quantity: z.number(),
        price: z.number(),
        total: z.number(),
        submittedAt: z.string(),
        brokerTradeId: z.string().optional(),
        reconciledAt: z.string().optional(),
        actualPrice: z.number().optional(),
        actualQuantity: z.number().optional()
      })
    )
    .default([]),
  externalSales: z
    .array(
      z.object({
        id: z.string(),
        portfolioName: z.string(),
        symbol: z.string(),
        quantity: z.number(),
        estimatedProceeds: z.number(),
        usedForReinvestment: z.boolean(),
        detectedAt: z.string(),
        reinvestedAt: z.string().optional()
      })
    )
    .default([]),
  snapshots: z
    .record(
      z.string(),
      z.object({
        portfolioName: z.string(),
        indexId: z.string(),
        symbols: z.array(z.string()),
        capturedAt: z.string()
      })
    )
    .default({})
});

/** One JSON document per ledger; each transaction rewrites it through a temp file + rename. */
export class FileLedgerStore implements LedgerStore {
  readonly persistent = true;
  private readonly filePath: string;

  constructor(filePath: string) {
    this.filePath = path.resolve(filePath);
  }

  getFilePath() {
    return this.filePath;
  }

  private read(): LedgerState {
    if (!fs.existsSync(this.filePath)) return emptyLedgerState();
    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(this.filePath, 'utf-8'));
    } catch (err) {
      throw new SourceUnavailableError('ledger store', `unreadable ${this.filePath}: ${errorMessage(err)}`, { cause: err });
    }
    const parsed = ledgerStateSchema.safeParse(raw);
    if (!parsed.success) {
      throw new SourceUnavailableError('ledger store', `malformed ${this.filePath}: ${parsed.error.issues[0]?.message}`);
    }
    return parsed.data;
  }

  async snapshot(): Promise<LedgerState> {
    return this.read();
  }

  async transact<T>(unit: LedgerUnit, fn: (draft: LedgerState) => T): Promise<T> {
    const draft = this.read();
    const result = fn(draft);
    try {
      writeJSONFileAtomic(this.filePath, draft);
    } catch (err) {
      throw new SourceUnavailableError('ledger store', `write failed for ${describeUnit(unit)}: ${errorMessage(err)}`, {
        cause: err
      });
    }
    return result;
  }
}
