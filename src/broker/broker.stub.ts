import fs from 'fs';
import { BrokerTrade, OrderAck } from '../core/types';
import { SourceUnavailableError } from '../core/errors';
import { StubBrokerFile, formatIssues, stubBrokerFileSchema } from '../core/schema';
import { QUANTITY_EPSILON, hashString, normalizeSymbol, roundTo, safeUuid, writeJSONFileAtomic } from '../core/utils';
import { Broker } from './broker.types';

export interface StubBrokerOptions {
  /** Persist positions and trades back to this file after every order. */
  filePath?: string;
  /** Quote a deterministic price for symbols with none configured. */
  syntheticPrices?: boolean;
  rejectSymbols?: string[];
  now?: () => Date;
}

const syntheticPrice = (symbol: string) => 50 + (hashString(symbol) % 15000) / 100;

/** Paper broker: fills instantly at the quoted price. */
export class StubBroker implements Broker {
  readonly name = 'stub';
  private prices: Record<string, number>;
  private positions: Record<string, number>;
  private trades: BrokerTrade[];
  private rejectSymbols: Set<string>;
  private options: StubBrokerOptions;
  readonly orders: { symbol: string; side: 'BUY' | 'SELL'; amount?: number; quantity?: number }[] = [];

  constructor(seed: Partial<StubBrokerFile> = {}, options: StubBrokerOptions = {}) {
    this.prices = Object.fromEntries(Object.entries(seed.prices ?? {}).map(([s, p]) => [normalizeSymbol(s), p]));
    this.positions = Object.fromEntries(Object.entries(seed.positions ?? {}).map(([s, q]) => [normalizeSymbol(s), q]));
    this.trades = [...(seed.trades ?? [])];
    this.rejectSymbols = new Set((options.rejectSymbols ?? []).map(normalizeSymbol));
    this.options = options;
  }

  static fromFile(filePath: string, options: Omit<StubBrokerOptions, 'filePath'> = {}): StubBroker {
    if (!fs.existsSync(filePath)) {
      return new StubBroker({}, { ...options, filePath });
    }
    const parsed = stubBrokerFileSchema.safeParse(JSON.parse(fs.readFileSync(filePath, 'utf-8')));
    if (!parsed.success) {
      throw new SourceUnavailableError('stub broker', `invalid seed file ${filePath}: ${formatIssues(parsed.error).join('; ')}`);
    }
    return new StubBroker(parsed.data, { ...options, filePath });
  }

  private now() {
    return (this.options.now ?? (() => new Date()))();
  }

  setPrice(symbol: string, price: number) {
    this.prices[normalizeSymbol(symbol)] = price;
  }

  setPosition(symbol: string, quantity: number) {
    const key = normalizeSymbol(symbol);
    if (quantity <= QUANTITY_EPSILON) {
      delete this.positions[key];
    } else {
      this.positions[key] = quantity;
    }
  }

  rejectSymbol(symbol: string) {
    this.rejectSymbols.add(normalizeSymbol(symbol));
  }

  addTrade(trade: BrokerTrade) {
    this.trades.push(trade);
  }

  async getPositions(): Promise<Record<string, number>> {
    return { ...this.positions };
  }

  async getTradeHistory(since: Date): Promise<BrokerTrade[]> {
    return this.trades.filter((t) => new Date(t.timestamp).getTime() >= since.getTime()).map((t) => ({ ...t }));
  }

  async getCurrentPrice(symbol: string): Promise<number> {
    const key = normalizeSymbol(symbol);
    const price = this.prices[key];
    if (price !== undefined) return price;
    if (this.options.syntheticPrices) return syntheticPrice(key);
    throw new SourceUnavailableError('stub broker', `no quote for ${key}`);
  }

  async buy(symbol: string, amount: number): Promise<OrderAck> {
    const key = normalizeSymbol(symbol);
    this.orders.push({ symbol: key, side: 'BUY', amount });
    if (this.rejectSymbols.has(key)) return { accepted: false, reason: `${key} is not tradable` };
    if (!(amount > 0)) return { accepted: false, reason: `invalid notional ${amount}` };
    const price = await this.getCurrentPrice(key);
    const quantity = amount / price;
    this.positions[key] = (this.positions[key] ?? 0) + quantity;
    return this.fill(key, 'BUY', quantity, price);
  }

  async sell(symbol: string, quantity: number): Promise<OrderAck> {
    const key = normalizeSymbol(symbol);
    this.orders.push({ symbol: key, side: 'SELL', quantity });
    if (this.rejectSymbols.has(key)) return { accepted: false, reason: `${key} is not tradable` };
    const held = this.positions[key] ?? 0;
    if (quantity > held + QUANTITY_EPSILON) {
      return { accepted: false, reason: `insufficient position in ${key}: ${held} < ${quantity}` };
    }
    const price = await this.getCurrentPrice(key);
    this.setPosition(key, held - quantity);
    return this.fill(key, 'SELL', quantity, price);
  }

  private fill(symbol: string, action: 'BUY' | 'SELL', quantity: number, price: number): OrderAck {
    const orderId = safeUuid('ord');
    this.trades.push({
      tradeId: orderId,
      symbol,
      action,
      quantity,
      price,
      total: roundTo(quantity * price, 2),
      timestamp: this.now().toISOString()
    });
    this.persist();
    return { accepted: true, orderId };
  }

  private persist() {
    if (!this.options.filePath) return;
    writeJSONFileAtomic(this.options.filePath, { prices: this.prices, positions: this.positions, trades: this.trades });
  }
}
