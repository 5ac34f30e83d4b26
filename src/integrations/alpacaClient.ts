import { z } from 'zod';
import { SourceUnavailableError } from '../core/errors';

export interface AlpacaClientConfig {
  apiKey: string;
  apiSecret: string;
  baseUrl?: string;
  dataUrl?: string;
}

const positionSchema = z.object({ symbol: z.string(), qty: z.string() });

const orderSchema = z.object({
  id: z.string(),
  symbol: z.string(),
  side: z.enum(['buy', 'sell']),
  status: z.string(),
  filled_qty: z.string().nullable().optional(),
  filled_avg_price: z.string().nullable().optional(),
  filled_at: z.string().nullable().optional(),
  submitted_at: z.string().nullable().optional()
});

const latestTradeSchema = z.object({ trade: z.object({ p: z.number() }) });

export type AlpacaPosition = z.infer<typeof positionSchema>;
export type AlpacaOrder = z.infer<typeof orderSchema>;

export interface AlpacaOrderRequest {
  symbol: string;
  side: 'buy' | 'sell';
  notional?: string;
  qty?: string;
}

const source = 'alpaca';

export class AlpacaClient {
  private config: Required<AlpacaClientConfig>;

  constructor(config: AlpacaClientConfig) {
    this.config = {
      apiKey: config.apiKey,
      apiSecret: config.apiSecret,
      baseUrl: (config.baseUrl ?? 'https://paper-api.alpaca.markets').replace(/\/$/, ''),
      dataUrl: (config.dataUrl ?? 'https://data.alpaca.markets').replace(/\/$/, '')
    };
  }

  private async request<T>(url: string, schema: z.ZodType<T>, init: { method?: string; body?: unknown } = {}): Promise<T> {
    let resp: Response;
    try {
      resp = await fetch(url, {
        method: init.method ?? 'GET',
        headers: {
          'APCA-API-KEY-ID': this.config.apiKey,
          'APCA-API-SECRET-KEY': this.config.apiSecret,
          'Content-Type': 'application/json'
        },
        body: init.body === undefined ? undefined : JSON.stringify(init.body)
      });
    } catch (err) {
      throw new SourceUnavailableError(source, `request to ${url} failed`, { cause: err });
    }
    if (!resp.ok) {
      const text = await resp.text();
      throw new SourceUnavailableError(source, `${init.method ?? 'GET'} ${url} failed ${resp.status}: ${text}`);
    }
    const parsed = schema.safeParse(await resp.json());
    if (!parsed.success) {
      throw new SourceUnavailableError(source, `unexpected response from ${url}: ${parsed.error.issues[0]?.message}`);
    }
    return parsed.data;
  }

  listPositions(): Promise<AlpacaPosition[]> {
    return this.request(`${this.config.baseUrl}/v2/positions`, z.array(positionSchema));
  }

  listClosedOrders(after: Date, limit = 500): Promise<AlpacaOrder[]> {
    const url = new URL(`${this.config.baseUrl}/v2/orders`);
    url.searchParams.set('status', 'closed');
    url.searchParams.set('after', after.toISOString());
    url.searchParams.set('limit', String(limit));
    url.searchParams.set('direction', 'asc');
    return this.request(url.toString(), z.array(orderSchema));
  }

  async latestTradePrice(symbol: string): Promise<number> {
    const url = `${this.config.dataUrl}/v2/stocks/${encodeURIComponent(symbol)}/trades/latest`;
    const body = await this.request(url, latestTradeSchema);
    return body.trade.p;
  }

  submitOrder(order: AlpacaOrderRequest): Promise<AlpacaOrder> {
    return this.request(`${this.config.baseUrl}/v2/orders`, orderSchema, {
      method: 'POST',
      body: { ...order, type: 'market', time_in_force: 'day' }
    });
  }
}
