import { BrokerTrade, OrderAck } from '../../core/types';
import { RebalanceError, errorMessage } from '../../core/errors';
import { normalizeSymbol, roundCents, roundTo } from '../../core/utils';
import { AlpacaClient, AlpacaOrder } from '../../integrations/alpacaClient';
import { Broker } from '../broker.types';

const REJECTED_STATUSES = new Set(['rejected', 'canceled', 'expired']);

const toAck = (order: AlpacaOrder): OrderAck =>
  REJECTED_STATUSES.has(order.status)
    ? { accepted: false, reason: `order ${order.id} ${order.status}` }
    : { accepted: true, orderId: order.id };

export const toBrokerTrade = (order: AlpacaOrder): BrokerTrade | undefined => {
  const quantity = Number(order.filled_qty ?? 0);
  const price = Number(order.filled_avg_price ?? 0);
  const timestamp = order.filled_at ?? order.submitted_at;
  if (!(quantity > 0) || !(price > 0) || !timestamp) return undefined;
  return {
    tradeId: order.id,
    symbol: normalizeSymbol(order.symbol),
    action: order.side === 'buy' ? 'BUY' : 'SELL',
    quantity,
    price,
    total: roundCents(quantity * price),
    timestamp
  };
};

export class AlpacaBroker implements Broker {
  readonly name = 'alpaca';

  constructor(private client: AlpacaClient, private quantityDecimals = 6) {}

  async getPositions(): Promise<Record<string, number>> {
    const positions = await this.client.listPositions();
    return positions.reduce<Record<string, number>>((acc, p) => {
      const qty = Number(p.qty);
      if (qty > 0) acc[normalizeSymbol(p.symbol)] = qty;
      return acc;
    }, {});
  }

  async getTradeHistory(since: Date): Promise<BrokerTrade[]> {
    const orders = await this.client.listClosedOrders(since);
    return orders.map(toBrokerTrade).filter((t): t is BrokerTrade => Boolean(t));
  }

  getCurrentPrice(symbol: string): Promise<number> {
    return this.client.latestTradePrice(normalizeSymbol(symbol));
  }

  async buy(symbol: string, amount: number): Promise<OrderAck> {
    return this.submit(symbol, { side: 'buy', notional: roundCents(amount).toFixed(2) });
  }

  async sell(symbol: string, quantity: number): Promise<OrderAck> {
    return this.submit(symbol, { side: 'sell', qty: String(roundTo(quantity, this.quantityDecimals)) });
  }

  // HTTP 4xx on an order is the broker declining it, not an outage.
  private async submit(symbol: string, order: { side: 'buy' | 'sell'; notional?: string; qty?: string }): Promise<OrderAck> {
    try {
      return toAck(await this.client.submitOrder({ symbol: normalizeSymbol(symbol), ...order }));
    } catch (err) {
      if (err instanceof RebalanceError && / failed 4\d\d:/.test(err.message)) {
        return { accepted: false, reason: errorMessage(err) };
      }
      throw err;
    }
  }
}
