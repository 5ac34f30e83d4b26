import { BrokerTrade, OrderAck } from '../core/types';

export interface Broker {
  readonly name: string;
  /** symbol → quantity; symbols with no holding are omitted. */
  getPositions(): Promise<Record<string, number>>;
  getTradeHistory(since: Date): Promise<BrokerTrade[]>;
  getCurrentPrice(symbol: string): Promise<number>;
  /** Notional buy of `amount` dollars. */
  buy(symbol: string, amount: number): Promise<OrderAck>;
  sell(symbol: string, quantity: number): Promise<OrderAck>;
}
