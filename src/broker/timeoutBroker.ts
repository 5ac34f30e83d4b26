import { withTimeout } from '../core/utils';
import { Broker } from './broker.types';

/** Every call races a timer; a timeout surfaces as SourceUnavailableError. */
export const withTimeouts = (broker: Broker, ms: number): Broker => ({
  name: broker.name,
  getPositions: () => withTimeout(broker.getPositions(), ms, `${broker.name} broker getPositions`),
  getTradeHistory: (since) => withTimeout(broker.getTradeHistory(since), ms, `${broker.name} broker getTradeHistory`),
  getCurrentPrice: (symbol) => withTimeout(broker.getCurrentPrice(symbol), ms, `${broker.name} broker getCurrentPrice(${symbol})`),
  buy: (symbol, amount) => withTimeout(broker.buy(symbol, amount), ms, `${broker.name} broker buy(${symbol})`),
  sell: (symbol, quantity) => withTimeout(broker.sell(symbol, quantity), ms, `${broker.name} broker sell(${symbol})`)
});
