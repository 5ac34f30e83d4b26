import path from 'path';
import { BotConfig } from '../core/types';
import { ConfigurationError } from '../core/errors';
import { AlpacaClient } from '../integrations/alpacaClient';
import { AlpacaBroker } from './alpaca/alpacaBroker';
import { StubBroker } from './broker.stub';
import { Broker } from './broker.types';
import { withTimeouts } from './timeoutBroker';

export const getBroker = (config: BotConfig, env: NodeJS.ProcessEnv = process.env): Broker => {
  if (config.brokerProvider === 'alpaca') {
    const apiKey = env.ALPACA_API_KEY;
    const apiSecret = env.ALPACA_API_SECRET;
    if (!apiKey || !apiSecret) {
      throw new ConfigurationError('BROKER_PROVIDER=alpaca requires ALPACA_API_KEY and ALPACA_API_SECRET');
    }
    const client = new AlpacaClient({ apiKey, apiSecret, baseUrl: env.ALPACA_BASE_URL, dataUrl: env.ALPACA_DATA_URL });
    return withTimeouts(new AlpacaBroker(client, config.quantityDecimals), config.brokerTimeoutMs);
  }
  const stub = config.stubBrokerFile
    ? StubBroker.fromFile(path.resolve(config.stubBrokerFile), { syntheticPrices: true })
    : new StubBroker({}, { syntheticPrices: true });
  return withTimeouts(stub, config.brokerTimeoutMs);
};

export { StubBroker, AlpacaBroker, withTimeouts };
export type { Broker };
