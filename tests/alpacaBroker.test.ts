import { AlpacaBroker, getBroker } from '../src/broker/broker';
import { ConfigurationError, SourceUnavailableError } from '../src/core/errors';
import { AlpacaClient } from '../src/integrations/alpacaClient';
import { makeConfig } from './fixtures';

const json = (body: unknown, status = 200) =>
  new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });

const broker = () => new AlpacaBroker(new AlpacaClient({ apiKey: 'test-key', apiSecret: 'test-secret' }), 6);

const mockFetch = (respond: () => Response) => jest.spyOn(global, 'fetch').mockImplementation(async () => respond());

describe('AlpacaBroker', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('reads open positions with the API key headers', async () => {
    const fetchMock = mockFetch(() => json([{ symbol: 'tsla', qty: '4.5' }, { symbol: 'NVDA', qty: '0' }]));

    await expect(broker().getPositions()).resolves.toEqual({ TSLA: 4.5 });

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('https://paper-api.alpaca.markets/v2/positions');
    expect(init?.headers).toMatchObject({ 'APCA-API-KEY-ID': 'test-key', 'APCA-API-SECRET-KEY': 'test-secret' });
  });

  it('buys by notional and sells by rounded quantity', async () => {
    const fetchMock = mockFetch(() => json({ id: 'o1', symbol: 'FIX', side: 'buy', status: 'accepted' }));

    await expect(broker().buy('fix', 1500)).resolves.toEqual({ accepted: true, orderId: 'o1' });
    await broker().sell('FIX', 1 / 3);

    expect(JSON.parse(String(fetchMock.mock.calls[0][1]?.body))).toEqual({
      symbol: 'FIX',
      side: 'buy',
      notional: '1500.00',
      type: 'market',
      time_in_force: 'day'
    });
    expect(JSON.parse(String(fetchMock.mock.calls[1][1]?.body))).toMatchObject({ side: 'sell', qty: '0.333333' });
  });

  it('turns a declined order into a rejection', async () => {
    mockFetch(() => new Response('insufficient buying power', { status: 422 }));

    await expect(broker().buy('FIX', 1500)).resolves.toEqual({
      accepted: false,
      reason: 'alpaca: POST https://paper-api.alpaca.markets/v2/orders failed 422: insufficient buying power'
    });
  });

  it('reports a rejected order status', async () => {
    mockFetch(() => json({ id: 'o2', symbol: 'FIX', side: 'buy', status: 'rejected' }));

    await expect(broker().buy('FIX', 1500)).resolves.toEqual({ accepted: false, reason: 'order o2 rejected' });
  });

  it('raises an outage as SourceUnavailableError', async () => {
    mockFetch(() => new Response('maintenance', { status: 503 }));

    await expect(broker().buy('FIX', 1500)).rejects.toBeInstanceOf(SourceUnavailableError);
  });

  it('maps filled orders to broker trades', async () => {
    const fetchMock = mockFetch(() =>
      json([
        {
          id: 'o1',
          symbol: 'FIX',
          side: 'buy',
          status: 'filled',
          filled_qty: '2',
          filled_avg_price: '750.5',
          filled_at: '2026-01-05T14:31:00Z',
          submitted_at: '2026-01-05T14:30:00Z'
        },
        { id: 'o2', symbol: 'EME', side: 'sell', status: 'canceled', filled_qty: '0', filled_avg_price: null }
      ])
    );

    await expect(broker().getTradeHistory(new Date('2025-12-29T14:30:00Z'))).resolves.toEqual([
      {
        tradeId: 'o1',
        symbol: 'FIX',
        action: 'BUY',
        quantity: 2,
        price: 750.5,
        total: 1501,
        timestamp: '2026-01-05T14:31:00Z'
      }
    ]);
    const url = new URL(String(fetchMock.mock.calls[0][0]));
    expect(url.searchParams.get('status')).toBe('closed');
    expect(url.searchParams.get('after')).toBe('2025-12-29T14:30:00.000Z');
  });

  it('quotes the latest trade price from the data API', async () => {
    const fetchMock = mockFetch(() => json({ trade: { p: 123.45 } }));

    await expect(broker().getCurrentPrice('nvda')).resolves.toBe(123.45);
    expect(fetchMock.mock.calls[0][0]).toBe('https://data.alpaca.markets/v2/stocks/NVDA/trades/latest');
  });
});

describe('getBroker', () => {
  it('requires API keys for the alpaca provider', () => {
    expect(() => getBroker(makeConfig({ brokerProvider: 'alpaca' }), {})).toThrow(ConfigurationError);
  });

  it('wraps the configured broker with timeouts', () => {
    expect(getBroker(makeConfig(), {}).name).toBe('stub');
    expect(getBroker(makeConfig({ brokerProvider: 'alpaca' }), { ALPACA_API_KEY: 'test-key', ALPACA_API_SECRET: 'test-secret' }).name).toBe(
      'alpaca'
    );
  });
});
