import * as crypto from 'crypto';
import { AxiosResponse, InternalAxiosRequestConfig } from 'axios';
import { BinanceClient, toTradingRule } from './binance-client';

type Route = (config: InternalAxiosRequestConfig) => unknown;

/**
 * Builds a client whose HTTP layer is an in-process axios adapter. Each
 * request is answered by the route whose prefix matches its URL.
 */
function clientWith(routes: Record<string, Route>, quoteAsset = 'USD') {
  const requests: InternalAxiosRequestConfig[] = [];
  const adapter = async (config: InternalAxiosRequestConfig): Promise<AxiosResponse> => {
    requests.push(config);
    const url = config.url ?? '';
    const prefix = Object.keys(routes)
      .filter((candidate) => url.startsWith(candidate))
      .sort((a, b) => b.length - a.length)[0];
    if (prefix === undefined) {
      throw new Error(`Unexpected request to ${url}`);
    }
    return { data: routes[prefix](config), status: 200, statusText: 'OK', headers: {}, config };
  };

  const client = new BinanceClient('test-key', 'test-secret', { adapter, quoteAsset });
  return { client, requests };
}

describe('toTradingRule', () => {
  it('translates the tagged filter list', () => {
    const rule = toTradingRule('BTC', [
      { filterType: 'PRICE_FILTER', minPrice: '0.01000000', maxPrice: '1000000.00000000', tickSize: '0.01000000' },
      { filterType: 'LOT_SIZE', minQty: '0.00001000', maxQty: '9000.00000000', stepSize: '0.00001000' },
      { filterType: 'MIN_NOTIONAL', minNotional: '10.00000000', applyToMarket: true },
      { filterType: 'MAX_NUM_ORDERS', maxNumOrders: 200 },
    ]);

    expect(rule).toEqual({
      symbol: 'BTC',
      tickSize: 0.01,
      minPrice: 0.01,
      maxPrice: 1000000,
      stepSize: 0.00001,
      minQty: 0.00001,
      maxQty: 9000,
      minNotional: 10,
    });
  });

  it('treats a zero maximum as no limit and a missing notional filter as zero', () => {
    const rule = toTradingRule('ADA', [
      { filterType: 'PRICE_FILTER', minPrice: '0.0001', maxPrice: '0.00000000', tickSize: '0.0001' },
      { filterType: 'LOT_SIZE', minQty: '0.1', maxQty: '0', stepSize: '0.1' },
    ]);

    expect(rule.maxPrice).toBe(Number.POSITIVE_INFINITY);
    expect(rule.maxQty).toBe(Number.POSITIVE_INFINITY);
    expect(rule.minNotional).toBe(0);
  });

  it('reads the newer NOTIONAL filter', () => {
    expect(toTradingRule('SOL', [{ filterType: 'NOTIONAL', minNotional: '5.0' }]).minNotional).toBe(5);
  });
});

describe('BinanceClient', () => {
  it('averages the best bids of the order book', async () => {
    const { client, requests } = clientWith({
      '/depth': () => ({ bids: [['100.50', '1.0'], ['99.50', '2.0']], asks: [] }),
    });

    await expect(client.getPrice('BTC')).resolves.toBe(100);
    expect(requests[0].params).toEqual({ symbol: 'BTCUSD', limit: 15 });
  });

  it('prices the quote asset at 1 without a request', async () => {
    const { client, requests } = clientWith({});

    await expect(client.getPrice('USD')).resolves.toBe(1);
    expect(requests).toHaveLength(0);
  });

  it('rejects an empty order book', async () => {
    const { client } = clientWith({ '/depth': () => ({ bids: [], asks: [] }) });

    await expect(client.getPrice('DOT')).rejects.toThrow('Order book for DOTUSD has no bids');
  });

  it('parses balances from a signed account request', async () => {
    const { client, requests } = clientWith({
      '/account': () => ({
        balances: [
          { asset: 'USD', free: '250.50', locked: '0.00' },
          { asset: 'BTC', free: '0.01', locked: '0.002' },
        ],
      }),
    });

    await expect(client.getBalances()).resolves.toEqual([
      { asset: 'USD', free: 250.5, locked: 0 },
      { asset: 'BTC', free: 0.01, locked: 0.002 },
    ]);
    expect(requests[0].url).toMatch(/^\/account\?timestamp=\d+&signature=[0-9a-f]{64}$/);
    expect(requests[0].headers.get('X-MBX-APIKEY')).toBe('test-key');
  });

  it('fetches the trading rule for the market symbol', async () => {
    const { client, requests } = clientWith({
      '/exchangeInfo': () => ({
        symbols: [
          {
            symbol: 'ETHUSDT',
            baseAsset: 'ETH',
            filters: [{ filterType: 'LOT_SIZE', minQty: '0.0001', maxQty: '100', stepSize: '0.0001' }],
          },
        ],
      }),
    }, 'USDT');

    const rule = await client.getTradingRule('ETH');

    expect(requests[0].params).toEqual({ symbol: 'ETHUSDT' });
    expect(rule.symbol).toBe('ETH');
    expect(rule.stepSize).toBe(0.0001);
    expect(rule.maxQty).toBe(100);
  });

  it('rejects when the exchange returns no info for the symbol', async () => {
    const { client } = clientWith({ '/exchangeInfo': () => ({ symbols: [] }) });

    await expect(client.getTradingRule('XYZ')).rejects.toThrow('No symbol info returned for XYZUSD');
  });

  it('sends a signed test order in test mode', async () => {
    const { client, requests } = clientWith({ '/order/test': () => ({}) });

    await expect(client.submitOrder({ symbol: 'BTC', quantity: 0.0001, price: 30000.5 }, 'test')).resolves.toEqual({});

    const request = requests[0];
    expect(request.method).toBe('post');
    const [path, query] = (request.url ?? '').split('?');
    expect(path).toBe('/order/test');

    const [unsigned, signature] = query.split('&signature=');
    expect(unsigned).toMatch(
      /^symbol=BTCUSD&side=BUY&type=LIMIT&timeInForce=GTC&quantity=0\.0001&price=30000\.5&timestamp=\d+$/
    );
    expect(signature).toBe(crypto.createHmac('sha256', 'test-secret').update(unsigned).digest('hex'));
  });

  it('writes quantities without exponent notation', async () => {
    const { client, requests } = clientWith({ '/order/test': () => ({}) });

    await client.submitOrder({ symbol: 'BTC', quantity: 0.0000001, price: 30000 }, 'test');

    expect(requests[0].url).toContain('quantity=0.0000001&');
  });

  it('places a real order in live mode', async () => {
    const { client, requests } = clientWith({
      '/order': () => ({ symbol: 'ETHUSD', orderId: 42, status: 'NEW' }),
      '/order/test': () => {
        throw new Error('test endpoint must not be used in live mode');
      },
    });

    await expect(client.submitOrder({ symbol: 'ETH', quantity: 0.5, price: 2000 }, 'live')).resolves.toEqual({
      symbol: 'ETHUSD',
      orderId: 42,
      status: 'NEW',
    });
    expect(requests[0].url).toMatch(/^\/order\?symbol=ETHUSD&/);
  });
});
