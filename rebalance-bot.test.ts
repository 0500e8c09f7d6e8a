import { loadConfig } from './config';
import { FetchError } from './errors';
import { RebalanceBot } from './rebalance-bot';
import { FakeExchange, permissiveRule, twoAssetSpec } from './test-fakes';

function setup() {
  const exchange = new FakeExchange();
  exchange.balances = [{ asset: 'USD', free: 150, locked: 0 }];
  exchange.prices.set('BTC', 10).set('ETH', 35);
  exchange.rules.set('BTC', permissiveRule('BTC')).set('ETH', permissiveRule('ETH'));

  const logger = { log: jest.fn(), error: jest.fn() };
  const bot = new RebalanceBot({
    exchange,
    priceSource: exchange,
    mode: 'test',
    spec: twoAssetSpec(0.5, 0.5),
    quoteAsset: 'USD',
    investmentCap: 20000,
    cashReserve: 1000,
    logger,
  });
  return { exchange, logger, bot };
}

describe('RebalanceBot', () => {
  it('invests the quote balance less the reserve', async () => {
    const { exchange, logger, bot } = setup();

    const summary = await bot.run();

    expect(summary.investableCash).toBe(14000);
    expect(exchange.submitted).toEqual([
      { order: { symbol: 'BTC', quantity: 7, price: 10 }, mode: 'test' },
      { order: { symbol: 'ETH', quantity: 2, price: 35 }, mode: 'test' },
    ]);
    expect(summary.report.totalNotionalSpent).toBe(140);
    expect(logger.log).toHaveBeenCalledWith('Investing $140.00 USD');
    expect(logger.log).toHaveBeenCalledWith('Orders: 2 succeeded, 0 failed, 0 rejected');
    expect(logger.log).toHaveBeenCalledWith('Cash spent: $140.000');
  });

  it('summarizes categories after investing', async () => {
    const { logger, bot } = setup();

    const summary = await bot.run();

    expect(summary.categories).toEqual([
      { name: 'Core', targetWeight: 0.5, currentValue: 0, projectedValue: 7000, projectedWeight: 0.5 },
      { name: 'Satellite', targetWeight: 0.5, currentValue: 0, projectedValue: 7000, projectedWeight: 0.5 },
    ]);
    expect(logger.log).toHaveBeenCalledWith('Core: $0.00 -> $70.00 (50.00% of target 50.00%)');
  });

  it('logs failed orders as errors and still reports the batch', async () => {
    const { exchange, logger, bot } = setup();
    exchange.failingSymbols.add('BTC');

    const summary = await bot.run();

    expect(summary.report.failedCount).toBe(1);
    expect(summary.report.successCount).toBe(1);
    expect(logger.error).toHaveBeenCalledWith(
      'Order for BTC failed: Account has insufficient balance for requested action.'
    );
  });

  it('projects only what successful orders spent', async () => {
    const { exchange, logger, bot } = setup();
    exchange.failingSymbols.add('BTC');

    const summary = await bot.run();

    expect(summary.categories).toEqual([
      { name: 'Core', targetWeight: 0.5, currentValue: 0, projectedValue: 0, projectedWeight: 0 },
      { name: 'Satellite', targetWeight: 0.5, currentValue: 0, projectedValue: 7000, projectedWeight: 1 },
    ]);
    expect(logger.log).toHaveBeenCalledWith('Core: $0.00 -> $0.00 (0.00% of target 50.00%)');
  });

  it('aborts before placing any order when a lookup fails', async () => {
    const { exchange, bot } = setup();
    exchange.prices.delete('ETH');

    await expect(bot.run()).rejects.toBeInstanceOf(FetchError);
    expect(exchange.submitted).toEqual([]);
  });

  it('builds a Binance-backed bot from configuration', () => {
    const config = loadConfig({ BINANCE_API_KEY: 'test-key', BINANCE_API_SECRET: 'test-secret' });

    expect(RebalanceBot.fromConfig(config, twoAssetSpec(), 'test')).toBeInstanceOf(RebalanceBot);
  });
});
