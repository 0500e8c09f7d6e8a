import { AllocationSpec } from './allocation';
import { BinanceClient } from './binance-client';
import { BotConfig } from './config';
import { summarizeCategories } from './portfolio-balancer';
import {
  RunContext,
  buildPositions,
  fetchMarketData,
  getInvestableCash,
  quoteBalanceOf,
  rebalance,
} from './rebalancer';
import { formatCategories, formatReport } from './result-aggregator';
import {
  AssetPosition,
  BatchReport,
  CategorySummary,
  ExchangeClient,
  Logger,
  PriceSource,
  SubmissionMode,
} from './types';

export interface RunSummary {
  investableCash: number;
  report: BatchReport;
  categories: CategorySummary[];
  runtimeMs: number;
}

/**
 * Sets each position's `amountToInvest` to what its successful order spent,
 * in cents. Rejected and failed orders add nothing.
 */
export function withFilledOrders(positions: readonly AssetPosition[], report: BatchReport): AssetPosition[] {
  const spent = new Map<string, number>();
  for (const result of report.results) {
    if (result.outcome === 'SUCCESS') {
      spent.set(result.symbol, (spent.get(result.symbol) ?? 0) + Math.round(result.notional * 100));
    }
  }
  return positions.map((position) => ({ ...position, amountToInvest: spent.get(position.symbol) ?? 0 }));
}

export class RebalanceBot {
  private context: RunContext;

  constructor(context: RunContext) {
    this.context = Object.freeze({ ...context });
  }

  static fromConfig(
    config: BotConfig,
    spec: AllocationSpec,
    mode: SubmissionMode,
    options: { priceSource?: PriceSource; logger?: Logger } = {}
  ): RebalanceBot {
    const exchange: ExchangeClient = new BinanceClient(config.apiKey, config.apiSecret, {
      baseUrl: config.baseUrl,
      quoteAsset: config.quoteAsset,
      timeoutMs: config.requestTimeoutMs,
    });

    return new RebalanceBot({
      exchange,
      priceSource: options.priceSource ?? exchange,
      mode,
      spec,
      quoteAsset: config.quoteAsset,
      investmentCap: config.investmentCap,
      cashReserve: config.cashReserve,
      logger: options.logger ?? console,
    });
  }

  async run(): Promise<RunSummary> {
    const { logger, spec, mode } = this.context;
    const start = Date.now();

    logger.log(`Starting ${mode} rebalance for symbols: ${spec.listSymbols().join(', ')}`);

    const market = await fetchMarketData(this.context);
    const positions = buildPositions(spec, market.balances, market.prices);
    const investableCash = getInvestableCash(
      quoteBalanceOf(market.balances, this.context.quoteAsset),
      this.context.investmentCap,
      this.context.cashReserve
    );
    logger.log(`Investing $${(investableCash / 100).toFixed(2)} ${this.context.quoteAsset}`);

    const report = await rebalance(positions, spec, investableCash, mode, {
      exchange: this.context.exchange,
      prices: market.prices,
      rules: market.rules,
      logger,
    });

    for (const line of formatReport(report)) {
      logger.log(line);
    }
    for (const result of report.results) {
      if (result.outcome === 'FAILED') {
        logger.error(`Order for ${result.symbol} failed: ${result.reason}`);
      }
    }

    const categories = summarizeCategories(spec, withFilledOrders(positions, report));
    for (const line of formatCategories(categories)) {
      logger.log(line);
    }

    const runtimeMs = Date.now() - start;
    logger.log(`Runtime: ${(runtimeMs / 1000).toFixed(4)} seconds`);

    return { investableCash, report, categories, runtimeMs };
  }
}
