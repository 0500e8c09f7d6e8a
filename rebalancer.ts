import { AllocationSpec } from './allocation';
import { FetchError, errorMessage } from './errors';
import { executeOrders } from './order-executor';
import { validateOrder } from './order-validator';
import { balancePortfolio } from './portfolio-balancer';
import { aggregateResults } from './result-aggregator';
import {
  AssetPosition,
  Balance,
  BatchReport,
  ExchangeClient,
  Logger,
  OrderRequest,
  OrderResult,
  PriceSource,
  RejectedResult,
  SubmissionMode,
  TradingRule,
} from './types';

/**
 * Everything one run needs. Fixed before any remote call is made and
 * never changed afterwards.
 */
export interface RunContext {
  readonly exchange: ExchangeClient;
  readonly priceSource: PriceSource;
  readonly mode: SubmissionMode;
  readonly spec: AllocationSpec;
  readonly quoteAsset: string;
  /** Cents */
  readonly investmentCap: number;
  /** Cents */
  readonly cashReserve: number;
  readonly logger: Logger;
}

export interface MarketData {
  balances: Balance[];
  prices: Map<string, number>;
  rules: Map<string, TradingRule>;
}

export interface RebalanceDependencies {
  exchange: ExchangeClient;
  prices: ReadonlyMap<string, number>;
  rules: ReadonlyMap<string, TradingRule>;
  logger?: Logger;
}

async function fetchOrFail<T>(symbol: string, request: () => Promise<T>): Promise<T> {
  try {
    return await request();
  } catch (error) {
    throw new FetchError(symbol, errorMessage(error), { cause: error });
  }
}

/**
 * Fetches balances, prices and trading rules for every spec symbol
 * concurrently. The first failed lookup rejects with a FetchError.
 */
export async function fetchMarketData(context: RunContext): Promise<MarketData> {
  const symbols = context.spec.listSymbols();

  const [balances, priceList, ruleList] = await Promise.all([
    fetchOrFail('balances', () => context.exchange.getBalances()),
    Promise.all(
      symbols.map((symbol) =>
        fetchOrFail(symbol, async () => {
          const price = await context.priceSource.getPrice(symbol);
          if (!Number.isFinite(price) || price <= 0) {
            throw new Error(`invalid price ${price}`);
          }
          return price;
        })
      )
    ),
    Promise.all(symbols.map((symbol) => fetchOrFail(symbol, () => context.exchange.getTradingRule(symbol)))),
  ]);

  return {
    balances,
    prices: new Map(symbols.map((symbol, idx) => [symbol, priceList[idx]])),
    rules: new Map(symbols.map((symbol, idx) => [symbol, ruleList[idx]])),
  };
}

/**
 * One position per spec symbol, valued in cents at the fetched price.
 * Symbols with no balance are tracked with a quantity of 0.
 */
export function buildPositions(
  spec: AllocationSpec,
  balances: readonly Balance[],
  prices: ReadonlyMap<string, number>
): AssetPosition[] {
  const held = new Map<string, number>();
  for (const balance of balances) {
    held.set(balance.asset, (held.get(balance.asset) ?? 0) + balance.free + balance.locked);
  }

  return spec.listSymbols().map((symbol) => {
    const quantity = held.get(symbol) ?? 0;
    const price = prices.get(symbol) ?? 0;
    return {
      symbol,
      quantity,
      currentValue: Math.round(quantity * price * 100),
      amountToInvest: 0,
    };
  });
}

/**
 * Cash available to this run in cents: the quote balance minus the reserve,
 * capped at `cap`, never negative.
 */
export function getInvestableCash(quoteBalance: number, cap: number, reserve: number): number {
  return Math.max(0, Math.min(cap, quoteBalance - reserve));
}

export function quoteBalanceOf(balances: readonly Balance[], quoteAsset: string): number {
  return balances
    .filter((balance) => balance.asset === quoteAsset)
    .reduce((sum, balance) => sum + Math.round((balance.free + balance.locked) * 100), 0);
}

type PlannedOrder = { rejection: RejectedResult } | { order: OrderRequest };

/**
 * Balances `investableCash` over the positions, validates each resulting buy
 * against its trading rule and submits the valid ones concurrently.
 *
 * Throws FetchError before submitting anything when a symbol to be bought
 * has no usable price or no trading rule.
 */
export async function rebalance(
  positions: readonly AssetPosition[],
  spec: AllocationSpec,
  investableCash: number,
  mode: SubmissionMode,
  deps: RebalanceDependencies
): Promise<BatchReport> {
  const logger = deps.logger ?? console;
  const balanced = balancePortfolio(positions, spec, investableCash);

  const planned: PlannedOrder[] = [];
  for (const position of balanced) {
    if (position.amountToInvest <= 0) {
      continue;
    }

    const price = deps.prices.get(position.symbol);
    const rule = deps.rules.get(position.symbol);
    if (price === undefined || rule === undefined) {
      throw new FetchError(position.symbol, 'missing price or trading rule');
    }
    if (!Number.isFinite(price) || price <= 0) {
      throw new FetchError(position.symbol, `invalid price ${price}`);
    }

    const outcome = validateOrder(position, price, rule);
    if (outcome.valid) {
      planned.push({ order: outcome.order });
    } else {
      logger.log(`*!* Could not submit ${position.symbol} order: ${outcome.rejection.detail} *!*`);
      planned.push({ rejection: outcome.rejection });
    }
  }

  const orders = planned.flatMap((plan) => ('order' in plan ? [plan.order] : []));
  const executed = await executeOrders(deps.exchange, orders, mode);

  let next = 0;
  const results: OrderResult[] = planned.map((plan) => ('rejection' in plan ? plan.rejection : executed[next++]));

  return aggregateResults(results);
}
