import * as fc from 'fast-check';
import { AllocationSpec } from './allocation';
import {
  Balance,
  ExchangeClient,
  OrderRequest,
  OrderResponse,
  SubmissionMode,
  TradingRule,
} from './types';

/**
 * In-process stand-in for the exchange. Prices and rules are looked up by
 * asset symbol; a missing entry rejects the way a failed remote call would.
 */
export class FakeExchange implements ExchangeClient {
  balances: Balance[] = [];
  prices = new Map<string, number>();
  rules = new Map<string, TradingRule>();
  submitted: Array<{ order: OrderRequest; mode: SubmissionMode }> = [];
  failingSymbols = new Set<string>();

  async getBalances(): Promise<Balance[]> {
    return this.balances;
  }

  async getPrice(symbol: string): Promise<number> {
    const price = this.prices.get(symbol);
    if (price === undefined) {
      throw new Error(`Request failed for ${symbol}`);
    }
    return price;
  }

  async getTradingRule(symbol: string): Promise<TradingRule> {
    const rule = this.rules.get(symbol);
    if (!rule) {
      throw new Error(`No symbol info returned for ${symbol}`);
    }
    return rule;
  }

  async submitOrder(order: OrderRequest, mode: SubmissionMode): Promise<OrderResponse> {
    this.submitted.push({ order, mode });
    if (this.failingSymbols.has(order.symbol)) {
      throw new Error('Account has insufficient balance for requested action.');
    }
    return { symbol: order.symbol, status: mode === 'test' ? 'TEST' : 'NEW' };
  }
}

export function permissiveRule(symbol: string, overrides: Partial<TradingRule> = {}): TradingRule {
  return {
    symbol,
    tickSize: 0.01,
    minPrice: 0.01,
    maxPrice: 1000000,
    stepSize: 0.001,
    minQty: 0.001,
    maxQty: 100000,
    minNotional: 1,
    ...overrides,
  };
}

export function twoAssetSpec(first = 0.6, second = 0.4): AllocationSpec {
  return AllocationSpec.build([
    { name: 'Core', assets: [{ symbol: 'BTC', weight: first }] },
    { name: 'Satellite', assets: [{ symbol: 'ETH', weight: second }] },
  ]).verify();
}

/**
 * Generator for a verified spec built from integer parts normalized to 1.
 */
export const allocationSpecArb = (): fc.Arbitrary<AllocationSpec> =>
  fc
    .array(fc.integer({ min: 0, max: 1000 }), { minLength: 1, maxLength: 8 })
    .filter((parts) => parts.some((part) => part > 0))
    .map((parts) => {
      const total = parts.reduce((sum, part) => sum + part, 0);
      return AllocationSpec.build([
        {
          name: 'Generated',
          assets: parts.map((part, idx) => ({ symbol: `COIN${idx}`, weight: part / total })),
        },
      ]).verify();
    });
