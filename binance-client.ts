import axios, { AxiosAdapter, AxiosInstance } from 'axios';
import * as crypto from 'crypto';
import Decimal from 'decimal.js';
import {
  Balance,
  ExchangeClient,
  OrderRequest,
  OrderResponse,
  SubmissionMode,
  TradingRule,
} from './types';

export const DEFAULT_BASE_URL = 'https://api.binance.us/api/v3';
const ORDER_BOOK_DEPTH = 15;

export interface BinanceClientOptions {
  baseUrl?: string;
  quoteAsset?: string;
  timeoutMs?: number;
  adapter?: AxiosAdapter;
}

interface RawBalance {
  asset: string;
  free: string;
  locked: string;
}

export interface RawFilter {
  filterType: string;
  [field: string]: unknown;
}

interface RawSymbolInfo {
  symbol: string;
  baseAsset: string;
  filters: RawFilter[];
}

function parseNumber(value: unknown, fallback: number): number {
  if (typeof value !== 'string' && typeof value !== 'number') {
    return fallback;
  }
  const parsed = typeof value === 'number' ? value : parseFloat(value);
  return Number.isFinite(parsed) ? parsed : fallback;
}

/** A maximum of 0 means the exchange disabled that bound. */
function parseMaximum(value: unknown): number {
  const parsed = parseNumber(value, 0);
  return parsed > 0 ? parsed : Number.POSITIVE_INFINITY;
}

/**
 * Translates the exchange's tagged filter list into a TradingRule.
 * Filters other than PRICE_FILTER, LOT_SIZE and MIN_NOTIONAL / NOTIONAL are
 * ignored.
 */
export function toTradingRule(symbol: string, filters: RawFilter[]): TradingRule {
  const rule: TradingRule = {
    symbol,
    tickSize: 0,
    minPrice: 0,
    maxPrice: Number.POSITIVE_INFINITY,
    stepSize: 0,
    minQty: 0,
    maxQty: Number.POSITIVE_INFINITY,
    minNotional: 0,
  };

  for (const filter of filters) {
    switch (filter.filterType) {
      case 'PRICE_FILTER':
        rule.tickSize = parseNumber(filter.tickSize, 0);
        rule.minPrice = parseNumber(filter.minPrice, 0);
        rule.maxPrice = parseMaximum(filter.maxPrice);
        break;
      case 'LOT_SIZE':
        rule.stepSize = parseNumber(filter.stepSize, 0);
        rule.minQty = parseNumber(filter.minQty, 0);
        rule.maxQty = parseMaximum(filter.maxQty);
        break;
      case 'MIN_NOTIONAL':
      case 'NOTIONAL':
        rule.minNotional = parseNumber(filter.minNotional, 0);
        break;
    }
  }

  return rule;
}

export class BinanceClient implements ExchangeClient {
  private client: AxiosInstance;
  private apiSecret: string;
  private quoteAsset: string;

  constructor(apiKey: string, apiSecret: string, options: BinanceClientOptions = {}) {
    this.apiSecret = apiSecret;
    this.quoteAsset = options.quoteAsset ?? 'USD';

    this.client = axios.create({
      baseURL: options.baseUrl ?? DEFAULT_BASE_URL,
      timeout: options.timeoutMs ?? 10000,
      headers: {
        'X-MBX-APIKEY': apiKey,
      },
      adapter: options.adapter,
    });
  }

  marketSymbol(asset: string): string {
    return `${asset}${this.quoteAsset}`;
  }

  async getBalances(): Promise<Balance[]> {
    const query = this.sign({ timestamp: Date.now() });
    const response = await this.client.get<{ balances: RawBalance[] }>(`/account?${query}`);

    return response.data.balances.map((balance) => ({
      asset: balance.asset,
      free: parseFloat(balance.free),
      locked: parseFloat(balance.locked),
    }));
  }

  /**
   * Mean of the best bids on the order book. The quote asset itself is
   * priced at 1.
   */
  async getPrice(asset: string): Promise<number> {
    if (asset === this.quoteAsset) {
      return 1;
    }

    const response = await this.client.get<{ bids: [string, string][] }>('/depth', {
      params: { symbol: this.marketSymbol(asset), limit: ORDER_BOOK_DEPTH },
    });
    const bids = response.data.bids.map((bid) => parseFloat(bid[0]));
    if (bids.length === 0) {
      throw new Error(`Order book for ${this.marketSymbol(asset)} has no bids`);
    }
    return bids.reduce((sum, bid) => sum + bid, 0) / bids.length;
  }

  async getTradingRule(asset: string): Promise<TradingRule> {
    const symbol = this.marketSymbol(asset);
    const response = await this.client.get<{ symbols: RawSymbolInfo[] }>('/exchangeInfo', {
      params: { symbol },
    });
    const info = response.data.symbols.find((s) => s.symbol === symbol);
    if (!info) {
      throw new Error(`No symbol info returned for ${symbol}`);
    }
    return toTradingRule(asset, info.filters);
  }

  async submitOrder(order: OrderRequest, mode: SubmissionMode): Promise<OrderResponse> {
    const query = this.sign({
      symbol: this.marketSymbol(order.symbol),
      side: 'BUY',
      type: 'LIMIT',
      timeInForce: 'GTC',
      quantity: new Decimal(order.quantity).toFixed(),
      price: new Decimal(order.price).toFixed(),
      timestamp: Date.now(),
    });
    const path = mode === 'live' ? '/order' : '/order/test';

    const response = await this.client.post<OrderResponse>(`${path}?${query}`);
    return response.data;
  }

  private sign(params: Record<string, string | number>): string {
    const queryString = Object.keys(params)
      .map((key) => `${key}=${encodeURIComponent(params[key])}`)
      .join('&');
    const signature = crypto
      .createHmac('sha256', this.apiSecret)
      .update(queryString)
      .digest('hex');
    return `${queryString}&signature=${signature}`;
  }
}
