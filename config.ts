import * as dotenv from 'dotenv';
import { AllocationSpec } from './allocation';
import { DEFAULT_BASE_URL } from './binance-client';
import { ConfigError } from './errors';

export interface BotConfig {
  apiKey: string;
  apiSecret: string;
  baseUrl: string;
  quoteAsset: string;
  /** Cents */
  investmentCap: number;
  /** Cents */
  cashReserve: number;
  requestTimeoutMs: number;
}

export const DEFAULT_ALLOCATION = AllocationSpec.build([
  {
    name: 'Large Cap',
    assets: [
      { symbol: 'ETH', weight: 0.23 },
      { symbol: 'BTC', weight: 0.18 },
      { symbol: 'ADA', weight: 0.14 },
      { symbol: 'SOL', weight: 0.05 },
    ],
  },
  {
    name: 'Mid Cap',
    assets: [
      { symbol: 'LINK', weight: 0.13 },
      { symbol: 'MATIC', weight: 0.13 },
      { symbol: 'UNI', weight: 0.09 },
      { symbol: 'DOT', weight: 0.05 },
    ],
  },
  {
    name: 'Other',
    assets: [{ symbol: 'BNB', weight: 0 }],
  },
]).verify();

type Env = Record<string, string | undefined>;

function required(env: Env, name: string): string {
  const value = env[name];
  if (!value) {
    throw new ConfigError(`Please set the ${name} environment variable`);
  }
  return value;
}

function nonNegativeNumber(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw === '') {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isFinite(value) || value < 0) {
    throw new ConfigError(`${name} must be a non-negative number, got "${raw}"`);
  }
  return value;
}

export function loadConfig(env: Env = process.env): BotConfig {
  return {
    apiKey: required(env, 'BINANCE_API_KEY'),
    apiSecret: required(env, 'BINANCE_API_SECRET'),
    baseUrl: env.BINANCE_BASE_URL || DEFAULT_BASE_URL,
    quoteAsset: env.QUOTE_ASSET || 'USD',
    investmentCap: Math.round(nonNegativeNumber(env, 'INVESTMENT_AMOUNT', 200) * 100),
    cashReserve: Math.round(nonNegativeNumber(env, 'CASH_RESERVE', 10) * 100),
    requestTimeoutMs: nonNegativeNumber(env, 'REQUEST_TIMEOUT_MS', 10000),
  };
}

export function loadEnvFile(): void {
  dotenv.config();
}
