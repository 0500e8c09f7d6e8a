import { isAxiosError } from 'axios';
import { ErrorCategory } from './types';

export class InvalidAllocationError extends Error {
  constructor(
    message: string,
    public readonly sum: number,
    public readonly tolerance: number
  ) {
    super(message);
    this.name = 'InvalidAllocationError';
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * A required balance, price or trading rule lookup failed. The run stops
 * before any order is placed.
 */
export class FetchError extends Error {
  constructor(
    public readonly symbol: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(`Failed to fetch ${symbol}: ${message}`, options);
    this.name = 'FetchError';
  }
}

export class OrderSubmissionError extends Error {
  constructor(
    public readonly symbol: string,
    public readonly category: ErrorCategory,
    public readonly code: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'OrderSubmissionError';
  }
}

const HTTP_STATUS_CATEGORIES: Partial<Record<number, ErrorCategory>> = {
  400: 'INVALID_REQUEST',
  401: 'FATAL',
  403: 'FATAL',
  418: 'RATE_LIMITED',
  429: 'RATE_LIMITED',
};

/**
 * Binance error codes
 */
const EXCHANGE_ERROR_CODES: Partial<Record<string, ErrorCategory>> = {
  '-1000': 'EXCHANGE_ERROR', // Unknown error
  '-1001': 'RETRYABLE', // Disconnected
  '-1002': 'FATAL', // Unauthorized
  '-1003': 'RATE_LIMITED', // Too many requests
  '-1007': 'RETRYABLE', // Timeout
  '-1013': 'INVALID_REQUEST', // Filter failure
  '-1015': 'RATE_LIMITED', // Too many orders
  '-1021': 'RETRYABLE', // Timestamp outside recv window
  '-1121': 'INVALID_REQUEST', // Invalid symbol
  '-2010': 'INVALID_REQUEST', // New order rejected
  '-2014': 'FATAL', // API key format invalid
  '-2015': 'FATAL', // Invalid API key, IP, or permissions
};

const ERROR_MESSAGE_PATTERNS: Array<{ pattern: RegExp; category: ErrorCategory }> = [
  { pattern: /timeout|timed out/i, category: 'RETRYABLE' },
  { pattern: /network|econnreset|econnrefused|enotfound|socket hang up/i, category: 'RETRYABLE' },
  { pattern: /rate limit|too many requests/i, category: 'RATE_LIMITED' },
  { pattern: /unauthorized|forbidden|invalid api key|signature/i, category: 'FATAL' },
  { pattern: /insufficient balance|invalid.*request|bad request/i, category: 'INVALID_REQUEST' },
];

interface ExchangeErrorBody {
  code: number;
  msg: string;
}

function isExchangeErrorBody(data: unknown): data is ExchangeErrorBody {
  return (
    typeof data === 'object' &&
    data !== null &&
    'code' in data &&
    'msg' in data &&
    typeof data.code === 'number' &&
    typeof data.msg === 'string'
  );
}

function categorizeMessage(message: string): ErrorCategory {
  const match = ERROR_MESSAGE_PATTERNS.find(({ pattern }) => pattern.test(message));
  return match ? match.category : 'EXCHANGE_ERROR';
}

/**
 * Turns whatever a remote order call threw into an OrderSubmissionError.
 * The exchange's own error code wins over the HTTP status, which wins over
 * the message text.
 */
export function classifyError(symbol: string, error: unknown): OrderSubmissionError {
  if (error instanceof OrderSubmissionError) {
    return error;
  }

  if (isAxiosError(error)) {
    const data: unknown = error.response?.data;
    if (isExchangeErrorBody(data)) {
      const code = String(data.code);
      const category =
        EXCHANGE_ERROR_CODES[code] ??
        (error.response ? HTTP_STATUS_CATEGORIES[error.response.status] : undefined) ??
        categorizeMessage(data.msg);
      return new OrderSubmissionError(symbol, category, code, data.msg, { cause: error });
    }

    const status = error.response?.status;
    if (status !== undefined) {
      const category =
        HTTP_STATUS_CATEGORIES[status] ?? (status >= 500 ? 'RETRYABLE' : categorizeMessage(error.message));
      return new OrderSubmissionError(symbol, category, `HTTP_${status}`, error.message, {
        cause: error,
      });
    }

    const code = error.code ?? 'NETWORK_ERROR';
    return new OrderSubmissionError(symbol, 'RETRYABLE', code, error.message, { cause: error });
  }

  const message = errorMessage(error);
  return new OrderSubmissionError(symbol, categorizeMessage(message), 'UNKNOWN', message, {
    cause: error,
  });
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
