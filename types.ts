export interface AllocationAsset {
  symbol: string;
  weight: number;
}

export interface AllocationCategory {
  name: string;
  assets: AllocationAsset[];
}

export interface Balance {
  asset: string;
  free: number;
  locked: number;
}

/** Money fields are integer cents. */
export interface AssetPosition {
  symbol: string;
  quantity: number;
  currentValue: number;
  amountToInvest: number;
}

export interface TradingRule {
  symbol: string;
  tickSize: number;
  minPrice: number;
  maxPrice: number;
  stepSize: number;
  minQty: number;
  maxQty: number;
  minNotional: number;
}

export type SubmissionMode = 'test' | 'live';

export interface OrderRequest {
  symbol: string;
  quantity: number;
  price: number;
}

export type OrderResponse = Record<string, unknown>;

export type RejectionReason =
  | 'price below minimum'
  | 'price above maximum'
  | 'quantity below minimum'
  | 'quantity above maximum'
  | 'notional below minimum';

export type ErrorCategory =
  | 'RETRYABLE'
  | 'RATE_LIMITED'
  | 'INVALID_REQUEST'
  | 'EXCHANGE_ERROR'
  | 'FATAL';

interface OrderResultBase {
  symbol: string;
  quantity: number;
  price: number;
  notional: number;
}

export interface SuccessResult extends OrderResultBase {
  outcome: 'SUCCESS';
  response: OrderResponse;
  message: string;
}

export interface RejectedResult extends OrderResultBase {
  outcome: 'REJECTED';
  reason: RejectionReason;
  detail: string;
}

export interface FailedResult extends OrderResultBase {
  outcome: 'FAILED';
  reason: string;
  category: ErrorCategory;
  errorType: string;
}

export type OrderResult = SuccessResult | RejectedResult | FailedResult;

export interface BatchReport {
  results: readonly OrderResult[];
  totalNotionalSpent: number;
  successCount: number;
  failedCount: number;
  rejectedCount: number;
}

export interface CategorySummary {
  name: string;
  targetWeight: number;
  currentValue: number;
  projectedValue: number;
  projectedWeight: number;
}

export interface PriceSource {
  getPrice(symbol: string): Promise<number>;
}

export interface ExchangeClient extends PriceSource {
  getBalances(): Promise<Balance[]>;
  getTradingRule(symbol: string): Promise<TradingRule>;
  submitOrder(order: OrderRequest, mode: SubmissionMode): Promise<OrderResponse>;
}

export type Logger = Pick<Console, 'log' | 'error'>;
