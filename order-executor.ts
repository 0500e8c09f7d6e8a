import { classifyError } from './errors';
import { notionalOf } from './order-validator';
import {
  ExchangeClient,
  FailedResult,
  OrderRequest,
  OrderResult,
  SubmissionMode,
  SuccessResult,
} from './types';

export async function executeOrder(
  exchange: ExchangeClient,
  order: OrderRequest,
  mode: SubmissionMode
): Promise<OrderResult> {
  const notional = notionalOf(order.price, order.quantity);

  try {
    const response = await exchange.submitOrder(order, mode);
    const result: SuccessResult = {
      ...order,
      notional,
      outcome: 'SUCCESS',
      response,
      message: `Ordered ${order.quantity} ${order.symbol} at $${order.price.toFixed(3)} (Total: $${notional.toFixed(3)})`,
    };
    return Object.freeze(result);
  } catch (error) {
    const classified = classifyError(order.symbol, error);
    const result: FailedResult = {
      ...order,
      notional,
      outcome: 'FAILED',
      reason: classified.message,
      category: classified.category,
      errorType: classified.code,
    };
    return Object.freeze(result);
  }
}

/**
 * Submits every order at once and waits for all of them. A failed order
 * comes back as a FAILED result; this never rejects.
 */
export async function executeOrders(
  exchange: ExchangeClient,
  orders: readonly OrderRequest[],
  mode: SubmissionMode
): Promise<OrderResult[]> {
  return Promise.all(orders.map((order) => executeOrder(exchange, order, mode)));
}
