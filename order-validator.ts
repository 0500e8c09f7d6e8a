import Decimal from 'decimal.js';
import { AssetPosition, OrderRequest, RejectedResult, TradingRule } from './types';

/**
 * Truncates `value` onto the `step` grid. A step of 0 means the exchange
 * does not constrain the increment.
 */
export function roundDown(value: number, step: number): number {
  if (!(step > 0)) {
    return value;
  }
  const steps = new Decimal(value).div(step).floor();
  return steps.mul(step).toNumber();
}

export function notionalOf(price: number, quantity: number): number {
  return new Decimal(price).mul(quantity).toNumber();
}

export type ValidationOutcome =
  | { valid: true; order: OrderRequest }
  | { valid: false; rejection: RejectedResult };

/**
 * Rounds a position's buy into an order and checks it against the symbol's
 * trading rule. Bounds are checked in a fixed order and only the first
 * violation is reported.
 */
export function validateOrder(
  position: AssetPosition,
  marketPrice: number,
  rule: TradingRule
): ValidationOutcome {
  const dollars = new Decimal(position.amountToInvest).div(100);
  const quantity = roundDown(dollars.div(marketPrice).toNumber(), rule.stepSize);
  const price = roundDown(marketPrice, rule.tickSize);
  const notional = notionalOf(price, quantity);

  const reject = (reason: RejectedResult['reason'], detail: string): ValidationOutcome => {
    const rejection: RejectedResult = {
      symbol: position.symbol,
      quantity,
      price,
      notional,
      outcome: 'REJECTED',
      reason,
      detail,
    };
    return { valid: false, rejection: Object.freeze(rejection) };
  };

  if (price < rule.minPrice) {
    return reject('price below minimum', `price ${price} < minPrice ${rule.minPrice}`);
  }
  if (price > rule.maxPrice) {
    return reject('price above maximum', `price ${price} > maxPrice ${rule.maxPrice}`);
  }
  if (quantity < rule.minQty) {
    return reject('quantity below minimum', `quantity ${quantity} < minQty ${rule.minQty}`);
  }
  if (quantity > rule.maxQty) {
    return reject('quantity above maximum', `quantity ${quantity} > maxQty ${rule.maxQty}`);
  }
  if (notional < rule.minNotional) {
    return reject('notional below minimum', `notional ${notional} < minNotional ${rule.minNotional}`);
  }

  return { valid: true, order: { symbol: position.symbol, quantity, price } };
}
