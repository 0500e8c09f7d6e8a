import { AllocationSpec } from './allocation';
import { AssetPosition, CategorySummary } from './types';

/**
 * Folds repeated symbols into one position, summing quantity and value.
 * First-seen order is kept.
 */
export function mergePositions(positions: readonly AssetPosition[]): AssetPosition[] {
  const merged = new Map<string, AssetPosition>();
  for (const position of positions) {
    const existing = merged.get(position.symbol);
    merged.set(
      position.symbol,
      existing
        ? {
            ...existing,
            quantity: existing.quantity + position.quantity,
            currentValue: existing.currentValue + position.currentValue,
          }
        : { ...position }
    );
  }
  return [...merged.values()];
}

/**
 * Spreads `investableCash` (cents) over the spec's assets in proportion to
 * how far each one sits below its target value once the cash is counted in.
 * Nothing is ever sold: an asset already at or above target gets 0.
 *
 * Returns symbol → amount to invest, in cents. Every spec symbol is present.
 */
export function computeInvestments(
  positions: readonly AssetPosition[],
  spec: AllocationSpec,
  investableCash: number
): Map<string, number> {
  const symbols = spec.listSymbols();
  const amounts = new Map<string, number>(symbols.map((symbol) => [symbol, 0]));

  const cash = Math.floor(investableCash);
  if (!(cash > 0)) {
    return amounts;
  }

  const currentValues = new Map<string, number>();
  for (const position of mergePositions(positions)) {
    if (spec.weightOf(position.symbol) !== undefined) {
      currentValues.set(position.symbol, position.currentValue);
    }
  }

  let totalValue = cash;
  for (const value of currentValues.values()) {
    totalValue += value;
  }

  const deficits = new Map<string, bigint>();
  let deficitSum = 0n;
  for (const symbol of symbols) {
    const weight = spec.weightOf(symbol) ?? 0;
    const targetValue = Math.floor(weight * totalValue);
    const deficit = Math.max(0, Math.floor(targetValue - (currentValues.get(symbol) ?? 0)));
    deficits.set(symbol, BigInt(deficit));
    deficitSum += BigInt(deficit);
  }

  if (deficitSum === 0n) {
    return amounts;
  }

  const cashUnits = BigInt(cash);
  for (const [symbol, deficit] of deficits) {
    amounts.set(symbol, Number((cashUnits * deficit) / deficitSum));
  }

  return amounts;
}

/**
 * Copies `positions` with `amountToInvest` filled in from
 * {@link computeInvestments}. Repeated symbols are merged, and every spec
 * symbol without a position is appended with a value of 0.
 */
export function balancePortfolio(
  positions: readonly AssetPosition[],
  spec: AllocationSpec,
  investableCash: number
): AssetPosition[] {
  const merged = mergePositions(positions);
  const held = new Set(merged.map((position) => position.symbol));
  for (const symbol of spec.listSymbols()) {
    if (!held.has(symbol)) {
      merged.push({ symbol, quantity: 0, currentValue: 0, amountToInvest: 0 });
    }
  }

  const amounts = computeInvestments(merged, spec, investableCash);
  return merged.map((position) => ({
    ...position,
    amountToInvest: amounts.get(position.symbol) ?? 0,
  }));
}

export function summarizeCategories(
  spec: AllocationSpec,
  positions: readonly AssetPosition[]
): CategorySummary[] {
  const bySymbol = new Map(positions.map((position) => [position.symbol, position]));

  const summaries = spec.categories.map((category) => {
    let targetWeight = 0;
    let currentValue = 0;
    let projectedValue = 0;
    for (const asset of category.assets) {
      targetWeight += asset.weight;
      const position = bySymbol.get(asset.symbol);
      if (position) {
        currentValue += position.currentValue;
        projectedValue += position.currentValue + position.amountToInvest;
      }
    }
    return { name: category.name, targetWeight, currentValue, projectedValue, projectedWeight: 0 };
  });

  const projectedTotal = summaries.reduce((sum, summary) => sum + summary.projectedValue, 0);
  return summaries.map((summary) => ({
    ...summary,
    projectedWeight: projectedTotal > 0 ? summary.projectedValue / projectedTotal : 0,
  }));
}
