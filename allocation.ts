import { InvalidAllocationError } from './errors';
import { AllocationAsset, AllocationCategory } from './types';

export const WEIGHT_TOLERANCE = 1e-6;

export interface AllocationCategoryView {
  readonly name: string;
  readonly assets: readonly Readonly<AllocationAsset>[];
}

/**
 * Target weights for every asset, grouped into named categories.
 *
 * Built once with {@link AllocationSpec.build} and checked with
 * {@link AllocationSpec.verify} before use. The category tree is frozen.
 */
export class AllocationSpec {
  readonly categories: readonly AllocationCategoryView[];
  private readonly weights: ReadonlyMap<string, number>;
  private readonly categoryBySymbol: ReadonlyMap<string, string>;

  private constructor(categories: AllocationCategory[]) {
    this.categories = Object.freeze(
      categories.map((category) =>
        Object.freeze({
          name: category.name,
          assets: Object.freeze(
            category.assets.map((asset) => Object.freeze({ symbol: asset.symbol, weight: asset.weight }))
          ),
        })
      )
    );

    const weights = new Map<string, number>();
    const categoryBySymbol = new Map<string, string>();
    for (const category of this.categories) {
      for (const asset of category.assets) {
        if (!weights.has(asset.symbol)) {
          weights.set(asset.symbol, asset.weight);
          categoryBySymbol.set(asset.symbol, category.name);
        }
      }
    }
    this.weights = weights;
    this.categoryBySymbol = categoryBySymbol;
    Object.freeze(this);
  }

  static build(categories: AllocationCategory[]): AllocationSpec {
    return new AllocationSpec(categories);
  }

  verify(): AllocationSpec {
    const seen = new Set<string>();
    let sum = 0;

    for (const category of this.categories) {
      for (const { symbol, weight } of category.assets) {
        if (!Number.isFinite(weight) || weight < 0) {
          throw new InvalidAllocationError(
            `Weight for ${symbol} must be a non-negative number, got ${weight}`,
            sum,
            WEIGHT_TOLERANCE
          );
        }
        if (seen.has(symbol)) {
          throw new InvalidAllocationError(
            `Symbol ${symbol} appears more than once in the allocation`,
            sum,
            WEIGHT_TOLERANCE
          );
        }
        seen.add(symbol);
        sum += weight;
      }
    }

    if (Math.abs(sum - 1) > WEIGHT_TOLERANCE) {
      throw new InvalidAllocationError(
        `Allocation weights sum to ${sum}, expected 1 within ${WEIGHT_TOLERANCE}`,
        sum,
        WEIGHT_TOLERANCE
      );
    }

    return this;
  }

  listSymbols(): string[] {
    return [...this.weights.keys()];
  }

  weightOf(symbol: string): number | undefined {
    return this.weights.get(symbol);
  }

  categoryOf(symbol: string): string | undefined {
    return this.categoryBySymbol.get(symbol);
  }
}
