import { Price, PriceInput } from '../common/price/price';
import { InvalidArgumentException } from '../common/errors/option.exceptions';

/** Commission charged to open a position with the given number of legs. */
export interface CostModel {
  cost(legCount: number): Price;
}

export const DEFAULT_BASE_FEE = 4.95;
export const DEFAULT_PER_LEG_FEE = 0.65;

// base fee + per-leg fee x legs
export class FlatCommissionCostModel implements CostModel {
  readonly baseFee: Price;
  readonly perLegFee: Price;

  constructor(baseFee: Price | PriceInput, perLegFee: Price | PriceInput) {
    this.baseFee = Price.of(baseFee);
    this.perLegFee = Price.of(perLegFee);
  }

  cost(legCount: number): Price {
    if (!Number.isInteger(legCount) || legCount < 0) {
      throw new InvalidArgumentException(`Leg count must be a non-negative integer, got ${legCount}`);
    }
    return this.baseFee.plus(this.perLegFee.times(legCount));
  }
}

export const DEFAULT_COST_MODEL: CostModel = new FlatCommissionCostModel(DEFAULT_BASE_FEE, DEFAULT_PER_LEG_FEE);
