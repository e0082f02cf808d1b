import Decimal from 'decimal.js';
import { InvalidPriceException } from '../errors/option.exceptions';

// Decimal.js is only used at the float <-> fixed-point boundary.
// Once encoded, every operation runs on safe integers.
Decimal.set({
  precision: 20,
  rounding: Decimal.ROUND_HALF_UP,
  toExpPos: 9e15,
  toExpNeg: -9e15,
});

export type PriceInput = number | string | Decimal;

function toDecimal(value: PriceInput): Decimal {
  let decimal: Decimal;
  try {
    decimal = new Decimal(value);
  } catch {
    throw new InvalidPriceException(value, 'not a number');
  }
  if (!decimal.isFinite()) {
    throw new InvalidPriceException(value);
  }
  return decimal;
}

function checkedRaw(raw: number, source: unknown): number {
  if (!Number.isSafeInteger(raw)) {
    throw new InvalidPriceException(source, 'outside the representable range');
  }
  // normalizes -0
  return raw === 0 ? 0 : raw;
}

/**
 * Fixed-point currency value with three decimal digits of precision.
 *
 * The value is held as an integer count of thousandths, so repeated
 * additions and subtractions never accumulate floating-point error.
 * `Price.of(7.95).raw === 7950`.
 */
export class Price {
  static readonly SCALE = 1000;
  static readonly ZERO = new Price(0);
  /** Smallest representable step, 0.001. */
  static readonly UNIT = new Price(1);

  private constructor(readonly raw: number) {}

  /** Multiplies by the scale and truncates toward zero. */
  static encode(value: PriceInput): number {
    const raw = toDecimal(value).times(Price.SCALE).trunc().toNumber();
    return checkedRaw(raw, value);
  }

  static decode(value: Price | number): number {
    const raw = value instanceof Price ? value.raw : value;
    return toDecimal(raw).dividedBy(Price.SCALE).toNumber();
  }

  static of(value: Price | PriceInput): Price {
    if (value instanceof Price) {
      return value;
    }
    return new Price(Price.encode(value));
  }

  static fromRaw(raw: number): Price {
    return new Price(checkedRaw(raw, raw));
  }

  static max(a: Price, b: Price): Price {
    return a.raw >= b.raw ? a : b;
  }

  static min(a: Price, b: Price): Price {
    return a.raw <= b.raw ? a : b;
  }

  static sum(prices: Iterable<Price>): Price {
    let total = Price.ZERO;
    for (const price of prices) {
      total = total.plus(price);
    }
    return total;
  }

  plus(other: Price): Price {
    return Price.fromRaw(this.raw + other.raw);
  }

  minus(other: Price): Price {
    return Price.fromRaw(this.raw - other.raw);
  }

  /** Scales by a plain factor (leg counts, contract multipliers), truncating toward zero. */
  times(factor: number): Price {
    const raw = toDecimal(this.raw).times(toDecimal(factor)).trunc().toNumber();
    return Price.fromRaw(raw);
  }

  negate(): Price {
    return Price.fromRaw(-this.raw);
  }

  abs(): Price {
    return this.raw < 0 ? this.negate() : this;
  }

  /** Midpoint of two prices, truncated toward zero to the nearest thousandth. */
  mean(other: Price): Price {
    return Price.fromRaw(Math.trunc((this.raw + other.raw) / 2));
  }

  compare(other: Price): -1 | 0 | 1 {
    if (this.raw === other.raw) {
      return 0;
    }
    return this.raw < other.raw ? -1 : 1;
  }

  equals(other: Price): boolean {
    return this.raw === other.raw;
  }

  lessThan(other: Price): boolean {
    return this.raw < other.raw;
  }

  lessThanOrEqualTo(other: Price): boolean {
    return this.raw <= other.raw;
  }

  greaterThan(other: Price): boolean {
    return this.raw > other.raw;
  }

  greaterThanOrEqualTo(other: Price): boolean {
    return this.raw >= other.raw;
  }

  isZero(): boolean {
    return this.raw === 0;
  }

  isNegative(): boolean {
    return this.raw < 0;
  }

  toNumber(): number {
    return Price.decode(this.raw);
  }

  toString(): string {
    return toDecimal(this.raw).dividedBy(Price.SCALE).toString();
  }

  toJSON(): number {
    return this.toNumber();
  }
}
