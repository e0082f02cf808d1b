import { Price, PriceInput } from '../common/price/price';
import { InvalidArgumentException } from '../common/errors/option.exceptions';
import {
  Direction,
  OptionComponents,
  OptionType,
  PayoffPoint,
  PriceDomain,
} from './entities/option-components.entity';
import {
  decodeOptionSymbol,
  encodeOptionSymbol,
  formatYYYYMMDD,
  parseOptionType,
  requireExpiration,
} from './option-symbol.codec';
import { Clock, PayoffCache } from './payoff-cache';
import { CostModel, DEFAULT_COST_MODEL } from './cost-model';
import { PremiumSource, zeroPremiumFallback } from './premium-source';

export const DEFAULT_PRICE_RANGE = 20;
export const DEFAULT_TICK_SIZE = 0.01;
export const DEFAULT_CACHE_TTL_SECONDS = 300;

export interface LegOptions {
  direction?: Direction;
  /** Distance either side of the strike covered by the payoff curve. */
  priceRange?: Price | PriceInput;
  tickSize?: Price | PriceInput;
  costModel?: CostModel;
  /** Omitted: premiums are zero and a warning is logged. */
  premiumSource?: PremiumSource;
  ttlSeconds?: number;
  clock?: Clock;
}

// Parts that take precedence over what is decoded from the symbol.
export interface LegOverrides {
  expiration?: Date | string;
  type?: OptionType | string;
  strike?: Price | PriceInput;
}

export type LegBuildOptions = LegOptions & LegOverrides;

export interface LegSummary {
  symbol: string;
  underlying: string;
  expiration: string;     // YYYYMMDD
  type: OptionType;
  direction: Direction;
  strike: number;
}

export interface LegValues {
  payoffs: PayoffPoint[];
  cost: Price;
  premium: Promise<Price>;
}

/**
 * One option contract position.
 *
 * Identity (contract and direction) is fixed at construction. The sampling
 * domain may only be widened by the MultiLeg that claimed the leg.
 */
export class Leg {
  readonly symbol: string;
  readonly direction: Direction;

  private readonly components: OptionComponents;
  private readonly costModel: CostModel;
  private readonly premiumSource: PremiumSource;
  private readonly cache: PayoffCache<LegValues>;
  private currentDomain: PriceDomain;
  private owner?: object;

  constructor(components: OptionComponents, options: LegOptions = {}) {
    if (components.strike.isNegative()) {
      throw new InvalidArgumentException(`Strike must not be negative, got ${components.strike}`);
    }

    const range = Price.of(options.priceRange ?? DEFAULT_PRICE_RANGE);
    const tick = Price.of(options.tickSize ?? DEFAULT_TICK_SIZE);
    if (range.isNegative()) {
      throw new InvalidArgumentException(`Price range must not be negative, got ${range}`);
    }
    if (!tick.greaterThan(Price.ZERO)) {
      throw new InvalidArgumentException(`Tick size must be positive, got ${tick}`);
    }

    this.symbol = encodeOptionSymbol(components.underlying, components.expiration, components.type, components.strike);
    this.components = {
      ...components,
      underlying: components.underlying.toUpperCase(),
      expiration: requireExpiration(components.expiration),
    };
    this.direction = options.direction ?? Direction.LONG;
    this.costModel = options.costModel ?? DEFAULT_COST_MODEL;
    this.premiumSource = options.premiumSource ?? zeroPremiumFallback(this.symbol);
    this.cache = new PayoffCache<LegValues>(options.ttlSeconds ?? DEFAULT_CACHE_TTL_SECONDS, options.clock);

    // stop is one raw unit past strike + range so that point is sampled
    this.currentDomain = {
      start: components.strike.minus(range),
      stop: components.strike.plus(range).plus(Price.UNIT),
      tick,
    };
  }

  /**
   * Builds a leg from an option symbol. Parts given in `options` win over
   * the decoded ones; when expiration, type and strike are all given the
   * symbol is taken to be the bare underlying.
   */
  static fromSymbol(symbol: string, options: LegBuildOptions = {}): Leg {
    const { expiration, type, strike, ...legOptions } = options;

    if (expiration !== undefined && type !== undefined && strike !== undefined) {
      return new Leg(
        {
          underlying: symbol,
          expiration: requireExpiration(expiration),
          type: parseOptionType(type),
          strike: Price.of(strike),
        },
        legOptions,
      );
    }

    const parsed = decodeOptionSymbol(symbol);
    return new Leg(
      {
        underlying: parsed.underlying,
        expiration: expiration !== undefined ? requireExpiration(expiration) : parsed.expiration,
        type: type !== undefined ? parseOptionType(type) : parsed.type,
        strike: strike !== undefined ? Price.of(strike) : parsed.strike,
      },
      legOptions,
    );
  }

  get underlying(): string {
    return this.components.underlying;
  }

  get expiration(): Date {
    return new Date(this.components.expiration.getTime());
  }

  get type(): OptionType {
    return this.components.type;
  }

  get strike(): Price {
    return this.components.strike;
  }

  get domain(): PriceDomain {
    return { ...this.currentDomain };
  }

  /**
   * Intrinsic value at a single underlying price, negated for a short leg.
   * Not cached.
   */
  payoff(price: Price): Price {
    const intrinsic =
      this.components.type === OptionType.CALL
        ? Price.max(price.minus(this.components.strike), Price.ZERO)
        : Price.max(this.components.strike.minus(price), Price.ZERO);

    return this.direction === Direction.SHORT ? intrinsic.negate() : intrinsic;
  }

  /** Payoff curve over the current domain, one point per tick. */
  payoffs(): PayoffPoint[] {
    return this.cache.getOrCompute('payoffs', () => {
      const { start, stop, tick } = this.currentDomain;
      const points: PayoffPoint[] = [];
      for (let price = start; price.lessThan(stop); price = price.plus(tick)) {
        points.push({ price, payoff: this.payoff(price) });
      }
      return points;
    });
  }

  cost(): Price {
    return this.cache.getOrCompute('cost', () => this.costModel.cost(1));
  }

  premium(): Promise<Price> {
    return this.cache.getOrCompute('premium', async () => {
      const premium = await this.premiumSource.premium(this.symbol);
      return this.direction === Direction.SHORT ? premium.negate() : premium;
    });
  }

  /**
   * Registers the single aggregate allowed to change this leg's domain.
   * A leg cannot be shared between two aggregates.
   */
  claim(owner: object): void {
    if (this.owner !== undefined && this.owner !== owner) {
      throw new InvalidArgumentException(`Leg ${this.symbol} already belongs to another strategy`);
    }
    this.owner = owner;
  }

  /**
   * Moves the sampling range. Only the claiming owner may call this; the
   * payoff curve is dropped when the range actually changes, cost and
   * premium are kept.
   */
  resetDomain(start: Price, stop: Price, owner: object): void {
    if (this.owner === undefined || this.owner !== owner) {
      throw new InvalidArgumentException(`Only the owning strategy may change the domain of ${this.symbol}`);
    }
    if (!start.lessThan(stop)) {
      throw new InvalidArgumentException(`Domain start ${start} must be below stop ${stop}`);
    }
    if (start.equals(this.currentDomain.start) && stop.equals(this.currentDomain.stop)) {
      return;
    }

    this.currentDomain = { ...this.currentDomain, start, stop };
    this.cache.invalidate('payoffs');
  }

  /** Drops every cached value. */
  invalidate(): void {
    this.cache.invalidateAll();
  }

  isCached(key: keyof LegValues): boolean {
    return this.cache.isCached(key);
  }

  describe(): LegSummary {
    return {
      symbol: this.symbol,
      underlying: this.components.underlying,
      expiration: formatYYYYMMDD(this.components.expiration),
      type: this.components.type,
      direction: this.direction,
      strike: this.components.strike.toNumber(),
    };
  }

  toJSON(): LegSummary {
    return this.describe();
  }
}
