import { Logger } from '@nestjs/common';
import { Price } from '../common/price/price';
import { InvalidArgumentException } from '../common/errors/option.exceptions';
import { NetPayoffPoint, PayoffPoint } from './entities/option-components.entity';
import { PayoffCache } from './payoff-cache';
import { CostModel, DEFAULT_COST_MODEL } from './cost-model';
import { DEFAULT_CACHE_TTL_SECONDS, Leg, LegBuildOptions } from './leg';

// A leg to add: a raw option symbol the MultiLeg builds (and owns), a leg
// built elsewhere whose ownership is handed over, or a leg the caller built
// and keeps ownership of.
export type LegInput =
  | { kind: 'symbol'; symbol: string; options?: LegBuildOptions }
  | { kind: 'owned'; leg: Leg }
  | { kind: 'leg'; leg: Leg };

export const symbolLeg = (symbol: string, options?: LegBuildOptions): LegInput => ({ kind: 'symbol', symbol, options });

export const ownedLeg = (leg: Leg): LegInput => ({ kind: 'owned', leg });

export const prebuiltLeg = (leg: Leg): LegInput => ({ kind: 'leg', leg });

export interface NetPayoffOptions {
  includeCost?: boolean;
  includePremium?: boolean;
}

export interface MultiLegValues {
  payoffs: PayoffPoint[];
  cost: Price;
  premium: Promise<Price>;
}

/**
 * An option strategy made of one or more legs.
 *
 * Payoff, cost and premium are order-independent sums over the legs and are
 * cached under the same TTL rules as a single leg. Adding a leg drops all
 * three. Curves are aggregated over the union of the legs' domains; each
 * leg is widened to that union, never shrunk.
 */
export class MultiLeg {
  private readonly logger = new Logger(MultiLeg.name);
  private readonly members: Leg[] = [];
  private readonly owned = new Set<Leg>();
  private readonly defaults: LegBuildOptions;
  private readonly costModel: CostModel;
  private readonly cache: PayoffCache<MultiLegValues>;

  /**
   * `defaults` builds legs added by symbol; its cost model, TTL and clock
   * also apply to the MultiLeg itself.
   */
  constructor(legs: readonly LegInput[] = [], defaults: LegBuildOptions = {}) {
    this.defaults = { ...defaults };
    this.costModel = defaults.costModel ?? DEFAULT_COST_MODEL;
    this.cache = new PayoffCache<MultiLegValues>(
      defaults.ttlSeconds ?? DEFAULT_CACHE_TTL_SECONDS,
      defaults.clock,
    );

    legs.forEach((leg) => this.addLeg(leg));
  }

  get legs(): readonly Leg[] {
    return [...this.members];
  }

  get size(): number {
    return this.members.length;
  }

  /** True for legs this MultiLeg built from a symbol or was handed. */
  owns(leg: Leg): boolean {
    return this.owned.has(leg);
  }

  /**
   * Appends a leg. Symbols are built with `input.options` when given,
   * otherwise with the defaults captured at construction.
   */
  addLeg(input: LegInput): Leg {
    const leg = input.kind === 'symbol' ? this.buildLeg(input.symbol, input.options) : input.leg;
    if (this.members.includes(leg)) {
      throw new InvalidArgumentException(`Leg ${leg.symbol} is already part of this strategy`);
    }

    leg.claim(this);
    if (input.kind === 'owned') {
      this.owned.add(leg);
    }
    this.members.push(leg);
    this.cache.invalidateAll();
    return leg;
  }

  /** Sum of every leg's payoff at one underlying price. */
  payoff(price: Price): Price {
    return Price.sum(this.members.map((leg) => leg.payoff(price)));
  }

  payoffs(): PayoffPoint[] {
    return this.cache.getOrCompute('payoffs', () => this.aggregatePayoffs());
  }

  cost(): Price {
    return this.cache.getOrCompute('cost', () => this.costModel.cost(this.members.length));
  }

  // All leg lookups start in the same tick so a batching source makes one call.
  premium(): Promise<Price> {
    return this.cache.getOrCompute('premium', async () => {
      const premiums = await Promise.all(this.members.map((leg) => leg.premium()));
      return Price.sum(premiums);
    });
  }

  /** Payoff curve less cost and/or premium: the profit/loss at expiration. */
  async netPayoffs({ includeCost = true, includePremium = true }: NetPayoffOptions = {}): Promise<NetPayoffPoint[]> {
    const cost = includeCost ? this.cost() : Price.ZERO;
    const premium = includePremium ? await this.premium() : Price.ZERO;

    return this.payoffs().map(({ price, payoff }) => ({
      price,
      payoff,
      net: payoff.minus(cost).minus(premium),
    }));
  }

  /** Drops cached values here and on the legs this MultiLeg owns. */
  invalidate(): void {
    this.cache.invalidateAll();
    this.owned.forEach((leg) => leg.invalidate());
  }

  isCached(key: keyof MultiLegValues): boolean {
    return this.cache.isCached(key);
  }

  private buildLeg(symbol: string, options?: LegBuildOptions): Leg {
    const leg = Leg.fromSymbol(symbol, options ?? this.defaults);
    this.owned.add(leg);
    return leg;
  }

  private aggregatePayoffs(): PayoffPoint[] {
    if (this.members.length === 0) {
      return [];
    }

    const start = this.members.map((leg) => leg.domain.start).reduce((a, b) => Price.min(a, b));
    const stop = this.members.map((leg) => leg.domain.stop).reduce((a, b) => Price.max(a, b));
    this.logger.debug(`Aggregating ${this.members.length} leg(s) over [${start}, ${stop})`);

    // keyed by raw price; a leg with no point at some tick contributes zero there
    const totals = new Map<number, Price>();
    for (const leg of this.members) {
      leg.resetDomain(start, stop, this);
      for (const { price, payoff } of leg.payoffs()) {
        totals.set(price.raw, (totals.get(price.raw) ?? Price.ZERO).plus(payoff));
      }
    }

    return [...totals.entries()]
      .sort(([a], [b]) => a - b)
      .map(([raw, payoff]) => ({ price: Price.fromRaw(raw), payoff }));
  }
}
