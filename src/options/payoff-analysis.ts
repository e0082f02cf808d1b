import { Price } from '../common/price/price';
import { NetPayoffPoint } from './entities/option-components.entity';

export interface PayoffSummary {
  breakEvens: Price[];
  maxProfit: Price;
  maxLoss: Price;
}

/**
 * Break-even prices and the extremes of a net payoff curve.
 * Extremes only cover the sampled range; an uncapped leg keeps growing past it.
 * Between two ticks that straddle zero the break-even is interpolated linearly.
 */
export function summarizePayoffs(points: readonly NetPayoffPoint[]): PayoffSummary {
  if (points.length === 0) {
    return { breakEvens: [], maxProfit: Price.ZERO, maxLoss: Price.ZERO };
  }

  const breakEvens: Price[] = [];
  let maxNet = points[0].net;
  let minNet = points[0].net;

  points.forEach((point, i) => {
    maxNet = Price.max(maxNet, point.net);
    minNet = Price.min(minNet, point.net);

    if (point.net.isZero()) {
      breakEvens.push(point.price);
      return;
    }
    const next = points[i + 1];
    if (next && !next.net.isZero() && point.net.isNegative() !== next.net.isNegative()) {
      const fraction = -point.net.raw / (next.net.raw - point.net.raw);
      breakEvens.push(point.price.plus(next.price.minus(point.price).times(fraction)));
    }
  });

  return {
    breakEvens,
    maxProfit: Price.max(maxNet, Price.ZERO),
    maxLoss: Price.min(minNet, Price.ZERO),
  };
}
