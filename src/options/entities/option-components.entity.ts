import { Price } from '../../common/price/price';

export enum OptionType {
  CALL = 'C',
  PUT = 'P',
}

export enum Direction {
  LONG = 'L',
  SHORT = 'S',
}

// Parsed identity of a single option contract.
// Expiration is a UTC-midnight Date; only the calendar day is significant.
export interface OptionComponents {
  underlying: string;
  expiration: Date;
  type: OptionType;
  strike: Price;          // >= 0
}

// Sampling range for a payoff curve: [start, stop) every tick.
export interface PriceDomain {
  start: Price;
  stop: Price;            // exclusive
  tick: Price;            // > 0
}

export interface PayoffPoint {
  price: Price;
  payoff: Price;
}

// Payoff with cost and/or premium taken off, the series behind a P/L chart.
export interface NetPayoffPoint extends PayoffPoint {
  net: Price;
}
