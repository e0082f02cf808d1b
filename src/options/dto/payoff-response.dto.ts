import { LegSummary } from '../leg';
import { StrategyKind } from '../strategies';

// One sample of the curve, decoded to decimals
export interface PayoffPointDto {
  price: number;
  payoff: number;                  // intrinsic value at expiration
  net: number;                     // payoff - cost - premium (as requested)
}

export interface PayoffReportDto {
  strategy: StrategyKind;
  legs: LegSummary[];
  cost: number;                    // commission for all legs
  premium: number;                 // net premium paid (negative = received)
  breakEvens: number[];            // prices where net crosses zero
  maxProfit: number;               // within the sampled range
  maxLoss: number;
  points: PayoffPointDto[];
}

export interface DecodedSymbolDto {
  symbol: string;
  underlying: string;
  expiration: string;              // YYYY-MM-DD
  type: string;
  strike: number;
}
