import { Price } from '../../common/price/price';

// Latest top-of-book quote for one option symbol.
export interface Quote {
  symbol: string;
  bid: Price;
  ask: Price;
  last: Price;
  updatedAt: Date;
}

/**
 * Source of quotes for option symbols.
 * Symbols without a quote are left out of the returned map.
 */
export interface MarketDataProvider {
  quotes(symbols: readonly string[]): Promise<Map<string, Quote>>;
}
