import { Logger } from '@nestjs/common';
import { Price } from '../common/price/price';
import { MarketDataUnavailableException } from '../common/errors/option.exceptions';
import { MarketDataProvider, Quote } from '../market-data/interfaces/market-data-provider.interface';

/** Market price paid or received to open one contract of `symbol`. */
export interface PremiumSource {
  premium(symbol: string): Promise<Price>;
}

/** Picks the premium out of a quote. */
export type QuotePricing = (quote: Quote) => Price;

export const bidAskMidpoint: QuotePricing = (quote) => quote.bid.mean(quote.ask);

// Degraded mode: no quote source configured, every premium is zero.
export class ZeroPremiumSource implements PremiumSource {
  premium(): Promise<Price> {
    return Promise.resolve(Price.ZERO);
  }
}

const fallbackLogger = new Logger('PremiumSource');

/** Zero-premium source for callers that have no market data, with a warning. */
export function zeroPremiumFallback(context: string): ZeroPremiumSource {
  fallbackLogger.warn(`No premium source configured for ${context}. All premiums will be 0.`);
  return new ZeroPremiumSource();
}

interface PendingLookup {
  resolve: (premium: Price) => void;
  reject: (error: unknown) => void;
}

/**
 * Premiums from a market data provider, priced at the bid/ask midpoint by default.
 *
 * Lookups requested in the same tick are coalesced into a single
 * `provider.quotes()` call, so summing the premiums of a multi-leg
 * position costs one round trip. Provider failures and missing quotes
 * reject with MarketDataUnavailableException.
 */
export class BidAskPremiumSource implements PremiumSource {
  private pending = new Map<string, PendingLookup[]>();

  constructor(
    private readonly provider: MarketDataProvider,
    private readonly pricing: QuotePricing = bidAskMidpoint,
  ) {}

  premium(symbol: string): Promise<Price> {
    return new Promise<Price>((resolve, reject) => {
      const waiting = this.pending.get(symbol);
      if (waiting) {
        waiting.push({ resolve, reject });
        return;
      }

      if (this.pending.size === 0) {
        queueMicrotask(() => this.flush());
      }
      this.pending.set(symbol, [{ resolve, reject }]);
    });
  }

  /** Premiums for many symbols in one provider call. */
  async premiums(symbols: readonly string[]): Promise<Map<string, Price>> {
    const unique = [...new Set(symbols)];
    const values = await Promise.all(unique.map((symbol) => this.premium(symbol)));
    return new Map(unique.map((symbol, i) => [symbol, values[i]]));
  }

  private flush(): void {
    const batch = this.pending;
    this.pending = new Map();
    void this.settle(batch);
  }

  // Never rejects: every outcome is delivered to the waiting callers.
  private async settle(batch: Map<string, PendingLookup[]>): Promise<void> {
    const symbols = [...batch.keys()];

    let quotes: Map<string, Quote>;
    try {
      quotes = await this.provider.quotes(symbols);
    } catch (error) {
      const failure =
        error instanceof MarketDataUnavailableException ? error : new MarketDataUnavailableException(symbols, error);
      batch.forEach((waiters) => waiters.forEach(({ reject }) => reject(failure)));
      return;
    }

    batch.forEach((waiters, symbol) => {
      const quote = quotes.get(symbol);
      if (!quote) {
        const missing = new MarketDataUnavailableException([symbol]);
        waiters.forEach(({ reject }) => reject(missing));
        return;
      }

      try {
        const premium = this.pricing(quote);
        waiters.forEach(({ resolve }) => resolve(premium));
      } catch (error) {
        waiters.forEach(({ reject }) => reject(error));
      }
    });
  }
}
