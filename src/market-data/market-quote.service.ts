import { Injectable } from '@nestjs/common';
import { Price } from '../common/price/price';
import { InvalidArgumentException } from '../common/errors/option.exceptions';
import { MarketDataProvider, Quote } from './interfaces/market-data-provider.interface';

export interface QuoteInput {
  bid: number;
  ask: number;
  last?: number;          // defaults to the bid/ask midpoint
}

/**
 * In-memory quote book for option symbols.
 * Manual updates via REST API - no live feeds.
 * Serves as the MarketDataProvider behind bid/ask premiums.
 */
@Injectable()
export class MarketQuoteService implements MarketDataProvider {
  private latestQuotes: Map<string, Quote> = new Map();
  private lastQuoteUpdate: Date = new Date();

  /** Symbols without a quote are omitted */
  async quotes(symbols: readonly string[]): Promise<Map<string, Quote>> {
    const found = new Map<string, Quote>();
    symbols.forEach((symbol) => {
      const quote = this.latestQuotes.get(symbol.toUpperCase());
      if (quote) {
        found.set(symbol, quote);
      }
    });
    return found;
  }

  getQuote(symbol: string): Quote | undefined {
    return this.latestQuotes.get(symbol.toUpperCase());
  }

  getAllQuotes(): Quote[] {
    return Array.from(this.latestQuotes.values());
  }

  /**
   * Replaces the quote for one symbol.
   * @throws InvalidArgumentException on negative prices or a crossed market
   */
  updateQuote(symbol: string, input: QuoteInput): Quote {
    const quote = this.toQuote(symbol, input, new Date());
    this.latestQuotes.set(quote.symbol, quote);
    this.lastQuoteUpdate = quote.updatedAt;
    return quote;
  }

  /**
   * Batch update - validates all before applying any.
   * @throws InvalidArgumentException on the first invalid quote
   */
  updateQuotes(inputs: Record<string, QuoteInput>): Quote[] {
    const now = new Date();
    const quotes = Object.entries(inputs).map(([symbol, input]) => this.toQuote(symbol, input, now));
    quotes.forEach((quote) => this.latestQuotes.set(quote.symbol, quote));
    this.lastQuoteUpdate = now;
    return quotes;
  }

  getLastUpdateTime(): Date {
    return this.lastQuoteUpdate;
  }

  hasQuote(symbol: string): boolean {
    return this.latestQuotes.has(symbol.toUpperCase());
  }

  getAvailableSymbols(): string[] {
    return Array.from(this.latestQuotes.keys());
  }

  /** Empties the book - test harness only */
  clearAllQuotes(): void {
    this.latestQuotes.clear();
    this.lastQuoteUpdate = new Date();
  }

  private toQuote(symbol: string, input: QuoteInput, updatedAt: Date): Quote {
    const bid = Price.of(input.bid);
    const ask = Price.of(input.ask);
    if (bid.isNegative() || ask.isNegative()) {
      throw new InvalidArgumentException(`Bid and ask must not be negative for ${symbol}`);
    }
    if (bid.greaterThan(ask)) {
      throw new InvalidArgumentException(`Bid ${bid} is above ask ${ask} for ${symbol}`);
    }
    const last = input.last !== undefined ? Price.of(input.last) : bid.mean(ask);
    if (last.isNegative()) {
      throw new InvalidArgumentException(`Last price must not be negative for ${symbol}`);
    }

    return { symbol: symbol.toUpperCase(), bid, ask, last, updatedAt };
  }
}
