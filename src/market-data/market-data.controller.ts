import { Body, Controller, Get, HttpCode, HttpStatus, Post, Query } from '@nestjs/common';
import { MarketQuoteService } from './market-quote.service';
import { Quote } from './interfaces/market-data-provider.interface';
import { BulkUpdateQuotesDto, UpdateQuoteDto } from './dto/update-quote.dto';
import { QuoteDto, QuotesResponseDto } from './dto/quotes-response.dto';

const toQuoteDto = (quote: Quote): QuoteDto => ({
  symbol: quote.symbol,
  bid: quote.bid.toNumber(),
  ask: quote.ask.toNumber(),
  last: quote.last.toNumber(),
  mid: quote.bid.mean(quote.ask).toNumber(),
  updatedAt: quote.updatedAt.toISOString(),
});

@Controller('market-data')
export class MarketDataController {
  constructor(private readonly quoteService: MarketQuoteService) {}

  /**
   * Returns quotes, optionally for a comma-separated symbol list.
   *
   * GET /market-data/quotes?symbols=F160617C00150000,F160617P00150000
   */
  @Get('quotes')
  @HttpCode(HttpStatus.OK)
  async getQuotes(@Query('symbols') symbolsQuery?: string): Promise<QuotesResponseDto> {
    const lastUpdated = this.quoteService.getLastUpdateTime().toISOString();

    if (!symbolsQuery) {
      return { quotes: this.quoteService.getAllQuotes().map(toQuoteDto), missing: [], lastUpdated };
    }

    const symbols = symbolsQuery.split(',').map((s) => s.trim().toUpperCase()).filter((s) => s.length > 0);
    const found = await this.quoteService.quotes(symbols);
    return {
      quotes: Array.from(found.values()).map(toQuoteDto),
      missing: symbols.filter((symbol) => !found.has(symbol)),
      lastUpdated,
    };
  }

  /**
   * Sets the quote for one symbol.
   *
   * POST /market-data/quotes
   */
  @Post('quotes')
  @HttpCode(HttpStatus.OK)
  updateQuote(@Body() dto: UpdateQuoteDto): QuoteDto {
    const quote = this.quoteService.updateQuote(dto.symbol, { bid: dto.bid, ask: dto.ask, last: dto.last });
    return toQuoteDto(quote);
  }

  /**
   * Sets several quotes; nothing is applied if any is invalid.
   *
   * POST /market-data/quotes/bulk
   */
  @Post('quotes/bulk')
  @HttpCode(HttpStatus.OK)
  bulkUpdateQuotes(@Body() dto: BulkUpdateQuotesDto) {
    const inputs = Object.fromEntries(
      dto.quotes.map((quote) => [quote.symbol, { bid: quote.bid, ask: quote.ask, last: quote.last }]),
    );
    const quotes = this.quoteService.updateQuotes(inputs);
    return {
      message: 'Quotes updated',
      updatedSymbols: quotes.map((quote) => quote.symbol),
    };
  }
}
