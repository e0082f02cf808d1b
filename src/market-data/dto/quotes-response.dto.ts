// Quote as served over REST, prices decoded to decimals
export interface QuoteDto {
  symbol: string;
  bid: number;
  ask: number;
  last: number;
  mid: number;
  updatedAt: string;      // ISO timestamp
}

export interface QuotesResponseDto {
  quotes: QuoteDto[];
  missing: string[];      // requested symbols with no quote
  lastUpdated: string;
}
