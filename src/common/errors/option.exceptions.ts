import { BadRequestException, HttpException, ServiceUnavailableException } from '@nestjs/common';

export type OptionErrorCode =
  | 'INVALID_PRICE'
  | 'INVALID_OPTION_TYPE'
  | 'MALFORMED_SYMBOL'
  | 'INVALID_ARGUMENT'
  | 'MARKET_DATA_UNAVAILABLE';

// Domain errors extend Nest HTTP exceptions so the REST layer maps them
// to a status code; library callers see them as ordinary Errors.

/** Non-finite, unparsable or out-of-range numeric input to Price. */
export class InvalidPriceException extends BadRequestException {
  readonly code: OptionErrorCode = 'INVALID_PRICE';

  constructor(value: unknown, reason = 'not a finite number') {
    super(`Invalid price ${JSON.stringify(String(value))}: ${reason}`);
  }
}

/** Option type letter other than C or P. */
export class InvalidOptionTypeException extends BadRequestException {
  readonly code: OptionErrorCode = 'INVALID_OPTION_TYPE';

  constructor(value: string) {
    super(`Option type must be one of 'C', 'P', got ${JSON.stringify(value)}`);
  }
}

export class MalformedSymbolException extends BadRequestException {
  readonly code: OptionErrorCode = 'MALFORMED_SYMBOL';

  constructor(
    readonly symbol: string,
    reason: string,
  ) {
    super(`Malformed option symbol ${JSON.stringify(symbol)}: ${reason}`);
  }
}

export class InvalidArgumentException extends BadRequestException {
  readonly code: OptionErrorCode = 'INVALID_ARGUMENT';

  constructor(message: string) {
    super(message);
  }
}

/**
 * Quote source failed or had no quote for a requested symbol.
 * The underlying provider error, if any, is kept as `cause`.
 */
export class MarketDataUnavailableException extends ServiceUnavailableException {
  readonly code: OptionErrorCode = 'MARKET_DATA_UNAVAILABLE';

  constructor(
    readonly symbols: string[],
    cause?: unknown,
  ) {
    super(`Market data unavailable for ${symbols.join(', ')}`, { cause });
  }
}

export function hasErrorCode(exception: HttpException): exception is HttpException & { code: OptionErrorCode } {
  return 'code' in exception && typeof exception.code === 'string';
}
