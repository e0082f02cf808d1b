import { Price, PriceInput } from '../common/price/price';
import {
  InvalidArgumentException,
  InvalidOptionTypeException,
  MalformedSymbolException,
} from '../common/errors/option.exceptions';
import { OptionComponents, OptionType } from './entities/option-components.entity';

// <UNDERLYING><YYMMDD><C|P><strike * 1000, 8 digits>
// e.g. F160617C00150000 = F, 2016-06-17, call, 150.00
const STRIKE_DIGITS = 8;
const SUFFIX_LENGTH = 6 + 1 + STRIKE_DIGITS;

const pad = (value: number, width: number): string => String(value).padStart(width, '0');

/** Builds a UTC-midnight date, or undefined when the parts are not a real calendar day. */
function utcDate(year: number, month: number, day: number): Date | undefined {
  if (year < 1000 || month < 1 || month > 12 || day < 1) {
    return undefined;
  }
  const date = new Date(Date.UTC(year, month - 1, day));
  if (date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return undefined;
  }
  return date;
}

const DATE_FORMATS: Array<{ pattern: RegExp; build: (m: RegExpMatchArray) => Date | undefined }> = [
  // YYYY-MM-DD, optionally followed by a time part
  { pattern: /^(\d{4})-(\d{2})-(\d{2})(?:T.*)?$/, build: (m) => utcDate(+m[1], +m[2], +m[3]) },
  { pattern: /^(\d{4})\/(\d{2})\/(\d{2})$/, build: (m) => utcDate(+m[1], +m[2], +m[3]) },
  { pattern: /^(\d{4})(\d{2})(\d{2})$/, build: (m) => utcDate(+m[1], +m[2], +m[3]) },
  // MM/DD/YYYY
  { pattern: /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/, build: (m) => utcDate(+m[3], +m[1], +m[2]) },
  // YYMMDD, 21st century
  { pattern: /^(\d{2})(\d{2})(\d{2})$/, build: (m) => utcDate(2000 + +m[1], +m[2], +m[3]) },
];

/**
 * Normalizes an expiration to a UTC-midnight Date.
 * Accepts a Date or one of YYYY-MM-DD, YYYY/MM/DD, YYYYMMDD, MM/DD/YYYY, YYMMDD.
 * Returns undefined for anything else.
 */
export function parseExpiration(value: Date | string): Date | undefined {
  if (value instanceof Date) {
    if (Number.isNaN(value.getTime())) {
      return undefined;
    }
    return utcDate(value.getUTCFullYear(), value.getUTCMonth() + 1, value.getUTCDate());
  }

  const text = value.trim();
  for (const { pattern, build } of DATE_FORMATS) {
    const match = text.match(pattern);
    if (match) {
      return build(match);
    }
  }
  return undefined;
}

export function requireExpiration(value: Date | string): Date {
  const expiration = parseExpiration(value);
  if (!expiration) {
    throw new InvalidArgumentException(`Invalid expiration date: ${String(value)}`);
  }
  return expiration;
}

export function formatYYMMDD(date: Date): string {
  return pad(date.getUTCFullYear() % 100, 2) + pad(date.getUTCMonth() + 1, 2) + pad(date.getUTCDate(), 2);
}

export function formatYYYYMMDD(date: Date): string {
  return pad(date.getUTCFullYear(), 4) + pad(date.getUTCMonth() + 1, 2) + pad(date.getUTCDate(), 2);
}

export function parseOptionType(value: string): OptionType {
  switch (value.toUpperCase()) {
    case OptionType.CALL:
      return OptionType.CALL;
    case OptionType.PUT:
      return OptionType.PUT;
    default:
      throw new InvalidOptionTypeException(value);
  }
}

/** Formats an option symbol from its component parts. */
export function encodeOptionSymbol(
  underlying: string,
  expiration: Date | string,
  type: OptionType | string,
  strike: Price | PriceInput,
): string {
  const letter = parseOptionType(type);
  const date = requireExpiration(expiration);
  const raw = Price.of(strike).raw;

  if (raw < 0) {
    throw new InvalidArgumentException(`Strike must not be negative, got ${Price.decode(raw)}`);
  }
  const digits = String(raw);
  if (digits.length > STRIKE_DIGITS) {
    throw new InvalidArgumentException(`Strike ${Price.decode(raw)} does not fit in ${STRIKE_DIGITS} digits`);
  }

  return `${underlying.toUpperCase()}${formatYYMMDD(date)}${letter}${digits.padStart(STRIKE_DIGITS, '0')}`;
}

/**
 * Parses an option symbol into its component parts.
 * Segments are validated before use; anything off-format is a MalformedSymbolException.
 */
export function decodeOptionSymbol(symbol: string): OptionComponents {
  if (symbol.length < SUFFIX_LENGTH) {
    throw new MalformedSymbolException(symbol, `expected at least ${SUFFIX_LENGTH} characters`);
  }

  const strikeSegment = symbol.slice(-STRIKE_DIGITS);
  const typeSegment = symbol.slice(-STRIKE_DIGITS - 1, -STRIKE_DIGITS);
  const dateSegment = symbol.slice(-SUFFIX_LENGTH, -STRIKE_DIGITS - 1);
  const underlying = symbol.slice(0, -SUFFIX_LENGTH).toUpperCase();

  if (!/^\d{8}$/.test(strikeSegment)) {
    throw new MalformedSymbolException(symbol, `strike segment "${strikeSegment}" is not 8 digits`);
  }
  if (!/^\d{6}$/.test(dateSegment)) {
    throw new MalformedSymbolException(symbol, `date segment "${dateSegment}" is not YYMMDD`);
  }
  const expiration = parseExpiration(dateSegment);
  if (!expiration) {
    throw new MalformedSymbolException(symbol, `"${dateSegment}" is not a calendar date`);
  }

  return {
    underlying,
    expiration,
    type: parseOptionType(typeSegment),
    strike: Price.fromRaw(Number(strikeSegment)),
  };
}

export interface SymbolSelection {
  calls?: boolean;
  puts?: boolean;
}

/**
 * Every symbol for the given expirations and strikes,
 * ordered by expiration, then type (calls first), then strike.
 */
export function optionSymbols(
  underlying: string,
  expirations: ReadonlyArray<Date | string>,
  strikes: ReadonlyArray<Price | PriceInput>,
  { calls = true, puts = true }: SymbolSelection = {},
): string[] {
  if (!calls && !puts) {
    throw new InvalidArgumentException('Either calls or puts must be selected');
  }

  const types: OptionType[] = [];
  if (calls) {
    types.push(OptionType.CALL);
  }
  if (puts) {
    types.push(OptionType.PUT);
  }

  return expirations.flatMap((expiration) =>
    types.flatMap((type) => strikes.map((strike) => encodeOptionSymbol(underlying, expiration, type, strike))),
  );
}
