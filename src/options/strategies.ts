import { Price, PriceInput } from '../common/price/price';
import { Direction, OptionType } from './entities/option-components.entity';
import { decodeOptionSymbol, requireExpiration } from './option-symbol.codec';
import { Leg, LegOptions } from './leg';
import { MultiLeg, ownedLeg } from './multi-leg';

// Leg options shared by every builder. `direction` is a builder argument,
// never an option, because some strategies fix it per leg.
export type StrategyOptions = Omit<LegOptions, 'direction'>;

export interface ContractOptions extends StrategyOptions {
  expiration?: Date | string;
  strike?: Price | PriceInput;
}

export interface ExpirationOptions extends StrategyOptions {
  expiration?: Date | string;
}

export enum StrategyKind {
  CALL = 'call',
  PUT = 'put',
  STRADDLE = 'straddle',
  STRANGLE = 'strangle',
  COLLAR = 'collar',
}

function buildLeg(
  symbol: string,
  type: OptionType,
  direction: Direction,
  { expiration, strike, ...options }: ContractOptions,
): Leg {
  return Leg.fromSymbol(symbol, { ...options, expiration, strike, type, direction });
}

// Strategies with their own strikes only take underlying and expiration from the symbol.
function resolveUnderlying(symbol: string, expiration?: Date | string): { underlying: string; expiration: Date } {
  if (expiration !== undefined) {
    return { underlying: symbol, expiration: requireExpiration(expiration) };
  }
  const parsed = decodeOptionSymbol(symbol);
  return { underlying: parsed.underlying, expiration: parsed.expiration };
}

function sharedOptions({ expiration, strike, ...rest }: ContractOptions): StrategyOptions {
  return rest;
}

// The strategy owns the legs it is built from.
function strategy(legs: Leg[], options: StrategyOptions): MultiLeg {
  return new MultiLeg(legs.map(ownedLeg), options);
}

/** Single call. Whatever type the symbol carries is ignored. */
export function call(symbol: string, direction = Direction.LONG, options: ContractOptions = {}): MultiLeg {
  return strategy([buildLeg(symbol, OptionType.CALL, direction, options)], sharedOptions(options));
}

/** Single put. Whatever type the symbol carries is ignored. */
export function put(symbol: string, direction = Direction.LONG, options: ContractOptions = {}): MultiLeg {
  return strategy([buildLeg(symbol, OptionType.PUT, direction, options)], sharedOptions(options));
}

/** Put and call at the same strike and expiration, same direction. */
export function straddle(symbol: string, direction = Direction.LONG, options: ContractOptions = {}): MultiLeg {
  return strategy(
    [
      buildLeg(symbol, OptionType.PUT, direction, options),
      buildLeg(symbol, OptionType.CALL, direction, options),
    ],
    sharedOptions(options),
  );
}

/** Put at `putStrike` and call at `callStrike`, same direction and expiration. */
export function strangle(
  symbol: string,
  callStrike: Price | PriceInput,
  putStrike: Price | PriceInput,
  direction = Direction.LONG,
  options: ExpirationOptions = {},
): MultiLeg {
  const { expiration, ...rest } = options;
  const contract = resolveUnderlying(symbol, expiration);
  return strategy(
    [
      buildLeg(contract.underlying, OptionType.PUT, direction, { ...rest, expiration: contract.expiration, strike: putStrike }),
      buildLeg(contract.underlying, OptionType.CALL, direction, { ...rest, expiration: contract.expiration, strike: callStrike }),
    ],
    rest,
  );
}

/** Long put at `putStrike`, short call at `callStrike`. Directions are fixed. */
export function collar(
  symbol: string,
  putStrike: Price | PriceInput,
  callStrike: Price | PriceInput,
  options: ExpirationOptions = {},
): MultiLeg {
  const { expiration, ...rest } = options;
  const contract = resolveUnderlying(symbol, expiration);
  return strategy(
    [
      buildLeg(contract.underlying, OptionType.PUT, Direction.LONG, { ...rest, expiration: contract.expiration, strike: putStrike }),
      buildLeg(contract.underlying, OptionType.CALL, Direction.SHORT, { ...rest, expiration: contract.expiration, strike: callStrike }),
    ],
    rest,
  );
}
