import { InvalidArgumentException } from '../common/errors/option.exceptions';
import { formatYYYYMMDD, parseExpiration } from './option-symbol.codec';

export const QUERY_FIELDS = ['strikeprice', 'xdate', 'xmonth', 'xyear', 'put_call', 'unique'] as const;

export type QueryField = (typeof QUERY_FIELDS)[number];

export type QueryOperator = 'lt' | 'gt' | 'gte' | 'lte' | 'eq';

const FIELDS: ReadonlySet<string> = new Set<string>(QUERY_FIELDS);

const OPERATORS: ReadonlyMap<string, QueryOperator> = new Map<string, QueryOperator>([
  ['<', 'lt'],
  ['lt', 'lt'],
  ['>', 'gt'],
  ['gt', 'gt'],
  ['>=', 'gte'],
  ['gte', 'gte'],
  ['<=', 'lte'],
  ['lte', 'lte'],
  ['=', 'eq'],
  ['==', 'eq'],
  ['eq', 'eq'],
]);

export interface QueryCondition {
  field: QueryField;
  operator: QueryOperator;
  value: string;
}

export interface OptionQueryOptions {
  /** Throw InvalidArgumentException instead of dropping unrecognized expressions. */
  strict?: boolean;
}

const isQueryField = (value: string): value is QueryField => FIELDS.has(value);

/**
 * Filter for an option chain search, e.g.
 * `["strikeprice > 100", "xyear = 2016"]` -> `strikeprice-gt:100 AND xyear-eq:2016`.
 *
 * Each expression is `field operator value`. By default an expression with an
 * unknown field or operator, the wrong number of tokens, or an unreadable xdate
 * is dropped; see `rejectExpression`.
 */
export class OptionQuery {
  private constructor(private readonly parsed: readonly QueryCondition[]) {}

  static parse(expressions: string | readonly string[], { strict = false }: OptionQueryOptions = {}): OptionQuery {
    const list = typeof expressions === 'string' ? [expressions] : expressions;
    const conditions: QueryCondition[] = [];

    for (const expression of list) {
      const condition = parseCondition(expression);
      if (typeof condition === 'string') {
        rejectExpression(expression, condition, strict);
        continue;
      }
      conditions.push(condition);
    }

    return new OptionQuery(conditions);
  }

  get conditions(): readonly QueryCondition[] {
    return this.parsed;
  }

  isEmpty(): boolean {
    return this.parsed.length === 0;
  }

  serialize(): string {
    return this.parsed.map(({ field, operator, value }) => `${field}-${operator}:${value}`).join(' AND ');
  }

  toString(): string {
    return this.serialize();
  }
}

// Returns the condition, or the reason it was not understood.
function parseCondition(expression: string): QueryCondition | string {
  const tokens = expression.trim().split(/\s+/);
  if (tokens.length !== 3) {
    return `expected "field operator value", got ${tokens.length} token(s)`;
  }

  const [rawField, rawOperator, rawValue] = tokens;
  const field = rawField.toLowerCase();
  if (!isQueryField(field)) {
    return `unknown field "${rawField}"`;
  }
  const operator = OPERATORS.get(rawOperator);
  if (!operator) {
    return `unknown operator "${rawOperator}"`;
  }

  let value = rawValue;
  if (field === 'xdate') {
    const date = parseExpiration(rawValue);
    if (!date) {
      return `"${rawValue}" is not a date`;
    }
    value = formatYYYYMMDD(date);
  }

  return { field, operator, value };
}

/**
 * The one place that decides what happens to an expression that was not
 * understood. Lenient (default): it is dropped, so a typo silently widens
 * the search. Strict: it is an InvalidArgumentException.
 */
function rejectExpression(expression: string, reason: string, strict: boolean): void {
  if (strict) {
    throw new InvalidArgumentException(`Unrecognized option filter "${expression}": ${reason}`);
  }
}
