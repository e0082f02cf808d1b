import { InvalidArgumentException } from '../common/errors/option.exceptions';
import { OptionQuery } from './option-query';

describe('OptionQuery', () => {
  it('should serialize conditions joined with AND', () => {
    const query = OptionQuery.parse(['strikeprice > 100', 'xyear = 2016']);
    expect(query.serialize()).toBe('strikeprice-gt:100 AND xyear-eq:2016');
  });

  it('should drop an unknown field between valid ones', () => {
    const query = OptionQuery.parse(['strikeprice > 100', 'foobar > 1', 'xyear = 2016']);
    expect(query.serialize()).toBe('strikeprice-gt:100 AND xyear-eq:2016');
  });

  it('should accept a single expression', () => {
    expect(OptionQuery.parse('put_call eq call').toString()).toBe('put_call-eq:call');
  });

  it.each([
    ['<', 'lt'],
    ['lt', 'lt'],
    ['>=', 'gte'],
    ['<=', 'lte'],
    ['==', 'eq'],
  ])('should map operator %s to %s', (operator, expected) => {
    expect(OptionQuery.parse(`strikeprice ${operator} 50`).conditions).toEqual([
      { field: 'strikeprice', operator: expected, value: '50' },
    ]);
  });

  it('should match field names case-insensitively', () => {
    expect(OptionQuery.parse('XMonth = 6').serialize()).toBe('xmonth-eq:6');
  });

  it('should tolerate extra whitespace', () => {
    expect(OptionQuery.parse('  strikeprice   >=   100 ').serialize()).toBe('strikeprice-gte:100');
  });

  it('should normalize xdate values to YYYYMMDD', () => {
    expect(OptionQuery.parse(['xdate >= 2016-06-17', 'xdate < 07/15/2016']).serialize()).toBe(
      'xdate-gte:20160617 AND xdate-lt:20160715',
    );
  });

  describe('lenient mode', () => {
    it.each([
      ['unknown field', 'volume > 10'],
      ['unknown operator', 'strikeprice ~ 10'],
      ['too few tokens', 'strikeprice >'],
      ['too many tokens', 'strikeprice > 10 20'],
      ['unreadable date', 'xdate = soon'],
    ])('should drop an expression with an %s', (_reason, expression) => {
      const query = OptionQuery.parse([expression, 'xyear = 2016']);
      expect(query.serialize()).toBe('xyear-eq:2016');
    });

    it('should treat operators as case-sensitive', () => {
      expect(OptionQuery.parse('strikeprice GT 10').isEmpty()).toBe(true);
    });

    it('should serialize an empty query as an empty string', () => {
      const query = OptionQuery.parse([]);

      expect(query.isEmpty()).toBe(true);
      expect(query.serialize()).toBe('');
    });
  });

  describe('strict mode', () => {
    it('should reject an unknown field', () => {
      expect(() => OptionQuery.parse(['xyear = 2016', 'volume > 10'], { strict: true })).toThrow(
        new InvalidArgumentException('Unrecognized option filter "volume > 10": unknown field "volume"'),
      );
    });

    it('should reject a wrong token count', () => {
      expect(() => OptionQuery.parse('strikeprice >', { strict: true })).toThrow(
        'Unrecognized option filter "strikeprice >": expected "field operator value", got 2 token(s)',
      );
    });

    it('should reject an unreadable date', () => {
      expect(() => OptionQuery.parse('xdate = soon', { strict: true })).toThrow('"soon" is not a date');
    });

    it('should still accept valid expressions', () => {
      expect(OptionQuery.parse('strikeprice > 100', { strict: true }).serialize()).toBe('strikeprice-gt:100');
    });
  });
});
