import { describe, it, expect } from 'vitest';
import { InvalidCallError } from '../../lib/errors.js';
import { assertScalarConditions, buildQueryParams, isNumeric, toInteger, toIntegerParam } from './params.js';

const keys = { selectFieldsKey: 'fields', limitKey: 'per-page', offsetKey: 'page' };

describe('isNumeric', () => {
  it.each(['42', '-7', '+3', '1.5', '.5', '1e3', ' 12 '])('accepts %j', (value) => {
    expect(isNumeric(value)).toBe(true);
  });

  it.each(['', 'abc', '12abc', '0x1A', '1,000', 'NaN'])('rejects %j', (value) => {
    expect(isNumeric(value)).toBe(false);
  });

  it('accepts finite numbers only', () => {
    expect(isNumeric(3.2)).toBe(true);
    expect(isNumeric(Number.POSITIVE_INFINITY)).toBe(false);
  });
});

describe('toInteger', () => {
  it('truncates numeric strings and numbers', () => {
    expect(toInteger('42')).toBe(42);
    expect(toInteger('1.9')).toBe(1);
    expect(toInteger('1e3')).toBe(1000);
    expect(toInteger(-2.5)).toBe(-2);
  });

  it('parses a leading integer', () => {
    expect(toInteger('7 items')).toBe(7);
  });

  it('gives 0 for empty, non-numeric and absent values', () => {
    expect(toInteger('')).toBe(0);
    expect(toInteger('many')).toBe(0);
    expect(toInteger(null)).toBe(0);
    expect(toInteger(undefined)).toBe(0);
  });
});

describe('toIntegerParam', () => {
  it('returns safe integers as numbers', () => {
    expect(toIntegerParam('42')).toBe(42);
    expect(toIntegerParam(' -0012 ')).toBe(-12);
    expect(toIntegerParam('9007199254740991')).toBe(9007199254740991);
  });

  it('keeps the exact digits of integers beyond the safe range', () => {
    expect(toIntegerParam('9007199254740993')).toBe('9007199254740993');
    expect(toIntegerParam('+0009007199254740993')).toBe('9007199254740993');
    expect(toIntegerParam('-9007199254740993')).toBe('-9007199254740993');
  });

  it('writes large exponent forms out in full', () => {
    expect(toIntegerParam('1e21')).toBe('1000000000000000000000');
    expect(toIntegerParam(1e21)).toBe('1000000000000000000000');
  });

  it('truncates decimal forms', () => {
    expect(toIntegerParam('12.9')).toBe(12);
    expect(toIntegerParam('1e3')).toBe(1000);
  });
});

describe('buildQueryParams', () => {
  it('coerces numeric-looking conditions to integers', () => {
    const params = buildQueryParams(
      { where: { id: '15', code: '007', name: 'ada', ratio: '0.75' }, select: [], limit: null, offset: null },
      keys
    );

    expect(params).toEqual({ id: 15, code: 7, name: 'ada', ratio: 0 });
  });

  it('keeps ids beyond the safe integer range exact', () => {
    const params = buildQueryParams(
      { where: { id: '9007199254740993' }, select: [], limit: null, offset: null },
      keys
    );

    expect(params).toEqual({ id: '9007199254740993' });
  });

  it('passes booleans and non-numeric strings through', () => {
    const params = buildQueryParams(
      { where: { active: false, sku: 'A-12' }, select: [], limit: null, offset: null },
      keys
    );

    expect(params).toEqual({ active: false, sku: 'A-12' });
  });

  it('joins selected fields and adds limit and offset', () => {
    const params = buildQueryParams({ where: {}, select: ['id', 'email'], limit: 0, offset: 3 }, keys);

    expect(params).toEqual({ fields: 'id,email', 'per-page': 0, page: 3 });
  });
});

describe('assertScalarConditions', () => {
  it('rejects array values', () => {
    expect(() => assertScalarConditions({ id: [1, 2] })).toThrow(InvalidCallError);
  });

  it('rejects object values', () => {
    expect(() => assertScalarConditions({ range: { gt: 1 } })).toThrow(
      'Condition "range" must be a string, number or boolean; array and object values are not supported'
    );
  });

  it('accepts scalars', () => {
    expect(() => assertScalarConditions({ a: 'x', b: 1, c: true })).not.toThrow();
  });
});
