import { InvalidCallError } from '../../lib/errors.js';
import type { ConditionValue, Conditions, QueryParams } from './types.js';

// Optionally signed decimal, optional exponent, surrounding whitespace allowed.
const NUMERIC_PATTERN = /^\s*[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?\s*$/;
const INTEGER_PATTERN = /^\s*([+-]?)0*(\d+)\s*$/;

/**
 * Whether a condition value reads as a number.
 */
export function isNumeric(value: unknown): boolean {
  if (typeof value === 'number') {
    return Number.isFinite(value);
  }
  return typeof value === 'string' && NUMERIC_PATTERN.test(value);
}

/**
 * Integer conversion by leading-integer parsing: "42" -> 42, "7 items" -> 7,
 * "" -> 0. Anything that does not start with a number gives 0.
 */
export function toInteger(value: unknown): number {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? Math.trunc(value) : 0;
  }
  if (typeof value === 'boolean') {
    return value ? 1 : 0;
  }
  if (typeof value === 'string') {
    const parsed = isNumeric(value) ? Math.trunc(Number(value)) : parseInt(value.trim(), 10);
    return Number.isFinite(parsed) ? parsed : 0;
  }
  return 0;
}

/**
 * Rejects condition values that cannot go out as a single query parameter.
 */
export function assertScalarConditions(conditions: Record<string, unknown>): asserts conditions is Conditions {
  for (const [field, value] of Object.entries(conditions)) {
    if (typeof value !== 'string' && typeof value !== 'number' && typeof value !== 'boolean') {
      throw new InvalidCallError(
        `Condition "${field}" must be a string, number or boolean; array and object values are not supported`
      );
    }
  }
}

/**
 * Integer form of a numeric condition. Integer literals outside the safe
 * integer range keep their exact digits as a string; decimal and exponent
 * forms are truncated.
 */
export function toIntegerParam(value: string | number): string | number {
  if (typeof value === 'string') {
    const match = INTEGER_PATTERN.exec(value);
    if (match) {
      const [, sign, digits] = match;
      const parsed = Number(`${sign}${digits}`);
      if (Number.isSafeInteger(parsed)) {
        return parsed;
      }
      return sign === '-' ? `-${digits}` : digits;
    }
  }

  const truncated = toInteger(value);
  return Number.isSafeInteger(truncated) ? truncated : BigInt(truncated).toString();
}

function coerceCondition(value: ConditionValue): ConditionValue {
  if (typeof value !== 'boolean' && isNumeric(value)) {
    return toIntegerParam(value);
  }
  return value;
}

export interface QueryParamState {
  where: Conditions;
  select: readonly string[];
  limit: number | null;
  offset: number | null;
}

export interface QueryParamKeys {
  selectFieldsKey: string;
  limitKey: string;
  offsetKey: string;
}

/**
 * Serializes query state into a flat request query mapping.
 *
 * Key order: conditions (as given), selected fields, limit, offset.
 */
export function buildQueryParams(state: QueryParamState, keys: QueryParamKeys): QueryParams {
  assertScalarConditions(state.where);

  const query: QueryParams = {};

  for (const [field, value] of Object.entries(state.where)) {
    query[field] = coerceCondition(value);
  }

  if (state.select.length > 0) {
    query[keys.selectFieldsKey] = state.select.join(',');
  }
  if (state.limit !== null) {
    query[keys.limitKey] = state.limit;
  }
  if (state.offset !== null) {
    query[keys.offsetKey] = state.offset;
  }

  return query;
}
