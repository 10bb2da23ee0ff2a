import { IncomparableKeyError } from './Errors';
import { Comparator, LessThan } from './Types';

function describeKey(value: unknown): string {
  if (typeof value === 'bigint') return `${value}n`;
  if (typeof value === 'string') return JSON.stringify(value);
  if (typeof value === 'number') return String(value);
  return value === null ? 'null' : typeof value;
}

function incomparable(lhs: unknown, rhs: unknown): IncomparableKeyError {
  return new IncomparableKeyError(
    `No natural ordering between ${describeKey(lhs)} and ${describeKey(rhs)}; supply an isLessThan function`
  );
}

/**
 * Natural order for numbers, strings (UTF-16 code unit order) and bigints.
 * NaN and mixed or other key types have no strict total order and throw.
 */
export function defaultIsLessThan<K>(lhs: K, rhs: K): boolean {
  if (typeof lhs === 'number' && typeof rhs === 'number') {
    if (Number.isNaN(lhs) || Number.isNaN(rhs)) {
      throw incomparable(lhs, rhs);
    }
    return lhs < rhs;
  }
  if (typeof lhs === 'string' && typeof rhs === 'string') {
    return lhs < rhs;
  }
  if (typeof lhs === 'bigint' && typeof rhs === 'bigint') {
    return lhs < rhs;
  }
  throw incomparable(lhs, rhs);
}

/**
 * Ordering for integer-keyed trees.
 */
export function integerLessThan(lhs: number, rhs: number): boolean {
  if (!Number.isSafeInteger(lhs) || !Number.isSafeInteger(rhs)) {
    throw new IncomparableKeyError(`Integer keys required, got ${lhs} and ${rhs}`);
  }
  return lhs < rhs;
}

export function lessThanFrom<K>(comparator: Comparator<K>): LessThan<K> {
  return (lhs, rhs) => comparator(lhs, rhs) < 0;
}
