/**
 * Key schemas - how raw string keys from the outside world become tree keys
 *
 * Each KeyType pairs a parser with the strict ordering the tree uses for it.
 */

import { KeyType } from '../common/Config';
import { InvalidKeyError } from '../common/Errors';
import { defaultIsLessThan, integerLessThan } from '../common/Ordering';
import { LessThan, TreeKey } from '../common/Types';

export interface KeySchema<K extends TreeKey> {
  readonly type: KeyType;
  readonly isLessThan: LessThan<K>;
  parse(raw: string): K;
  format(key: K): string;
}

const INTEGER_PATTERN = /^[+-]?\d+$/;

export const INTEGER_KEYS: KeySchema<number> = {
  type: KeyType.INTEGER,
  isLessThan: integerLessThan,
  parse(raw: string): number {
    if (!INTEGER_PATTERN.test(raw)) {
      throw new InvalidKeyError(raw, 'expected an integer');
    }
    const value = Number(raw);
    if (!Number.isSafeInteger(value)) {
      throw new InvalidKeyError(raw, 'integer out of safe range');
    }
    // Normalise -0 so that "0" and "-0" address the same key
    return value === 0 ? 0 : value;
  },
  format: String,
};

export const NUMBER_KEYS: KeySchema<number> = {
  type: KeyType.NUMBER,
  isLessThan: defaultIsLessThan,
  parse(raw: string): number {
    const value = raw.trim() === '' ? NaN : Number(raw);
    if (!Number.isFinite(value)) {
      throw new InvalidKeyError(raw, 'expected a finite number');
    }
    return value === 0 ? 0 : value;
  },
  format: String,
};

export const STRING_KEYS: KeySchema<string> = {
  type: KeyType.STRING,
  isLessThan: defaultIsLessThan,
  parse(raw: string): string {
    if (raw.length === 0) {
      throw new InvalidKeyError(raw, 'must be non-empty string');
    }
    return raw;
  },
  format: (key) => JSON.stringify(key),
};
