import { TreeStats, TreeVisitor } from '../common/Types';

/**
 * Public contract of an in-memory ordered set.
 * "Already present" and "not found" are ordinary boolean outcomes.
 */
export interface IOrderedSet<K> {
  readonly size: number;

  search(key: K): boolean;
  insert(key: K): boolean;
  remove(key: K): boolean;

  /**
   * Correctness oracle over the whole structure. Not used on the hot path.
   */
  verify(): boolean;

  clear(): void;
  traverse(visitor: TreeVisitor<K>): void;
  getStats(): TreeStats;
}

export interface KeyResult {
  readonly key: string;
}

export interface SearchResult extends KeyResult {
  readonly present: boolean;
}

export interface InsertResult extends KeyResult {
  readonly inserted: boolean;
}

export interface RemoveResult extends KeyResult {
  readonly removed: boolean;
}

/**
 * String-keyed facade used by the HTTP layer. Raw keys are parsed according
 * to the configured key type.
 */
export interface ISetService {
  search(rawKey: string): SearchResult;
  insert(rawKey: string): InsertResult;
  remove(rawKey: string): RemoveResult;
  verify(): boolean;
  stats(): TreeStats;
  debugDump(): string;
  clear(): void;
}
