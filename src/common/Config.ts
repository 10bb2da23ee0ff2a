import { InvalidAlphaError } from './Errors';

export const MIN_ALPHA = 0.5;
export const MAX_ALPHA = 1.0;
export const DEFAULT_ALPHA = 0.7;

export enum KeyType {
  INTEGER = 'integer',
  NUMBER = 'number',
  STRING = 'string',
}

export interface TreeConfig {
  alpha: number;
}

export interface ServiceConfig {
  httpPort: number;
  keyType: KeyType;
  verbose: boolean;
  tree: TreeConfig;
}

export const DEFAULT_TREE_CONFIG: TreeConfig = {
  alpha: DEFAULT_ALPHA,
};

export const DEFAULT_CONFIG: ServiceConfig = {
  httpPort: 3000,
  keyType: KeyType.INTEGER,
  verbose: false,
  tree: DEFAULT_TREE_CONFIG,
};

/**
 * Rejects alpha outside the open interval (0.5, 1). Out-of-range values are
 * never clamped.
 */
export function assertValidAlpha(alpha: number): void {
  if (!Number.isFinite(alpha) || alpha <= MIN_ALPHA || alpha >= MAX_ALPHA) {
    throw new InvalidAlphaError(alpha);
  }
}

export function resolveTreeConfig(config?: Partial<TreeConfig>): TreeConfig {
  const resolved = { ...DEFAULT_TREE_CONFIG, ...config };
  assertValidAlpha(resolved.alpha);
  return resolved;
}
