/**
 * Custom error types for the ordered-set library and its service.
 *
 * Design: Typed errors allow callers to tell a bad argument (InvalidAlphaError,
 * InvalidKeyError) apart from a broken internal structure (TreeCorruptionError).
 */

export class TreeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TreeError';
    Error.captureStackTrace(this, this.constructor);
  }
}

export class InvalidAlphaError extends TreeError {
  readonly alpha: number;

  constructor(alpha: number) {
    super(`Alpha not in range (0.5, 1): ${alpha}`);
    this.name = 'InvalidAlphaError';
    this.alpha = alpha;
  }
}

export class IncomparableKeyError extends TreeError {
  constructor(message: string) {
    super(message);
    this.name = 'IncomparableKeyError';
  }
}

export class TreeCorruptionError extends TreeError {
  constructor(message: string) {
    super(`Tree corrupted: ${message}`);
    this.name = 'TreeCorruptionError';
  }
}

export class InvalidKeyError extends TreeError {
  readonly rawKey: string;

  constructor(rawKey: string, reason: string) {
    super(`Invalid key "${rawKey}": ${reason}`);
    this.name = 'InvalidKeyError';
    this.rawKey = rawKey;
  }
}

export class ConfigError extends TreeError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}
