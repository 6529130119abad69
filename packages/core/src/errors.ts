/**
 * Error Types
 *
 * The topology operations themselves never throw. These typed errors are
 * raised only by the validating layers around them (addresses, config).
 */

/**
 * Base class for every error raised by this package
 */
export abstract class NetsimError extends Error {
  abstract readonly code: string;

  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
  }
}

/**
 * An address whose levels are out of range or skip a parent level
 */
export class InvalidAddressError extends NetsimError {
  readonly code = "INVALID_ADDRESS";
  readonly errors: Record<string, string[]>;

  constructor(message = "Invalid address", errors: Record<string, string[]> = {}) {
    super(message);
    this.errors = errors;
  }
}

/**
 * Configuration values that failed validation
 */
export class ConfigError extends NetsimError {
  readonly code = "INVALID_CONFIG";
  readonly errors: Record<string, string[]>;

  constructor(message = "Invalid configuration", errors: Record<string, string[]> = {}) {
    super(message);
    this.errors = errors;
  }
}

/**
 * Check whether a value is one of this package's errors
 */
export function isNetsimError(error: unknown): error is NetsimError {
  return error instanceof NetsimError;
}
