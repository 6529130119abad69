/**
 * Node identifier constants
 *
 * Identifiers are plain integers. Nothing here enforces uniqueness or range
 * on ids supplied by a caller; only the sentinel has special meaning.
 */

/**
 * Sentinel meaning "no id requested": the node draws a random one
 */
export const INVALID_ID = -1;

/**
 * Upper bound (inclusive) of generated ids; the lower bound is 1
 */
export const MAX_ID = 1_000_000;

