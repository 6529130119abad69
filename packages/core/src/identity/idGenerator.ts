/**
 * Random identifier generation
 *
 * A single generator instance is shared by the whole process. It is created
 * on first use, seeded once from the platform's cryptographic random
 * source, and reused for every later id; it is never reseeded per call.
 *
 * Usage:
 * - `generateId()` draws from the shared generator
 * - Tests that need reproducible ids call `resetGlobalIdGenerator(seed)`
 */

import { getRandomValues } from "node:crypto";
import { MAX_ID } from "./ids.js";

// ============================================================================
// IdGenerator Class
// ============================================================================

/**
 * Seedable 32-bit PRNG (mulberry32) producing ids in `[1, max]`
 */
export class IdGenerator {
  private _state: number;
  private readonly _max: number;

  /**
   * @throws RangeError if `max` is not a positive integer
   */
  constructor(seed: number, max: number = MAX_ID) {
    if (!Number.isInteger(max) || max < 1) {
      throw new RangeError(`IdGenerator max must be a positive integer, got ${max}`);
    }
    this._state = seed >>> 0;
    this._max = max;
  }

  /**
   * Next raw 32-bit unsigned value
   */
  nextUint32(): number {
    this._state = (this._state + 0x6d2b79f5) >>> 0;
    let t = this._state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return (t ^ (t >>> 14)) >>> 0;
  }

  /**
   * Next id, uniform over `[1, max]`
   */
  next(): number {
    // Reject the tail of the 32-bit range so every residue is equally likely
    const limit = Math.floor(0x1_0000_0000 / this._max) * this._max;
    let x = this.nextUint32();
    while (x >= limit) {
      x = this.nextUint32();
    }
    return 1 + (x % this._max);
  }

  get max(): number {
    return this._max;
  }
}

// ============================================================================
// Process-wide Generator
// ============================================================================

let globalGenerator: IdGenerator | null = null;

/**
 * Draw a 32-bit seed from the system's non-deterministic source
 */
export function systemSeed(): number {
  const buf = new Uint32Array(1);
  getRandomValues(buf);
  return buf[0] ?? 0;
}

/**
 * Get the shared generator, creating it on first use
 */
export function getGlobalIdGenerator(): IdGenerator {
  if (globalGenerator === null) {
    globalGenerator = new IdGenerator(systemSeed());
  }
  return globalGenerator;
}

/**
 * Replace the shared generator
 *
 * With a seed the sequence becomes reproducible; without one the next call
 * to `generateId()` seeds a fresh generator from the system source.
 * Intended for tests.
 */
export function resetGlobalIdGenerator(seed?: number): void {
  globalGenerator = seed === undefined ? null : new IdGenerator(seed);
}

/**
 * Generate a random id in `[1, MAX_ID]`
 */
export function generateId(): number {
  return getGlobalIdGenerator().next();
}
