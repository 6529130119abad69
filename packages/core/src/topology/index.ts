/**
 * Topology module
 *
 * - association.ts: the AP/RT association manager
 * - validate.ts: two-sided invariant checks
 */

export * from "./association.js";
export * from "./validate.js";
