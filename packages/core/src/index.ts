/**
 * @netsim/core - in-memory network topology model
 *
 * ## Entities
 * - Node: base entity with an integer id and a `Kind(id)` label
 * - AP: access point owning a set of RT members
 * - RT: remote terminal with a non-owning back-reference to its AP
 *
 * ## Modules
 * - identity: id constants and the process-wide random id generator
 * - topology: the AP/RT association manager and invariant checks
 * - address: hierarchical net/hub/ap/rt addresses
 * - heartbeat: per-node heartbeat counters
 */

// =============================================================================
// Entities
// =============================================================================
export { Node, formatLabel, type NodeKind } from './node/Node.js';
export { AP } from './node/AP.js';
export { RT } from './node/RT.js';

// =============================================================================
// Identity
// =============================================================================
export * from './identity/index.js';

// =============================================================================
// Topology
// =============================================================================
export * from './topology/index.js';

// =============================================================================
// Supporting modules
// =============================================================================
export * from './address/index.js';
export * from './heartbeat/index.js';
export * from './config.js';
export * from './errors.js';
