/**
 * Heartbeat statistics
 *
 * Each node counts its own heartbeat outcomes (`local`) and those of every
 * node below it in the ownership chain (`children`). An RT's heartbeat is
 * therefore also visible on its owning AP.
 */

import type { Node } from "../node/Node.js";

export interface HeartbeatCounter {
  success: number;
  failure: number;
}

export interface HeartbeatStats {
  local: HeartbeatCounter;
  children: HeartbeatCounter;
}

const statsOf = new WeakMap<Node, HeartbeatStats>();

export function createHeartbeatStats(): HeartbeatStats {
  return {
    local: { success: 0, failure: 0 },
    children: { success: 0, failure: 0 },
  };
}

function statsFor(node: Node): HeartbeatStats {
  let stats = statsOf.get(node);
  if (!stats) {
    stats = createHeartbeatStats();
    statsOf.set(node, stats);
  }
  return stats;
}

function bump(counter: HeartbeatCounter, success: boolean): void {
  if (success) {
    counter.success++;
  } else {
    counter.failure++;
  }
}

/**
 * Record a heartbeat outcome on `node`, then on the `children` counters of
 * every node above it.
 */
export function recordHeartbeat(node: Node, success: boolean): void {
  bump(statsFor(node).local, success);

  for (let up = node.upstream(); up !== null; up = up.upstream()) {
    bump(statsFor(up).children, success);
  }
}

/**
 * Snapshot of a node's counters
 *
 * With `reset`, the node starts counting from zero again; counters of
 * other nodes are untouched.
 */
export function takeHeartbeatStats(node: Node, options?: { reset?: boolean }): HeartbeatStats {
  const stats = statsFor(node);
  const snapshot: HeartbeatStats = {
    local: { ...stats.local },
    children: { ...stats.children },
  };
  if (options?.reset) {
    statsOf.set(node, createHeartbeatStats());
  }
  return snapshot;
}
