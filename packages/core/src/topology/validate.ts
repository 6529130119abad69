/**
 * Topology validation
 *
 * Checks the two-sided AP/RT invariant over a set of nodes. The association
 * manager always sets the back-reference together with the member entry, so
 * the only reachable violation is a stale member: an AP listing an RT whose
 * owner has since moved to another AP (or been cleared). The `retain`
 * re-parenting policy leaves exactly this state behind.
 *
 * APs reachable as owners of the given RTs, and RTs reachable as members of
 * the given APs, are checked as well.
 */

import { AP } from "../node/AP.js";
import { RT } from "../node/RT.js";
import type { Node } from "../node/Node.js";

/**
 * A single invariant violation
 */
export interface TopologyIssue {
  kind: "staleMember";
  /** Human-readable description */
  message: string;
  /** The AP side of the pair */
  ap: AP;
  /** The RT side of the pair */
  rt: RT;
}

export interface TopologyReport {
  /** True when every pair satisfies the two-sided invariant */
  isConsistent: boolean;
  issues: TopologyIssue[];
  /** Number of distinct APs and RTs inspected */
  apCount: number;
  rtCount: number;
}

function collect(nodes: Iterable<Node>): { aps: Set<AP>; rts: Set<RT> } {
  const aps = new Set<AP>();
  const rts = new Set<RT>();

  for (const node of nodes) {
    if (node instanceof AP) {
      aps.add(node);
    } else if (node instanceof RT) {
      rts.add(node);
    }
  }

  for (const ap of aps) {
    for (const rt of ap.members) rts.add(rt);
  }
  for (const rt of rts) {
    const owner = rt.owner;
    if (owner) aps.add(owner);
  }

  return { aps, rts };
}

/**
 * Validate the AP/RT relationships among `nodes`
 */
export function validateTopology(nodes: Iterable<Node>): TopologyReport {
  const { aps, rts } = collect(nodes);
  const issues: TopologyIssue[] = [];

  for (const ap of aps) {
    for (const rt of ap.members) {
      const owner = rt.owner;
      if (owner !== ap) {
        issues.push({
          kind: "staleMember",
          message: owner
            ? `${ap.describe()} lists ${rt.describe()}, which is owned by ${owner.describe()}`
            : `${ap.describe()} lists ${rt.describe()}, which has no owner`,
          ap,
          rt,
        });
      }
    }
  }

  return {
    isConsistent: issues.length === 0,
    issues,
    apCount: aps.size,
    rtCount: rts.size,
  };
}

/**
 * Quick check: true when every pair satisfies the two-sided invariant
 */
export function isConsistent(nodes: Iterable<Node>): boolean {
  return validateTopology(nodes).isConsistent;
}
