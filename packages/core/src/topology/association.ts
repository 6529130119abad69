/**
 * AP/RT Association Manager
 *
 * The only place that mutates AP member sets and RT owner references. Both
 * sides of a pair are updated within a single synchronous call, so no
 * caller observes one side changed without the other.
 *
 * State per (AP, RT) pair:
 * - Unassociated: RT not in the AP's members, RT's owner is not the AP
 * - Associated: RT in the AP's members, RT's owner is exactly the AP
 *
 * Storage:
 * - members: AP -> Set<RT>, strong. An AP keeps its members reachable.
 * - owner: RT -> WeakRef<AP>. The back-reference never keeps an AP alive;
 *   once the AP is reclaimed the owner reads back as null.
 */

import type { AP } from "../node/AP.js";
import type { RT } from "../node/RT.js";
import { getConfig, type ReparentPolicy } from "../config.js";

const membersOf = new WeakMap<AP, Set<RT>>();
const ownerOf = new WeakMap<RT, WeakRef<AP>>();

/**
 * Per-call overrides for addMember
 */
export interface AddMemberOptions {
  /** Overrides the configured re-parenting policy for this call */
  reparentPolicy?: ReparentPolicy;
}

function memberSet(ap: AP): Set<RT> {
  let set = membersOf.get(ap);
  if (!set) {
    set = new Set();
    membersOf.set(ap, set);
  }
  return set;
}

// ============================================================================
// Queries
// ============================================================================

/**
 * Snapshot of an AP's current members. Changing the returned set does not
 * change the AP; use addMember/removeMember.
 */
export function getMembers(ap: AP): ReadonlySet<RT> {
  return new Set(memberSet(ap));
}

/**
 * Current owner of an RT, or null if it has none (or the owner was reclaimed)
 */
export function getOwner(rt: RT): AP | null {
  const ref = ownerOf.get(rt);
  if (!ref) return null;
  const ap = ref.deref();
  if (ap === undefined) {
    ownerOf.delete(rt);
    return null;
  }
  return ap;
}

/**
 * Check whether an RT is in an AP's member set and points back at it
 */
export function isAssociated(ap: AP, rt: RT): boolean {
  return memberSet(ap).has(rt) && getOwner(rt) === ap;
}

// ============================================================================
// Mutations
// ============================================================================

/**
 * Add `rt` to `ap` and set `rt`'s owner to `ap`. Idempotent.
 *
 * If `rt` already belongs to a different AP, the `retain` policy (default)
 * moves only the back-reference and leaves `rt` in the previous AP's member
 * set; callers re-parent by calling removeMember on the old AP first. The
 * `detach` policy removes `rt` from the previous AP before adding it here.
 */
export function addMember(ap: AP, rt: RT, options?: AddMemberOptions): void {
  const config = getConfig();
  const policy = options?.reparentPolicy ?? config.reparentPolicy;
  const previous = getOwner(rt);

  if (previous !== null && previous !== ap) {
    if (policy === "detach") {
      memberSet(previous).delete(rt);
    } else if (config.debug) {
      console.debug(
        `addMember: ${rt.describe()} moved to ${ap.describe()} but is still listed under ${previous.describe()}`
      );
    }
  }

  memberSet(ap).add(rt);
  ownerOf.set(rt, new WeakRef(ap));
}

/**
 * Remove `rt` from `ap`'s member set (no-op if absent) and clear `rt`'s
 * owner.
 *
 * The owner is cleared unconditionally, even when it referred to an AP
 * other than `ap`.
 */
export function removeMember(ap: AP, rt: RT): void {
  const previous = getOwner(rt);
  if (previous !== null && previous !== ap && getConfig().debug) {
    console.debug(
      `removeMember: clearing owner ${previous.describe()} of ${rt.describe()} via ${ap.describe()}`
    );
  }

  memberSet(ap).delete(rt);
  ownerOf.delete(rt);
}
