/**
 * AP (Access Point)
 *
 * An aggregation node that owns a set of RT members. Membership changes go
 * through the association manager so that both sides of the relationship
 * are updated in one step.
 */

import { Node, formatLabel } from "./Node.js";
import type { RT } from "./RT.js";
import { addMember, removeMember, getMembers, type AddMemberOptions } from "../topology/association.js";

export class AP extends Node {
  get kind(): "ap" {
    return "ap";
  }

  /**
   * Snapshot of the current members (mutate with addMember/removeMember)
   */
  get members(): ReadonlySet<RT> {
    return getMembers(this);
  }

  /**
   * Add an RT to this AP and point its owner here. Idempotent.
   */
  addMember(rt: RT, options?: AddMemberOptions): void {
    addMember(this, rt, options);
  }

  /**
   * Remove an RT from this AP and clear its owner
   */
  removeMember(rt: RT): void {
    removeMember(this, rt);
  }

  describe(): string {
    return formatLabel("AP", this.id);
  }
}
