/**
 * RT (Remote Terminal)
 *
 * A terminal node with at most one owning AP. The owner is a non-owning
 * back-reference kept by the association manager; an AP reclaimed by the
 * garbage collector reads back as `null`.
 */

import { Node, formatLabel } from "./Node.js";
import type { AP } from "./AP.js";
import { getOwner } from "../topology/association.js";

export class RT extends Node {
  get kind(): "rt" {
    return "rt";
  }

  /**
   * The AP this terminal currently belongs to
   */
  get owner(): AP | null {
    return getOwner(this);
  }

  describe(): string {
    return formatLabel("RT", this.id);
  }

  upstream(): Node | null {
    return this.owner;
  }
}
