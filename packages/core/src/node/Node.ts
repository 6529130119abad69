/**
 * Node - base entity of the topology
 *
 * Carries a plain integer id and a display label. AP and RT extend it with
 * one level of inheritance; `kind` tags the concrete type so callers can
 * branch without `instanceof`.
 */

import { generateId } from "../identity/idGenerator.js";
import { INVALID_ID } from "../identity/ids.js";

/**
 * Concrete type tag of a node
 */
export type NodeKind = "node" | "ap" | "rt";

/**
 * Format the `"<Kind>(<id>)"` label shared by every node kind
 */
export function formatLabel(kindName: string, id: number): string {
  return `${kindName}(${id})`;
}

export class Node {
  /**
   * Identifier. Writable; uniqueness is up to the caller.
   */
  id: number;

  /**
   * @param requestedId Exact id to use, taken verbatim. Omitted or
   *   `INVALID_ID` draws a random id in `[1, MAX_ID]`.
   */
  constructor(requestedId?: number) {
    this.id = requestedId === undefined || requestedId === INVALID_ID ? generateId() : requestedId;
  }

  get kind(): NodeKind {
    return "node";
  }

  /**
   * Human-readable label, e.g. `Node(7)`
   */
  describe(): string {
    return formatLabel("Node", this.id);
  }

  /**
   * The node one level up the ownership chain, if any
   */
  upstream(): Node | null {
    return null;
  }

  toString(): string {
    return this.describe();
  }
}
