/**
 * Hierarchical node addresses
 *
 * An address locates a node in the net > hub > ap > rt hierarchy. Each level
 * is optional, but a level may only be set when every level above it is set.
 * The tag is a compact string form, e.g. `N01H02A0aR03`, used for display
 * and equality.
 */

import { z } from "zod";
import { InvalidAddressError } from "../errors.js";

const level = z.number().int().nonnegative();

export const AddressSchema = z
  .object({
    net: level.optional(),
    hub: level.optional(),
    ap: level.optional(),
    rt: level.optional(),
  })
  .strict();

export type Address = Readonly<z.output<typeof AddressSchema>>;

export type AddressKind = "root" | "net" | "hub" | "ap" | "rt";

const LEVELS = [
  ["net", "N"],
  ["hub", "H"],
  ["ap", "A"],
  ["rt", "R"],
] as const;

/**
 * Parse and validate an address
 *
 * @throws InvalidAddressError on malformed levels or a skipped parent level
 */
export function parseAddress(input: unknown): Address {
  const result = AddressSchema.safeParse(input);
  if (!result.success) {
    const { fieldErrors, formErrors } = result.error.flatten();
    const errors: Record<string, string[]> = {};
    for (const [field, messages] of Object.entries(fieldErrors)) {
      if (messages && messages.length > 0) errors[field] = messages;
    }
    if (formErrors.length > 0) errors._ = formErrors;
    throw new InvalidAddressError("Invalid address", errors);
  }

  const addr = result.data;
  if (addr.rt !== undefined && addr.ap === undefined) {
    throw new InvalidAddressError("If 'rt' is set, 'ap' must also be set", { rt: ["requires ap"] });
  }
  if (addr.ap !== undefined && addr.hub === undefined) {
    throw new InvalidAddressError("If 'ap' is set, 'hub' must also be set", { ap: ["requires hub"] });
  }
  if (addr.hub !== undefined && addr.net === undefined) {
    throw new InvalidAddressError("If 'hub' is set, 'net' must also be set", { hub: ["requires net"] });
  }
  return Object.freeze(addr);
}

function hex2(n: number): string {
  return n.toString(16).padStart(2, "0");
}

/**
 * Compact string form of an address (empty string for the root)
 */
export function addressTag(addr: Address): string {
  let tag = "";
  for (const [key, prefix] of LEVELS) {
    const value = addr[key];
    if (value !== undefined) tag += `${prefix}${hex2(value)}`;
  }
  return tag;
}

export function addressEquals(a: Address, b: Address): boolean {
  return addressTag(a) === addressTag(b);
}

/**
 * The deepest level set on an address
 */
export function addressKind(addr: Address): AddressKind {
  if (addr.rt !== undefined) return "rt";
  if (addr.ap !== undefined) return "ap";
  if (addr.hub !== undefined) return "hub";
  if (addr.net !== undefined) return "net";
  return "root";
}

/**
 * Address of the enclosing level, or null for the root
 */
export function parentAddress(addr: Address): Address | null {
  const kind = addressKind(addr);
  if (kind === "root") return null;
  const parent = { ...addr };
  delete parent[kind];
  return Object.freeze(parent);
}
