/**
 * Topology configuration
 *
 * Process-wide settings for the association manager. Values come from
 * defaults, then the environment (`loadConfig`), then explicit overrides
 * (`configureTopology`). Every layer is validated with the same schema.
 */

import { z } from "zod";
import { ConfigError } from "./errors.js";

// ============================================================================
// Schema
// ============================================================================

/**
 * How `addMember` treats an RT that already belongs to another AP.
 *
 * - `retain`: the previous AP keeps the RT in its member set; only the
 *   back-reference moves. Re-parenting is then a remove-then-add protocol.
 * - `detach`: the RT is removed from its previous AP before it is added.
 */
export const ReparentPolicySchema = z.enum(["retain", "detach"]);

export type ReparentPolicy = z.infer<typeof ReparentPolicySchema>;

/**
 * Flag parsed from environment strings (`1`, `true`, `yes`, `on`)
 */
const envFlag = z
  .union([z.boolean(), z.string()])
  .transform((v) => (typeof v === "string" ? ["1", "true", "yes", "on"].includes(v.trim().toLowerCase()) : v));

export const TopologyConfigSchema = z.object({
  reparentPolicy: ReparentPolicySchema.default("retain"),
  debug: envFlag.default(false),
});

export type TopologyConfig = z.output<typeof TopologyConfigSchema>;
export type TopologyConfigInput = z.input<typeof TopologyConfigSchema>;

export const DEFAULT_CONFIG: TopologyConfig = TopologyConfigSchema.parse({});

/** Environment variables read by `loadConfig` */
export const ENV_REPARENT_POLICY = "NETSIM_REPARENT_POLICY";
export const ENV_DEBUG = "NETSIM_DEBUG";

// ============================================================================
// Parsing
// ============================================================================

function parseConfig(input: unknown): TopologyConfig {
  const result = TopologyConfigSchema.safeParse(input);
  if (!result.success) {
    const { fieldErrors } = result.error.flatten();
    const errors: Record<string, string[]> = {};
    for (const [field, messages] of Object.entries(fieldErrors)) {
      if (messages && messages.length > 0) errors[field] = messages;
    }
    throw new ConfigError(`Invalid topology configuration: ${Object.keys(errors).join(", ")}`, errors);
  }
  return result.data;
}

/**
 * Build a config from environment variables; unset variables keep defaults.
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): TopologyConfig {
  return parseConfig({
    reparentPolicy: env[ENV_REPARENT_POLICY] || undefined,
    debug: env[ENV_DEBUG] || undefined,
  });
}

// ============================================================================
// Process-wide settings
// ============================================================================

let current: TopologyConfig | null = null;

/**
 * Get the active config, loading it from the environment on first use.
 *
 * Invalid environment values fall back to the defaults so that topology
 * operations never fail on a config problem; call `loadConfig` directly to
 * surface the error instead.
 */
export function getConfig(): TopologyConfig {
  if (current === null) {
    try {
      current = loadConfig();
    } catch (error) {
      if (!(error instanceof ConfigError)) throw error;
      current = { ...DEFAULT_CONFIG, debug: envFlag.parse(process.env[ENV_DEBUG] || false) };
      if (current.debug) {
        console.debug(`getConfig: ignoring invalid environment (${error.message}), using defaults`);
      }
    }
  }
  return current;
}

/**
 * Merge overrides into the active config
 *
 * @throws ConfigError if the merged values fail validation
 */
export function configureTopology(overrides: Partial<TopologyConfigInput>): TopologyConfig {
  const defined = Object.fromEntries(Object.entries(overrides).filter(([, v]) => v !== undefined));
  current = parseConfig({ ...getConfig(), ...defined });
  return current;
}

/**
 * Drop the active config so the next read reloads it from the environment.
 * Intended for tests.
 */
export function resetConfig(): void {
  current = null;
}
