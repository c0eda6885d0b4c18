/**
 * Configuration Module
 *
 * This module provides configuration utilities and default settings
 * for semantic layer governance. It includes:
 *
 * - Default role permissions and notification routing
 * - The governance configuration schema
 * - Environment loading and override merging
 *
 * @example
 * ```typescript
 * import { loadGovernanceConfig } from "semantic-layer-governance/config";
 *
 * const config = loadGovernanceConfig(process.env);
 * ```
 */

import { z } from "zod";
import { ValidationError } from "../core/errors.js";

// Re-export all defaults
export * from "./defaults/index.js";

// =============================================================================
// Configuration Schema
// =============================================================================

export const GovernanceConfigSchema = z.object({
  /** Path of the newline-delimited JSON audit log */
  auditFilePath: z.string().min(1).default("semantic_audit.jsonl"),

  /** Pending requests older than this are considered stale */
  maxPendingDays: z.number().int().positive().default(7),

  /** Reject submissions without a justification at the service boundary */
  requireJustification: z.boolean().default(true),

  /** Master switch for notification delivery */
  notificationsEnabled: z.boolean().default(true),

  /** Chat webhook for steward and general channels */
  chatWebhookUrl: z.string().url().optional(),

  /** Incident webhook for the steward channel */
  incidentWebhookUrl: z.string().url().optional(),

  /** Recipients of the admin email channel */
  adminEmails: z.array(z.string().email()).default([]),

  /** Supabase project used to archive decided approval requests */
  supabaseUrl: z.string().url().optional(),
  supabaseKey: z.string().min(1).optional(),
});
export type GovernanceConfig = z.infer<typeof GovernanceConfigSchema>;
export type GovernanceConfigInput = z.input<typeof GovernanceConfigSchema>;

/**
 * Default governance configuration
 */
export const DEFAULT_GOVERNANCE_CONFIG: GovernanceConfig = GovernanceConfigSchema.parse({});

// =============================================================================
// Configuration Loading Utilities
// =============================================================================

/**
 * Create a configuration from partial overrides, applying defaults.
 */
export function createGovernanceConfig(overrides: GovernanceConfigInput = {}): GovernanceConfig {
  const result = GovernanceConfigSchema.safeParse(overrides);
  if (!result.success) {
    throw ValidationError.fromZod("governance configuration", result.error);
  }
  return result.data;
}

/**
 * Merge two configurations (second overrides first). Keys the override
 * leaves undefined keep the base value.
 */
export function mergeGovernanceConfigs(
  base: GovernanceConfig,
  override: GovernanceConfigInput
): GovernanceConfig {
  const defined = Object.fromEntries(
    Object.entries(override).filter(([, value]) => value !== undefined)
  );
  return createGovernanceConfig({ ...base, ...defined });
}

function parseBoolean(value: string | undefined): boolean | undefined {
  if (value === undefined || value.trim() === "") return undefined;
  const normalized = value.trim().toLowerCase();
  if (["1", "true", "yes", "on"].includes(normalized)) return true;
  if (["0", "false", "no", "off"].includes(normalized)) return false;
  throw new ValidationError(`Expected a boolean, received "${value}"`);
}

function parseInteger(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === "") return undefined;
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new ValidationError(`Expected an integer, received "${value}"`);
  }
  return parsed;
}

function parseList(value: string | undefined): string[] | undefined {
  if (value === undefined || value.trim() === "") return undefined;
  return value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

function nonEmpty(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === "" ? undefined : value.trim();
}

/**
 * Load configuration from environment variables.
 *
 * GOVERNANCE_AUDIT_FILE, GOVERNANCE_MAX_PENDING_DAYS,
 * GOVERNANCE_REQUIRE_JUSTIFICATION, GOVERNANCE_NOTIFICATIONS_ENABLED,
 * GOVERNANCE_CHAT_WEBHOOK_URL, GOVERNANCE_INCIDENT_WEBHOOK_URL,
 * GOVERNANCE_ADMIN_EMAILS (comma separated), SUPABASE_URL,
 * SUPABASE_SERVICE_ROLE_KEY.
 */
export function loadGovernanceConfig(
  env: Record<string, string | undefined> = process.env
): GovernanceConfig {
  return createGovernanceConfig({
    auditFilePath: nonEmpty(env.GOVERNANCE_AUDIT_FILE),
    maxPendingDays: parseInteger(env.GOVERNANCE_MAX_PENDING_DAYS),
    requireJustification: parseBoolean(env.GOVERNANCE_REQUIRE_JUSTIFICATION),
    notificationsEnabled: parseBoolean(env.GOVERNANCE_NOTIFICATIONS_ENABLED),
    chatWebhookUrl: nonEmpty(env.GOVERNANCE_CHAT_WEBHOOK_URL),
    incidentWebhookUrl: nonEmpty(env.GOVERNANCE_INCIDENT_WEBHOOK_URL),
    adminEmails: parseList(env.GOVERNANCE_ADMIN_EMAILS),
    supabaseUrl: nonEmpty(env.SUPABASE_URL),
    supabaseKey: nonEmpty(env.SUPABASE_SERVICE_ROLE_KEY),
  });
}
