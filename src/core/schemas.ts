/**
 * Semantic Layer Governance - Zod Schemas
 *
 * Type-safe schemas for semantic changes, approval requests, audit entries,
 * users and governance policies. These schemas provide runtime validation
 * at the service boundary and TypeScript type inference everywhere else.
 */

import { z } from "zod";

// =============================================================================
// Enumerations
// =============================================================================

/**
 * Kind of mutation a change applies to a metric or dimension.
 */
export const ChangeTypeSchema = z.enum(["create", "update", "delete"]);
export type ChangeType = z.infer<typeof ChangeTypeSchema>;

/**
 * Approval request status.
 *
 * pending           - Waiting for a steward or admin decision
 * approved          - Approved by a human or by the auto-approval policy
 * rejected          - Rejected by a human
 * changes_requested - Reserved for review rounds; never produced by the engine
 */
export const ApprovalStatusSchema = z.enum([
  "pending",
  "approved",
  "rejected",
  "changes_requested",
]);
export type ApprovalStatus = z.infer<typeof ApprovalStatusSchema>;

/**
 * Roles a governance user can hold.
 */
export const UserRoleSchema = z.enum(["analyst", "steward", "admin"]);
export type UserRole = z.infer<typeof UserRoleSchema>;

export const PermissionSchema = z.enum(["read", "write", "approve", "delete", "admin"]);
export type Permission = z.infer<typeof PermissionSchema>;

export const ResourceSchema = z.enum([
  "metric",
  "dimension",
  "adapter",
  "approval",
  "audit",
  "user",
]);
export type Resource = z.infer<typeof ResourceSchema>;

// =============================================================================
// Users
// =============================================================================

/**
 * A governance user. `teams` lists the domains the user belongs to;
 * `permissions` holds per-resource overrides (resource -> permission names).
 */
export const UserSchema = z.object({
  username: z.string().min(1),
  email: z.string().email(),
  role: UserRoleSchema,
  teams: z.array(z.string().min(1)).default([]),
  permissions: z.record(z.array(z.string())).default({}),
});
export type User = z.infer<typeof UserSchema>;

/**
 * Input accepted when registering a user (defaults not yet applied).
 */
export type UserInput = z.input<typeof UserSchema>;

// =============================================================================
// Semantic Definitions (collaborator contract)
// =============================================================================

/**
 * Shape of a metric or dimension definition as provided by the definition
 * store. Governance treats it as an opaque record and never parses the
 * expression.
 */
export const DefinitionRecordSchema = z
  .object({
    name: z.string().min(1),
    definition: z.string(),
    filters: z.array(z.string()).optional(),
    owner: z.string().optional(),
    tags: z.array(z.string()).optional(),
  })
  .passthrough();
export type DefinitionRecord = z.infer<typeof DefinitionRecordSchema>;

// =============================================================================
// Semantic Change
// =============================================================================

/**
 * A proposed mutation to a named metric or dimension.
 * `breakingChange` is asserted by the author and disables auto-approval.
 */
export const SemanticChangeSchema = z.object({
  id: z.string().min(1),
  changeType: ChangeTypeSchema,
  metricName: z.string().min(1),
  oldDefinition: z.record(z.unknown()).optional(),
  newDefinition: z.record(z.unknown()),
  author: z.string().min(1),
  authorEmail: z.string(),
  createdAt: z.coerce.date(),
  description: z.string(),
  justification: z.string(),
  affectedAdapters: z.array(z.string()).default([]),
  breakingChange: z.boolean().default(false),
});
export type SemanticChange = z.infer<typeof SemanticChangeSchema>;
export type SemanticChangeInput = z.input<typeof SemanticChangeSchema>;

// =============================================================================
// Approval Request
// =============================================================================

/**
 * Governance record tracking one SemanticChange through review.
 * The change is referenced by id, never embedded.
 */
export const ApprovalRequestSchema = z.object({
  id: z.string().uuid(),
  changeId: z.string().min(1),
  metricName: z.string().min(1),
  status: ApprovalStatusSchema,
  approver: z.string().nullable(),
  approvedAt: z.coerce.date().nullable(),
  comments: z.string(),
  autoApproved: z.boolean(),
  approvalCriteria: z.record(z.unknown()),
  createdAt: z.coerce.date(),
});
export type ApprovalRequest = z.infer<typeof ApprovalRequestSchema>;

// =============================================================================
// Audit Entry
// =============================================================================

/**
 * One immutable audit fact: who did what, to what, when.
 */
export const AuditEntrySchema = z.object({
  id: z.string().min(1),
  timestamp: z.date(),
  user: z.string(),
  action: z.string().min(1),
  resourceType: z.string().min(1),
  resourceId: z.string(),
  details: z.record(z.unknown()),
  ipAddress: z.string().optional(),
  userAgent: z.string().optional(),
});
export type AuditEntry = z.infer<typeof AuditEntrySchema>;

// =============================================================================
// Governance Policy
// =============================================================================

/**
 * Auto-approval criterion. Every key present must match the change;
 * absent keys are wildcards. `owner` lists the authors allowed to match.
 */
export const AutoApprovalCriterionSchema = z.object({
  changeType: ChangeTypeSchema.optional(),
  breakingChange: z.boolean().optional(),
  owner: z.array(z.string()).optional(),
});
export type AutoApprovalCriterion = z.infer<typeof AutoApprovalCriterionSchema>;

/**
 * Named bundle of auto-approval criteria and review settings.
 * A change is auto-approvable if it matches ANY criterion of ANY policy.
 */
export const GovernancePolicySchema = z.object({
  name: z.string().min(1),
  description: z.string().default(""),
  rules: z.array(z.record(z.unknown())).default([]),
  autoApprovalCriteria: z.array(AutoApprovalCriterionSchema).default([]),
  requiredApprovers: z.number().int().positive().default(1),
  stewardDomains: z.array(z.string()).default([]),
  notificationChannels: z.array(z.string()).default([]),
});
export type GovernancePolicy = z.infer<typeof GovernancePolicySchema>;
export type GovernancePolicyInput = z.input<typeof GovernancePolicySchema>;
