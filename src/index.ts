/**
 * Semantic Layer Governance
 *
 * Approval workflow, audit trail, role-based access control and
 * notification routing for changes to semantic-layer metrics and dimensions.
 *
 * @packageDocumentation
 */

import { createClient, type SupabaseClient } from "@supabase/supabase-js";
import {
  CHANNEL_NAMES,
  createGovernanceConfig,
  type GovernanceConfig,
  type GovernanceConfigInput,
} from "./config/index.js";
import { AccessControlManager } from "./core/access-control.js";
import { createApprovalArchive, type ApprovalArchive } from "./core/approval-archive.js";
import { ApprovalEngine } from "./core/approval-engine.js";
import { AuditLogger, FileAuditSink, type AuditSink } from "./core/audit-logger.js";
import { GovernanceService } from "./core/governance-service.js";
import {
  ChatWebhookChannel,
  EmailChannel,
  IncidentWebhookChannel,
  NotificationService,
  type FetchLike,
} from "./core/notifications.js";
import type { GovernancePolicyInput } from "./core/schemas.js";

// =============================================================================
// Version Info
// =============================================================================

export const VERSION = "0.1.0";

export const GOVERNANCE_PACKAGE = {
  name: "semantic-layer-governance",
  version: VERSION,
  description: "Approval, audit and access control for semantic layer changes",
} as const;

// =============================================================================
// Initialization
// =============================================================================

export interface CreateGovernanceOptions {
  /** Audit storage (default: FileAuditSink at config.auditFilePath) */
  auditSink?: AuditSink;
  /** Approval archive (default: Supabase when supabaseUrl and supabaseKey are set) */
  archive?: ApprovalArchive;
  /** Supabase client used for the default archive */
  supabaseClient?: SupabaseClient;
  /** fetch implementation handed to webhook channels */
  fetch?: FetchLike;
  /** Policies active from startup */
  policies?: GovernancePolicyInput[];
}

export interface Governance {
  config: GovernanceConfig;
  auditLogger: AuditLogger;
  accessControl: AccessControlManager;
  notifier: NotificationService;
  engine: ApprovalEngine;
  service: GovernanceService;
  archive?: ApprovalArchive;
}

function resolveArchive(
  config: GovernanceConfig,
  options: CreateGovernanceOptions
): ApprovalArchive | undefined {
  if (options.archive) return options.archive;
  if (options.supabaseClient) return createApprovalArchive(options.supabaseClient);
  if (config.supabaseUrl && config.supabaseKey) {
    return createApprovalArchive(
      createClient(config.supabaseUrl, config.supabaseKey, {
        auth: { persistSession: false, autoRefreshToken: false },
      })
    );
  }
  return undefined;
}

/**
 * Register the concrete channels the configuration provides. Routed names
 * without a registered channel report `false` on delivery.
 */
export function createNotificationService(
  config: GovernanceConfig,
  fetchImpl?: FetchLike
): NotificationService {
  const notifier = new NotificationService({ enabled: config.notificationsEnabled });

  if (config.chatWebhookUrl) {
    notifier.addChannel(
      CHANNEL_NAMES.SLACK_STEWARDS,
      new ChatWebhookChannel(config.chatWebhookUrl, { channel: "#data-stewards", fetch: fetchImpl })
    );
    notifier.addChannel(
      CHANNEL_NAMES.SLACK_GENERAL,
      new ChatWebhookChannel(config.chatWebhookUrl, { channel: "#data-governance", fetch: fetchImpl })
    );
  }
  if (config.incidentWebhookUrl) {
    notifier.addChannel(
      CHANNEL_NAMES.TEAMS_STEWARDS,
      new IncidentWebhookChannel(config.incidentWebhookUrl, { fetch: fetchImpl })
    );
  }
  if (config.adminEmails.length > 0) {
    notifier.addChannel(CHANNEL_NAMES.EMAIL_ADMINS, new EmailChannel(config.adminEmails));
  }

  return notifier;
}

/**
 * Wire the governance components from a configuration.
 *
 * @example
 * ```ts
 * const governance = createGovernance(loadGovernanceConfig());
 * governance.accessControl.addUser({ username: "admin", email: "admin@example.com", role: "admin" });
 *
 * const request = await governance.service.submitChange(admin, change);
 * ```
 */
export function createGovernance(
  configInput: GovernanceConfigInput = {},
  options: CreateGovernanceOptions = {}
): Governance {
  const config = createGovernanceConfig(configInput);

  const auditLogger = new AuditLogger(options.auditSink ?? new FileAuditSink(config.auditFilePath));
  const accessControl = new AccessControlManager();
  const notifier = createNotificationService(config, options.fetch);
  const archive = resolveArchive(config, options);

  const engine = new ApprovalEngine({
    auditLogger,
    notifier,
    accessControl,
    archive,
    policies: options.policies,
    maxPendingDays: config.maxPendingDays,
  });

  const service = new GovernanceService({
    engine,
    accessControl,
    auditLogger,
    notifier,
    requireJustification: config.requireJustification,
  });

  return { config, auditLogger, accessControl, notifier, engine, service, archive };
}

// =============================================================================
// Core Schemas and Types
// =============================================================================

export {
  ChangeTypeSchema,
  ApprovalStatusSchema,
  UserRoleSchema,
  PermissionSchema,
  ResourceSchema,
  UserSchema,
  DefinitionRecordSchema,
  SemanticChangeSchema,
  ApprovalRequestSchema,
  AuditEntrySchema,
  AutoApprovalCriterionSchema,
  GovernancePolicySchema,
  type ChangeType,
  type ApprovalStatus,
  type UserRole,
  type Permission,
  type Resource,
  type User,
  type UserInput,
  type DefinitionRecord,
  type SemanticChange,
  type SemanticChangeInput,
  type ApprovalRequest,
  type AuditEntry,
  type AutoApprovalCriterion,
  type GovernancePolicy,
  type GovernancePolicyInput,
} from "./core/schemas.js";

// =============================================================================
// Errors
// =============================================================================

export {
  GovernanceError,
  NotFoundError,
  PermissionDeniedError,
  ValidationError,
  isGovernanceError,
  type GovernanceErrorCode,
} from "./core/errors.js";

// =============================================================================
// Approval Engine
// =============================================================================

export {
  ApprovalEngine,
  SYSTEM_APPROVER,
  AUTO_APPROVAL_COMMENT,
  DEFAULT_MAX_PENDING_DAYS,
  type ApprovalEngineOptions,
  type StaleApproval,
} from "./core/approval-engine.js";

export {
  evaluateAutoApproval,
  matchesCriterion,
  type AutoApprovalDecision,
  type AutoApprovalRule,
} from "./core/auto-approval.js";

export {
  SupabaseApprovalArchive,
  InMemoryApprovalArchive,
  createApprovalArchive,
  createInMemoryApprovalArchive,
  type ApprovalArchive,
  type ArchiveQuery,
} from "./core/approval-archive.js";

// =============================================================================
// Audit Log
// =============================================================================

export {
  AuditLogger,
  FileAuditSink,
  InMemoryAuditSink,
  AUDIT_ACTIONS,
  DEFAULT_TRAIL_LIMIT,
  parseAuditLine,
  createFileAuditLogger,
  createInMemoryAuditLogger,
  type AuditAction,
  type AuditSink,
  type LogActionInput,
  type AuditTrailQuery,
  type ComplianceStatistics,
  type ComplianceReport,
  type IntegrityReport,
} from "./core/audit-logger.js";

// =============================================================================
// Access Control
// =============================================================================

export {
  AccessControlManager,
  createAccessControl,
  type PermissionSummary,
} from "./core/access-control.js";

// =============================================================================
// Notifications
// =============================================================================

export {
  NotificationService,
  ChatWebhookChannel,
  IncidentWebhookChannel,
  EmailChannel,
  type NotificationChannel,
  type NotificationMetadata,
  type FetchLike,
  type WebhookChannelOptions,
  type DeliveryResults,
  type ChannelTestResult,
  type StaleApprovalSummary,
  type SystemEventDetails,
} from "./core/notifications.js";

// =============================================================================
// Service Boundary
// =============================================================================

export {
  GovernanceService,
  DEFAULT_API_TRAIL_LIMIT,
  type GovernanceServiceOptions,
  type GovernanceHealth,
} from "./core/governance-service.js";

// =============================================================================
// Configuration
// =============================================================================

export {
  GovernanceConfigSchema,
  DEFAULT_GOVERNANCE_CONFIG,
  createGovernanceConfig,
  mergeGovernanceConfigs,
  loadGovernanceConfig,
  CHANNEL_GROUPS,
  CHANNEL_NAMES,
  DEFAULT_CHANNEL_ROUTING,
  isChannelGroup,
  DEFAULT_ROLE_PERMISSIONS,
  getRolePermissions,
  roleCoversResource,
  type GovernanceConfig,
  type GovernanceConfigInput,
  type ChannelGroup,
  type RolePermissionTable,
} from "./config/index.js";

// =============================================================================
// Migrations
// =============================================================================

export {
  MIGRATIONS,
  MIGRATION_ORDER,
  getMigrationsDir,
  getMigrationPath,
  readMigration,
  readAllMigrations,
  validateMigrations,
  type MigrationName,
} from "./migrations.js";
