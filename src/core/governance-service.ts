/**
 * Governance Service - Boundary Checks in Front of the Engine
 *
 * Validates caller input, enforces role and domain permissions, and records
 * administrative actions in the audit log before delegating to the approval
 * engine, access-control manager and audit logger. An API layer maps the
 * thrown errors to responses:
 *
 * - ValidationError       -> 400
 * - PermissionDeniedError -> 403
 * - NotFoundError         -> 404
 */

import type { AccessControlManager, PermissionSummary } from "./access-control.js";
import type { ApprovalEngine } from "./approval-engine.js";
import {
  AUDIT_ACTIONS,
  type AuditLogger,
  type AuditTrailQuery,
  type ComplianceReport,
  type IntegrityReport,
} from "./audit-logger.js";
import { PermissionDeniedError, ValidationError } from "./errors.js";
import type { ChannelTestResult, NotificationService } from "./notifications.js";
import {
  SemanticChangeSchema,
  UserSchema,
  type ApprovalRequest,
  type AuditEntry,
  type SemanticChangeInput,
  type User,
  type UserInput,
} from "./schemas.js";

export const DEFAULT_API_TRAIL_LIMIT = 100;

export interface GovernanceServiceOptions {
  engine: ApprovalEngine;
  accessControl: AccessControlManager;
  auditLogger: AuditLogger;
  notifier: NotificationService;
  /** Reject submissions with an empty justification (default: true) */
  requireJustification?: boolean;
}

export interface GovernanceHealth {
  status: "healthy" | "degraded";
  auditIntegrity: IntegrityReport;
  pendingApprovals: number;
  timestamp: string;
}

function requireAdmin(actor: User, action: string): void {
  if (actor.role !== "admin") {
    throw new PermissionDeniedError(actor.username, `Only administrators can ${action}`);
  }
}

export class GovernanceService {
  private readonly engine: ApprovalEngine;
  private readonly accessControl: AccessControlManager;
  private readonly auditLogger: AuditLogger;
  private readonly notifier: NotificationService;
  private readonly requireJustification: boolean;

  constructor(options: GovernanceServiceOptions) {
    this.engine = options.engine;
    this.accessControl = options.accessControl;
    this.auditLogger = options.auditLogger;
    this.notifier = options.notifier;
    this.requireJustification = options.requireJustification ?? true;
  }

  // ---------------------------------------------------------------------------
  // Changes and Approvals
  // ---------------------------------------------------------------------------

  async submitChange(actor: User, input: SemanticChangeInput): Promise<ApprovalRequest> {
    const parsed = SemanticChangeSchema.safeParse(input);
    if (!parsed.success) {
      throw ValidationError.fromZod("semantic change", parsed.error);
    }
    const change = parsed.data;

    if (this.requireJustification && change.justification.trim().length === 0) {
      throw new ValidationError("A justification is required for semantic changes", [
        "justification: Required",
      ]);
    }

    if (!this.accessControl.canWriteMetric(actor.username, change.metricName)) {
      throw new PermissionDeniedError(
        actor.username,
        `You don't have permission to modify ${change.metricName}`
      );
    }

    return this.engine.submitChange(change, actor);
  }

  async getPendingApprovals(actor: User): Promise<ApprovalRequest[]> {
    if (!this.accessControl.checkPermission(actor.username, "approval", "read")) {
      throw new PermissionDeniedError(actor.username, "You don't have permission to view approvals");
    }
    return this.engine.getPendingApprovals();
  }

  async approveChange(actor: User, approvalId: string, comments = ""): Promise<ApprovalRequest> {
    return this.engine.approveChange(approvalId, actor, comments);
  }

  async rejectChange(actor: User, approvalId: string, reason: string): Promise<ApprovalRequest> {
    if (reason.trim().length === 0) {
      throw new ValidationError("Rejection reason is required", ["reason: Required"]);
    }
    return this.engine.rejectChange(approvalId, actor, reason);
  }

  // ---------------------------------------------------------------------------
  // Audit
  // ---------------------------------------------------------------------------

  async getAuditTrail(actor: User, query: AuditTrailQuery = {}): Promise<AuditEntry[]> {
    if (!this.accessControl.canViewAudit(actor.username)) {
      throw new PermissionDeniedError(actor.username, "You don't have permission to view audit logs");
    }
    return this.auditLogger.getAuditTrail({ limit: DEFAULT_API_TRAIL_LIMIT, ...query });
  }

  async getMetricHistory(actor: User, metricName: string): Promise<AuditEntry[]> {
    if (!this.accessControl.canReadMetric(actor.username, metricName)) {
      throw new PermissionDeniedError(
        actor.username,
        `You don't have permission to view the history of ${metricName}`
      );
    }
    return this.auditLogger.getMetricHistory(metricName);
  }

  async generateComplianceReport(
    actor: User,
    startDate: Date,
    endDate: Date
  ): Promise<ComplianceReport> {
    requireAdmin(actor, "generate compliance reports");
    if (startDate > endDate) {
      throw new ValidationError("startDate must not be after endDate");
    }
    return this.auditLogger.generateComplianceReport(startDate, endDate);
  }

  // ---------------------------------------------------------------------------
  // Users and Domains
  // ---------------------------------------------------------------------------

  async createUser(actor: User, input: UserInput): Promise<User> {
    requireAdmin(actor, "create users");

    const parsed = UserSchema.safeParse(input);
    if (!parsed.success) {
      throw ValidationError.fromZod("user", parsed.error);
    }

    const user = this.accessControl.addUser(parsed.data);
    await this.auditLogger.logAction({
      user: actor.username,
      action: AUDIT_ACTIONS.USER_CREATED,
      resourceType: "user",
      resourceId: user.username,
      details: { role: user.role, teams: [...user.teams] },
    });
    return user;
  }

  async assignDomainSteward(actor: User, domain: string, username: string): Promise<void> {
    requireAdmin(actor, "assign stewards");
    if (domain.trim().length === 0) {
      throw new ValidationError("Domain is required");
    }

    this.accessControl.assignDomainSteward(domain, username);
    await this.auditLogger.logAction({
      user: actor.username,
      action: AUDIT_ACTIONS.STEWARD_ASSIGNED,
      resourceType: "domain",
      resourceId: domain,
      details: { steward: username },
    });
  }

  async assignMetricDomain(actor: User, metricName: string, domain: string): Promise<void> {
    if (!this.accessControl.canWriteMetric(actor.username, metricName)) {
      throw new PermissionDeniedError(
        actor.username,
        `You don't have permission to modify ${metricName}`
      );
    }
    if (domain.trim().length === 0) {
      throw new ValidationError("Domain is required");
    }

    this.accessControl.setMetricDomain(metricName, domain);
    await this.auditLogger.logAction({
      user: actor.username,
      action: AUDIT_ACTIONS.METRIC_DOMAIN_ASSIGNED,
      resourceType: "metric",
      resourceId: metricName,
      details: { domain },
    });
  }

  getPermissionSummary(actor: User): PermissionSummary | null {
    return this.accessControl.getPermissionSummary(actor.username);
  }

  getAccessibleMetrics(actor: User): { username: string; accessibleMetrics: string[]; count: number } {
    const accessibleMetrics = this.accessControl.getAccessibleMetrics(actor.username);
    return { username: actor.username, accessibleMetrics, count: accessibleMetrics.length };
  }

  // ---------------------------------------------------------------------------
  // Operations
  // ---------------------------------------------------------------------------

  async testNotifications(actor: User): Promise<Record<string, ChannelTestResult>> {
    requireAdmin(actor, "test notifications");
    return this.notifier.testNotifications();
  }

  async health(): Promise<GovernanceHealth> {
    const auditIntegrity = await this.auditLogger.verifyIntegrity();
    return {
      status: auditIntegrity.corruptedEntries > 0 ? "degraded" : "healthy",
      auditIntegrity,
      pendingApprovals: this.engine.getPendingCount(),
      timestamp: new Date().toISOString(),
    };
  }
}
