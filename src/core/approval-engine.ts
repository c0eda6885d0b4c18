/**
 * Approval Engine - Governance State Machine for Semantic Changes
 *
 * Accepts change proposals, decides between auto-approval and review,
 * tracks pending requests and applies approve/reject transitions:
 *
 *   submit ──► approved (auto)
 *          └─► pending ──► approved
 *                      └─► rejected
 *
 * Terminal requests leave the pending table and never re-open. Every
 * transition is written to the audit log with a snapshot of the request,
 * and to the archive when one is configured.
 *
 * Each operation looks up and removes its pending entry before its first
 * `await`, so of two concurrent decisions on the same request exactly one
 * succeeds and the other fails with NotFoundError.
 *
 * @example
 * ```typescript
 * const engine = new ApprovalEngine({ auditLogger, notifier, accessControl });
 *
 * const request = await engine.submitChange(change, analyst);
 * if (request.status === "pending") {
 *   await engine.approveChange(request.id, steward, "reviewed");
 * }
 * ```
 */

import { randomUUID } from "node:crypto";
import type { AccessControlManager } from "./access-control.js";
import type { ApprovalArchive } from "./approval-archive.js";
import { AUDIT_ACTIONS, type AuditLogger } from "./audit-logger.js";
import { evaluateAutoApproval } from "./auto-approval.js";
import { NotFoundError, PermissionDeniedError } from "./errors.js";
import type { NotificationService, StaleApprovalSummary } from "./notifications.js";
import {
  ApprovalRequestSchema,
  GovernancePolicySchema,
  type ApprovalRequest,
  type GovernancePolicy,
  type GovernancePolicyInput,
  type SemanticChange,
  type User,
} from "./schemas.js";

// =============================================================================
// Constants
// =============================================================================

export const SYSTEM_APPROVER = "system";
export const AUTO_APPROVAL_COMMENT = "Auto-approved based on governance policy";
export const DEFAULT_MAX_PENDING_DAYS = 7;

const DAY_MS = 24 * 60 * 60 * 1000;
const APPROVAL_RESOURCE = "approval_request";

type Decision = "approved" | "rejected";

export interface ApprovalEngineOptions {
  auditLogger: AuditLogger;
  notifier: NotificationService;
  accessControl: AccessControlManager;
  /** Durable store for decided requests */
  archive?: ApprovalArchive;
  /** Policies active from construction */
  policies?: GovernancePolicyInput[];
  /** Default age threshold for cleanup and stale alerts (default: 7) */
  maxPendingDays?: number;
}

export interface StaleApproval {
  request: ApprovalRequest;
  daysPending: number;
}

function snapshot(request: ApprovalRequest): Record<string, unknown> {
  return {
    id: request.id,
    changeId: request.changeId,
    metricName: request.metricName,
    status: request.status,
    approver: request.approver,
    approvedAt: request.approvedAt ? request.approvedAt.toISOString() : null,
    comments: request.comments,
    autoApproved: request.autoApproved,
    approvalCriteria: request.approvalCriteria,
    createdAt: request.createdAt.toISOString(),
  };
}

function copy(request: ApprovalRequest): ApprovalRequest {
  return { ...request, approvalCriteria: { ...request.approvalCriteria } };
}

// =============================================================================
// ApprovalEngine
// =============================================================================

export class ApprovalEngine {
  private readonly auditLogger: AuditLogger;
  private readonly notifier: NotificationService;
  private readonly accessControl: AccessControlManager;
  private readonly archive?: ApprovalArchive;
  private readonly maxPendingDays: number;

  private readonly pendingApprovals = new Map<string, ApprovalRequest>();
  private readonly pendingChanges = new Map<string, SemanticChange>();
  private readonly policies = new Map<string, GovernancePolicy>();

  constructor(options: ApprovalEngineOptions) {
    this.auditLogger = options.auditLogger;
    this.notifier = options.notifier;
    this.accessControl = options.accessControl;
    this.archive = options.archive;
    this.maxPendingDays = options.maxPendingDays ?? DEFAULT_MAX_PENDING_DAYS;

    for (const policy of options.policies ?? []) {
      this.addPolicy(policy);
    }
  }

  // ---------------------------------------------------------------------------
  // Policies
  // ---------------------------------------------------------------------------

  /**
   * Activate a policy (replaces an active policy with the same name)
   */
  addPolicy(input: GovernancePolicyInput): GovernancePolicy {
    const policy = GovernancePolicySchema.parse(input);
    this.policies.set(policy.name, policy);
    return policy;
  }

  removePolicy(name: string): boolean {
    return this.policies.delete(name);
  }

  getPolicies(): GovernancePolicy[] {
    return Array.from(this.policies.values());
  }

  // ---------------------------------------------------------------------------
  // Submission
  // ---------------------------------------------------------------------------

  /**
   * Submit a change for approval.
   *
   * Auto-approved changes come back approved by "system" and never enter
   * the pending table. Everything else is stored as pending and announced
   * to stewards (critical channels for breaking changes).
   */
  async submitChange(change: SemanticChange, requestingUser: User): Promise<ApprovalRequest> {
    const frozen = Object.freeze({ ...change, affectedAdapters: [...change.affectedAdapters] });
    const decision = evaluateAutoApproval(frozen, requestingUser, this.policies.values());
    const now = new Date();

    const request: ApprovalRequest = {
      id: randomUUID(),
      changeId: frozen.id,
      metricName: frozen.metricName,
      status: decision.autoApproved ? "approved" : "pending",
      approver: decision.autoApproved ? SYSTEM_APPROVER : null,
      approvedAt: decision.autoApproved ? now : null,
      comments: decision.autoApproved ? AUTO_APPROVAL_COMMENT : "",
      autoApproved: decision.autoApproved,
      approvalCriteria: {
        rule: decision.rule,
        matchedPolicy: decision.matchedPolicy ?? null,
        changeType: frozen.changeType,
        breakingChange: frozen.breakingChange,
        author: frozen.author,
        submittedBy: requestingUser.username,
        submitterRole: requestingUser.role,
      },
      createdAt: now,
    };

    await this.auditLogger.logAction({
      user: requestingUser.username,
      action: AUDIT_ACTIONS.CHANGE_SUBMITTED,
      resourceType: APPROVAL_RESOURCE,
      resourceId: request.id,
      details: {
        changeType: frozen.changeType,
        metricName: frozen.metricName,
        autoApproved: decision.autoApproved,
        breakingChange: frozen.breakingChange,
        request: snapshot(request),
      },
    });

    if (decision.autoApproved) {
      console.log(
        `[ApprovalEngine] Auto-approved ${frozen.changeType} of ${frozen.metricName} (${decision.rule})`
      );
      await this.archiveRequest(request);
    } else {
      // Stored only once audited; callers cannot know the id before we return.
      this.pendingApprovals.set(request.id, request);
      this.pendingChanges.set(request.id, frozen);
      console.log(
        `[ApprovalEngine] ${frozen.changeType} of ${frozen.metricName} pending review as ${request.id}`
      );
      await this.notifier.notifyApprovalRequest({
        approvalId: request.id,
        metricName: frozen.metricName,
        changeType: frozen.changeType,
        author: frozen.author,
        breakingChange: frozen.breakingChange,
        description: frozen.description,
        justification: frozen.justification,
      });
    }

    return copy(request);
  }

  // ---------------------------------------------------------------------------
  // Decisions
  // ---------------------------------------------------------------------------

  async approveChange(
    approvalId: string,
    approver: User,
    comments = ""
  ): Promise<ApprovalRequest> {
    return this.decide(approvalId, approver, "approved", comments);
  }

  /**
   * Reject a pending change. The reason is stored as the request comments;
   * callers are expected to have rejected an empty reason already.
   */
  async rejectChange(approvalId: string, approver: User, reason: string): Promise<ApprovalRequest> {
    return this.decide(approvalId, approver, "rejected", reason);
  }

  private async decide(
    approvalId: string,
    approver: User,
    decision: Decision,
    comments: string
  ): Promise<ApprovalRequest> {
    const pending = this.pendingApprovals.get(approvalId);
    if (!pending) {
      throw new NotFoundError("Approval request", approvalId);
    }

    const verb = decision === "approved" ? "approve" : "reject";
    if (!this.accessControl.canDecideApproval(approver)) {
      throw new PermissionDeniedError(
        approver.username,
        `User ${approver.username} cannot ${verb} this change`
      );
    }

    const change = this.pendingChanges.get(approvalId);
    this.pendingApprovals.delete(approvalId);
    this.pendingChanges.delete(approvalId);

    const decided: ApprovalRequest = {
      ...pending,
      status: decision,
      approver: approver.username,
      approvedAt: new Date(),
      comments,
    };

    try {
      await this.auditLogger.logAction({
        user: approver.username,
        action: decision === "approved" ? AUDIT_ACTIONS.CHANGE_APPROVED : AUDIT_ACTIONS.CHANGE_REJECTED,
        resourceType: APPROVAL_RESOURCE,
        resourceId: approvalId,
        details: {
          ...(decision === "approved" ? { comments } : { reason: comments }),
          metricName: decided.metricName,
          request: snapshot(decided),
        },
      });
    } catch (error) {
      // Without an audit record the decision is not durable; put the request back.
      this.pendingApprovals.set(approvalId, pending);
      if (change) this.pendingChanges.set(approvalId, change);
      throw error;
    }

    console.log(`[ApprovalEngine] ${approver.username} ${decision} ${approvalId}`);

    await this.notifier.notifyApprovalDecision({
      approvalId,
      metricName: decided.metricName,
      decision,
      approver: approver.username,
      comments,
    });
    await this.archiveRequest(decided);

    return copy(decided);
  }

  // ---------------------------------------------------------------------------
  // Queries
  // ---------------------------------------------------------------------------

  /**
   * Snapshot of pending requests in submission order
   */
  getPendingApprovals(): ApprovalRequest[] {
    return Array.from(this.pendingApprovals.values(), copy);
  }

  getPendingCount(): number {
    return this.pendingApprovals.size;
  }

  /**
   * Look up a request in the pending table, then the archive, then the
   * audit trail (latest recorded snapshot).
   */
  async getApproval(approvalId: string): Promise<ApprovalRequest | null> {
    const pending = this.pendingApprovals.get(approvalId);
    if (pending) return copy(pending);

    if (this.archive) {
      const archived = await this.archive.get(approvalId);
      if (archived) return archived;
    }

    const history = await this.auditLogger.getAuditTrail({
      resourceType: APPROVAL_RESOURCE,
      resourceId: approvalId,
    });
    for (let i = history.length - 1; i >= 0; i--) {
      const parsed = ApprovalRequestSchema.safeParse(history[i].details.request);
      if (parsed.success) return parsed.data;
    }

    return null;
  }

  // ---------------------------------------------------------------------------
  // Expiry
  // ---------------------------------------------------------------------------

  /**
   * Pending requests created before now - maxAgeDays
   */
  getStaleApprovals(maxAgeDays = this.maxPendingDays): StaleApproval[] {
    const now = Date.now();
    const cutoff = now - maxAgeDays * DAY_MS;
    const stale: StaleApproval[] = [];

    for (const request of this.pendingApprovals.values()) {
      if (request.createdAt.getTime() < cutoff) {
        stale.push({
          request: copy(request),
          daysPending: Math.floor((now - request.createdAt.getTime()) / DAY_MS),
        });
      }
    }
    return stale;
  }

  /**
   * Alert the critical channels about stale requests. Returns the number
   * of requests reported.
   */
  async notifyStaleApprovals(maxAgeDays = this.maxPendingDays): Promise<number> {
    const stale = this.getStaleApprovals(maxAgeDays);
    const summaries: StaleApprovalSummary[] = [];

    for (const { request, daysPending } of stale) {
      const change = this.pendingChanges.get(request.id);
      if (!change) continue;
      summaries.push({ metricName: request.metricName, changeType: change.changeType, daysPending });
    }

    await this.notifier.notifyStaleApprovals(summaries, maxAgeDays);
    return summaries.length;
  }

  /**
   * Remove pending requests older than maxAgeDays. Returns the count removed.
   * A request stays pending if its expiry cannot be audited.
   */
  async cleanupExpiredApprovals(maxAgeDays = this.maxPendingDays): Promise<number> {
    let removed = 0;

    for (const { request, daysPending } of this.getStaleApprovals(maxAgeDays)) {
      const pending = this.pendingApprovals.get(request.id);
      if (!pending) continue;
      const change = this.pendingChanges.get(request.id);
      this.pendingApprovals.delete(request.id);
      this.pendingChanges.delete(request.id);

      try {
        await this.auditLogger.logAction({
          user: SYSTEM_APPROVER,
          action: AUDIT_ACTIONS.APPROVAL_EXPIRED,
          resourceType: APPROVAL_RESOURCE,
          resourceId: request.id,
          details: { metricName: request.metricName, maxAgeDays, daysPending },
        });
      } catch (error) {
        this.pendingApprovals.set(request.id, pending);
        if (change) this.pendingChanges.set(request.id, change);
        throw error;
      }
      removed++;
    }

    if (removed > 0) {
      console.log(`[ApprovalEngine] Removed ${removed} expired approval request(s)`);
    }
    return removed;
  }

  // ---------------------------------------------------------------------------
  // Helper Methods
  // ---------------------------------------------------------------------------

  private async archiveRequest(request: ApprovalRequest): Promise<void> {
    if (!this.archive) return;
    try {
      await this.archive.save(request);
    } catch (error) {
      // The audit entry already records the decision.
      console.error(
        `[ApprovalEngine] Failed to archive ${request.id}:`,
        error instanceof Error ? error.message : String(error)
      );
    }
  }
}
