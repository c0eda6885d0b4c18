/**
 * Tests for ApprovalEngine
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import {
  AccessControlManager,
  ApprovalEngine,
  AUDIT_ACTIONS,
  AUTO_APPROVAL_COMMENT,
  AuditLogger,
  InMemoryApprovalArchive,
  InMemoryAuditSink,
  NotFoundError,
  NotificationService,
  PermissionDeniedError,
  SYSTEM_APPROVER,
  SemanticChangeSchema,
  UserSchema,
  createInMemoryAuditLogger,
  type NotificationChannel,
  type NotificationMetadata,
  type SemanticChange,
  type SemanticChangeInput,
  type User,
  type UserInput,
} from "../index.js";

// =============================================================================
// Fixtures
// =============================================================================

class RecordingChannel implements NotificationChannel {
  messages: Array<{ message: string; metadata?: NotificationMetadata }> = [];

  async send(message: string, metadata?: NotificationMetadata): Promise<boolean> {
    this.messages.push({ message, metadata });
    return true;
  }
}

class FailingAuditSink extends InMemoryAuditSink {
  failAppends = false;

  async append(line: string): Promise<void> {
    if (this.failAppends) {
      throw new Error("disk full");
    }
    return super.append(line);
  }
}

function makeUser(input: UserInput): User {
  return UserSchema.parse(input);
}

function makeChange(overrides: Partial<SemanticChangeInput> = {}): SemanticChange {
  return SemanticChangeSchema.parse({
    id: "chg-1",
    changeType: "update",
    metricName: "net_revenue",
    newDefinition: { name: "net_revenue", definition: "sum(amount) - sum(refunds)" },
    author: "alice",
    authorEmail: "alice@example.com",
    createdAt: new Date("2026-01-01T00:00:00Z"),
    description: "Subtract refunds",
    justification: "Finance asked for net figures",
    ...overrides,
  });
}

const analyst = makeUser({ username: "alice", email: "alice@example.com", role: "analyst" });
const otherAnalyst = makeUser({ username: "bob", email: "bob@example.com", role: "analyst" });
const steward = makeUser({ username: "dana", email: "dana@example.com", role: "steward" });
const admin = makeUser({ username: "root", email: "root@example.com", role: "admin" });

describe("ApprovalEngine", () => {
  let audit: AuditLogger;
  let sink: InMemoryAuditSink;
  let notifier: NotificationService;
  let stewardsChannel: RecordingChannel;
  let generalChannel: RecordingChannel;
  let emailChannel: RecordingChannel;
  let archive: InMemoryApprovalArchive;
  let engine: ApprovalEngine;

  beforeEach(() => {
    ({ logger: audit, sink } = createInMemoryAuditLogger());
    notifier = new NotificationService();
    stewardsChannel = new RecordingChannel();
    generalChannel = new RecordingChannel();
    emailChannel = new RecordingChannel();
    notifier.addChannel("slack_stewards", stewardsChannel);
    notifier.addChannel("slack_general", generalChannel);
    notifier.addChannel("email_admins", emailChannel);
    archive = new InMemoryApprovalArchive();
    engine = new ApprovalEngine({
      auditLogger: audit,
      notifier,
      accessControl: new AccessControlManager(),
      archive,
    });
    vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    vi.useRealTimers();
  });

  // ===========================================================================
  // Submission
  // ===========================================================================

  describe("submitChange", () => {
    it("never auto-approves a breaking change, whoever submits it", async () => {
      for (const user of [analyst, steward, admin]) {
        for (const changeType of ["create", "update", "delete"] as const) {
          const request = await engine.submitChange(
            makeChange({ changeType, breakingChange: true, author: user.username }),
            user
          );
          expect(request.status).toBe("pending");
          expect(request.autoApproved).toBe(false);
          expect(request.approver).toBeNull();
        }
      }
      expect(engine.getPendingCount()).toBe(9);
    });

    it("never auto-approves a breaking change, even when a policy matches it", async () => {
      engine.addPolicy({
        name: "permissive",
        autoApprovalCriteria: [{}, { breakingChange: true }, { owner: ["alice"] }],
      });

      for (const user of [analyst, steward, admin]) {
        for (const changeType of ["create", "update", "delete"] as const) {
          const request = await engine.submitChange(
            makeChange({ changeType, breakingChange: true }),
            user
          );
          expect(request.status).toBe("pending");
          expect(request.approvalCriteria.rule).toBe("breaking_change");
          expect(request.approvalCriteria.matchedPolicy).toBeNull();
        }
      }
      expect(engine.getPendingCount()).toBe(9);
    });

    it("auto-approves every non-breaking change type submitted by an admin", async () => {
      for (const changeType of ["create", "update", "delete"] as const) {
        const request = await engine.submitChange(
          makeChange({ changeType, breakingChange: false }),
          admin
        );
        expect(request.status).toBe("approved");
        expect(request.approver).toBe(SYSTEM_APPROVER);
        expect(request.approvalCriteria.rule).toBe("admin_submitter");
      }
      expect(engine.getPendingCount()).toBe(0);
    });

    it("auto-approves a non-breaking change submitted by an admin", async () => {
      const request = await engine.submitChange(
        makeChange({ changeType: "create", author: "someone-else" }),
        admin
      );

      expect(request.status).toBe("approved");
      expect(request.autoApproved).toBe(true);
      expect(request.approver).toBe(SYSTEM_APPROVER);
      expect(request.comments).toBe(AUTO_APPROVAL_COMMENT);
      expect(request.approvedAt).toBeInstanceOf(Date);
      expect(request.approvalCriteria.rule).toBe("admin_submitter");
      expect(engine.getPendingCount()).toBe(0);
    });

    it("auto-approves an author updating their own metric", async () => {
      const request = await engine.submitChange(makeChange({ author: "alice" }), analyst);

      expect(request.status).toBe("approved");
      expect(request.approver).toBe("system");
      expect(request.approvalCriteria.rule).toBe("author_update");
      expect(engine.getPendingApprovals()).toEqual([]);
    });

    it("keeps an update by someone other than the author pending", async () => {
      const request = await engine.submitChange(makeChange({ author: "alice" }), otherAnalyst);

      expect(request.status).toBe("pending");
      expect(request.approvalCriteria.rule).toBe("no_match");
      expect(engine.getPendingApprovals().map((r) => r.id)).toEqual([request.id]);
    });

    it("auto-approves a change matching an active policy criterion", async () => {
      engine.addPolicy({
        name: "docs-only",
        autoApprovalCriteria: [{ changeType: "create", owner: ["alice"] }],
      });

      const request = await engine.submitChange(makeChange({ changeType: "create" }), otherAnalyst);

      expect(request.status).toBe("approved");
      expect(request.approvalCriteria.rule).toBe("policy_match");
      expect(request.approvalCriteria.matchedPolicy).toBe("docs-only");
    });

    it("stops matching once the policy is removed", async () => {
      engine.addPolicy({ name: "creates", autoApprovalCriteria: [{ changeType: "create" }] });
      expect(engine.removePolicy("creates")).toBe(true);

      const request = await engine.submitChange(makeChange({ changeType: "create" }), otherAnalyst);

      expect(request.status).toBe("pending");
      expect(engine.getPolicies()).toEqual([]);
    });

    it("records a change_submitted audit entry with a request snapshot", async () => {
      const request = await engine.submitChange(makeChange(), otherAnalyst);

      const trail = await audit.getAuditTrail({ action: AUDIT_ACTIONS.CHANGE_SUBMITTED });
      expect(trail).toHaveLength(1);
      expect(trail[0].user).toBe("bob");
      expect(trail[0].resourceId).toBe(request.id);
      expect(trail[0].details).toMatchObject({
        changeType: "update",
        metricName: "net_revenue",
        autoApproved: false,
        breakingChange: false,
      });
    });

    it("routes breaking changes to the critical group and others to stewards", async () => {
      await engine.submitChange(makeChange(), otherAnalyst);
      expect(stewardsChannel.messages).toHaveLength(1);
      expect(emailChannel.messages).toHaveLength(0);

      await engine.submitChange(makeChange({ breakingChange: true }), otherAnalyst);
      expect(stewardsChannel.messages).toHaveLength(2);
      expect(emailChannel.messages).toHaveLength(1);
      expect(emailChannel.messages[0].message).toContain("**Breaking Change:** YES");
    });

    it("leaves nothing pending when the submission cannot be audited", async () => {
      const failingSink = new FailingAuditSink();
      const failingEngine = new ApprovalEngine({
        auditLogger: new AuditLogger(failingSink),
        notifier,
        accessControl: new AccessControlManager(),
      });
      failingSink.failAppends = true;

      await expect(failingEngine.submitChange(makeChange(), otherAnalyst)).rejects.toThrow(
        "disk full"
      );
      expect(failingEngine.getPendingCount()).toBe(0);
      expect(stewardsChannel.messages).toHaveLength(0);
    });

    it("keeps its own frozen copy of the submitted change", async () => {
      vi.useFakeTimers({ toFake: ["Date"] });
      vi.setSystemTime(new Date("2026-03-01T00:00:00Z"));
      const change = makeChange({ changeType: "create" });
      await engine.submitChange(change, otherAnalyst);

      change.changeType = "delete";
      change.affectedAdapters.push("looker");
      vi.setSystemTime(new Date("2026-03-10T00:00:00Z"));
      await engine.notifyStaleApprovals(7);

      expect(emailChannel.messages[0].message).toContain("- net_revenue (create) - 9 days");
    });

    it("archives auto-approved requests immediately", async () => {
      const request = await engine.submitChange(makeChange(), admin);

      const archived = await archive.get(request.id);
      expect(archived?.status).toBe("approved");
    });
  });

  // ===========================================================================
  // Decisions
  // ===========================================================================

  describe("approveChange", () => {
    it("approves a pending breaking delete submitted by a steward", async () => {
      const submitted = await engine.submitChange(
        makeChange({ changeType: "delete", breakingChange: true, author: "dana" }),
        steward
      );
      expect(submitted.status).toBe("pending");

      const approved = await engine.approveChange(submitted.id, steward, "reviewed");

      expect(approved.status).toBe("approved");
      expect(approved.approver).toBe("dana");
      expect(approved.comments).toBe("reviewed");
      expect(approved.approvedAt).toBeInstanceOf(Date);
      expect(engine.getPendingApprovals().some((r) => r.id === submitted.id)).toBe(false);
    });

    it("fails with NotFoundError for an unknown id", async () => {
      await expect(engine.approveChange("missing", steward)).rejects.toBeInstanceOf(NotFoundError);
    });

    it("fails with NotFoundError once the request has been decided", async () => {
      const submitted = await engine.submitChange(makeChange(), otherAnalyst);
      await engine.approveChange(submitted.id, steward);

      await expect(engine.approveChange(submitted.id, admin)).rejects.toBeInstanceOf(NotFoundError);
      await expect(engine.rejectChange(submitted.id, admin, "late")).rejects.toBeInstanceOf(
        NotFoundError
      );
    });

    it("lets exactly one of two concurrent approvals win", async () => {
      const submitted = await engine.submitChange(makeChange(), otherAnalyst);

      const results = await Promise.allSettled([
        engine.approveChange(submitted.id, steward, "first"),
        engine.approveChange(submitted.id, admin, "second"),
      ]);

      const fulfilled = results.filter((r) => r.status === "fulfilled");
      const rejected = results.filter((r): r is PromiseRejectedResult => r.status === "rejected");
      expect(fulfilled).toHaveLength(1);
      expect(rejected).toHaveLength(1);
      expect(rejected[0].reason).toBeInstanceOf(NotFoundError);

      const approvals = await audit.getAuditTrail({ action: AUDIT_ACTIONS.CHANGE_APPROVED });
      expect(approvals).toHaveLength(1);
    });

    it("denies analysts and leaves the request pending", async () => {
      const submitted = await engine.submitChange(makeChange(), otherAnalyst);

      await expect(engine.approveChange(submitted.id, analyst)).rejects.toBeInstanceOf(
        PermissionDeniedError
      );
      await expect(engine.approveChange(submitted.id, analyst)).rejects.toThrow(
        "User alice cannot approve this change"
      );
      expect(engine.getPendingCount()).toBe(1);
    });

    it("notifies the general group and archives the decision", async () => {
      const submitted = await engine.submitChange(makeChange(), otherAnalyst);
      await engine.approveChange(submitted.id, steward, "ok");

      expect(generalChannel.messages).toHaveLength(1);
      expect(generalChannel.messages[0].metadata).toEqual({
        approvalId: submitted.id,
        decision: "approved",
      });
      expect((await archive.get(submitted.id))?.approver).toBe("dana");
    });

    it("restores the pending request when the audit append fails", async () => {
      const failingSink = new FailingAuditSink();
      const failingEngine = new ApprovalEngine({
        auditLogger: new AuditLogger(failingSink),
        notifier,
        accessControl: new AccessControlManager(),
      });
      vi.spyOn(console, "error").mockImplementation(() => {});

      const submitted = await failingEngine.submitChange(makeChange(), otherAnalyst);
      failingSink.failAppends = true;

      await expect(failingEngine.approveChange(submitted.id, steward)).rejects.toThrow("disk full");
      expect(failingEngine.getPendingApprovals().map((r) => r.id)).toEqual([submitted.id]);
      expect(failingEngine.getPendingApprovals()[0].status).toBe("pending");
    });
  });

  describe("rejectChange", () => {
    it("rejects a pending change and stores the reason as comments", async () => {
      const submitted = await engine.submitChange(makeChange(), otherAnalyst);

      const rejected = await engine.rejectChange(submitted.id, admin, "Definition double counts");

      expect(rejected.status).toBe("rejected");
      expect(rejected.approver).toBe("root");
      expect(rejected.comments).toBe("Definition double counts");

      const trail = await audit.getAuditTrail({ action: AUDIT_ACTIONS.CHANGE_REJECTED });
      expect(trail[0].details.reason).toBe("Definition double counts");
    });
  });

  // ===========================================================================
  // Queries
  // ===========================================================================

  describe("getPendingApprovals", () => {
    it("returns copies in submission order", async () => {
      const first = await engine.submitChange(makeChange({ id: "a" }), otherAnalyst);
      const second = await engine.submitChange(makeChange({ id: "b" }), otherAnalyst);

      const pending = engine.getPendingApprovals();
      expect(pending.map((r) => r.changeId)).toEqual(["a", "b"]);

      pending[0].status = "rejected";
      expect(engine.getPendingApprovals()[0].status).toBe("pending");
      expect([first.id, second.id]).toEqual(pending.map((r) => r.id));
    });
  });

  describe("getApproval", () => {
    it("finds pending requests", async () => {
      const submitted = await engine.submitChange(makeChange(), otherAnalyst);
      expect((await engine.getApproval(submitted.id))?.status).toBe("pending");
    });

    it("finds decided requests in the archive", async () => {
      const submitted = await engine.submitChange(makeChange(), otherAnalyst);
      await engine.rejectChange(submitted.id, steward, "no");

      const found = await engine.getApproval(submitted.id);
      expect(found?.status).toBe("rejected");
      expect(found?.comments).toBe("no");
    });

    it("falls back to the latest audit snapshot without an archive", async () => {
      const bareEngine = new ApprovalEngine({
        auditLogger: audit,
        notifier,
        accessControl: new AccessControlManager(),
      });
      const submitted = await bareEngine.submitChange(makeChange(), otherAnalyst);
      await bareEngine.approveChange(submitted.id, steward, "looks right");

      const found = await bareEngine.getApproval(submitted.id);
      expect(found?.status).toBe("approved");
      expect(found?.approver).toBe("dana");
      expect(found?.createdAt).toBeInstanceOf(Date);
    });

    it("returns null for an unknown id", async () => {
      expect(await engine.getApproval("00000000-0000-4000-8000-000000000000")).toBeNull();
    });
  });

  // ===========================================================================
  // Expiry
  // ===========================================================================

  describe("cleanupExpiredApprovals", () => {
    it("removes requests older than the threshold and audits each one", async () => {
      vi.useFakeTimers({ toFake: ["Date"] });
      vi.setSystemTime(new Date("2026-03-01T00:00:00Z"));
      const old = await engine.submitChange(makeChange({ id: "old" }), otherAnalyst);

      vi.setSystemTime(new Date("2026-03-06T00:00:00Z"));
      const recent = await engine.submitChange(makeChange({ id: "recent" }), otherAnalyst);

      vi.setSystemTime(new Date("2026-03-09T00:00:00Z"));
      const removed = await engine.cleanupExpiredApprovals(7);

      expect(removed).toBe(1);
      expect(engine.getPendingApprovals().map((r) => r.id)).toEqual([recent.id]);

      const expired = await audit.getAuditTrail({ action: AUDIT_ACTIONS.APPROVAL_EXPIRED });
      expect(expired).toHaveLength(1);
      expect(expired[0].resourceId).toBe(old.id);
      expect(expired[0].user).toBe("system");
      expect(expired[0].details).toEqual({ metricName: "net_revenue", maxAgeDays: 7, daysPending: 8 });

      await expect(engine.approveChange(old.id, steward)).rejects.toBeInstanceOf(NotFoundError);
    });

    it("keeps requests pending when their expiry cannot be audited", async () => {
      const failingSink = new FailingAuditSink();
      const failingEngine = new ApprovalEngine({
        auditLogger: new AuditLogger(failingSink),
        notifier,
        accessControl: new AccessControlManager(),
      });
      vi.useFakeTimers({ toFake: ["Date"] });
      vi.setSystemTime(new Date("2026-03-01T00:00:00Z"));
      await failingEngine.submitChange(makeChange({ id: "first" }), otherAnalyst);
      await failingEngine.submitChange(makeChange({ id: "second" }), otherAnalyst);

      vi.setSystemTime(new Date("2026-03-20T00:00:00Z"));
      failingSink.failAppends = true;

      await expect(failingEngine.cleanupExpiredApprovals(7)).rejects.toThrow("disk full");
      expect(failingEngine.getPendingCount()).toBe(2);

      failingSink.failAppends = false;
      expect(await failingEngine.cleanupExpiredApprovals(7)).toBe(2);
      expect(failingEngine.getPendingCount()).toBe(0);
      const lines = await failingSink.readLines();
      expect(lines.filter((line) => line.includes('"approval_expired"'))).toHaveLength(2);
    });

    it("returns 0 when nothing is stale", async () => {
      await engine.submitChange(makeChange(), otherAnalyst);
      expect(await engine.cleanupExpiredApprovals()).toBe(0);
      expect(engine.getPendingCount()).toBe(1);
    });
  });

  describe("notifyStaleApprovals", () => {
    it("alerts the critical group about requests past the threshold", async () => {
      vi.useFakeTimers({ toFake: ["Date"] });
      vi.setSystemTime(new Date("2026-03-01T00:00:00Z"));
      await engine.submitChange(makeChange({ changeType: "create" }), otherAnalyst);
      vi.setSystemTime(new Date("2026-03-11T12:00:00Z"));

      const reported = await engine.notifyStaleApprovals(7);

      expect(reported).toBe(1);
      expect(emailChannel.messages).toHaveLength(1);
      expect(emailChannel.messages[0].message).toContain("- net_revenue (create) - 10 days");
      expect(engine.getPendingCount()).toBe(1);
    });

    it("sends nothing when no request is stale", async () => {
      await engine.submitChange(makeChange(), otherAnalyst);
      const before = stewardsChannel.messages.length;

      expect(await engine.notifyStaleApprovals()).toBe(0);
      expect(stewardsChannel.messages).toHaveLength(before);
      expect(emailChannel.messages).toHaveLength(0);
    });
  });

  it("records every audit line as parseable JSON", async () => {
    await engine.submitChange(makeChange(), admin);
    const lines = await sink.readLines();
    expect(lines).toHaveLength(1);
    for (const line of lines) {
      expect(() => JSON.parse(line)).not.toThrow();
    }
  });
});
