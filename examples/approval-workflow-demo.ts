#!/usr/bin/env npx tsx
/**
 * Governance Demo: Approval Workflow
 *
 * Walks one metric change through submission, review and audit:
 * an analyst's change waits for review, a domain steward approves it,
 * and the audit trail shows both steps.
 *
 * Run it with: npx tsx examples/approval-workflow-demo.ts
 */

import {
  InMemoryAuditSink,
  createGovernance,
  type NotificationChannel,
} from "../src/index.js";

console.log("\n" + "=".repeat(60));
console.log("Governance Demo: Approval Workflow");
console.log("=".repeat(60) + "\n");

// =============================================================================
// STEP 1: Wire governance
// =============================================================================

console.log("Step 1: Wire governance with an in-memory audit log\n");

const governance = createGovernance(
  { requireJustification: true },
  { auditSink: new InMemoryAuditSink() }
);

// Print notifications instead of posting to a webhook
const consoleChannel: NotificationChannel = {
  send: async (message) => {
    console.log(message.split("\n").map((line) => `     | ${line}`).join("\n"));
    return true;
  },
};
governance.notifier.addChannel("slack_stewards", consoleChannel);
governance.notifier.addChannel("slack_general", consoleChannel);

const { accessControl, service } = governance;

const admin = accessControl.addUser({ username: "root", email: "root@example.com", role: "admin" });
const steward = accessControl.addUser({ username: "dana", email: "dana@example.com", role: "steward" });
accessControl.addUser({ username: "sam", email: "sam@example.com", role: "steward" });

await service.assignMetricDomain(admin, "net_revenue", "finance");
await service.assignDomainSteward(admin, "finance", "dana");

console.log("  Users: root (admin), dana (finance steward), sam (steward)");
console.log("  net_revenue belongs to the finance domain\n");

// =============================================================================
// STEP 2: Submit a change
// =============================================================================

console.log("Step 2: sam proposes a change to a metric authored by dana\n");

const sam = accessControl.getUser("sam");
if (!sam) throw new Error("sam is not registered");

// sam stewards no domain yet, so writing a finance metric is denied
try {
  await service.submitChange(sam, {
    id: "chg-100",
    changeType: "update",
    metricName: "net_revenue",
    newDefinition: { name: "net_revenue", definition: "sum(amount) - sum(refunds)" },
    author: "dana",
    authorEmail: "dana@example.com",
    createdAt: new Date(),
    description: "Subtract refunds",
    justification: "Finance reports net figures",
  });
} catch (error) {
  console.log(`  Denied: ${error instanceof Error ? error.message : String(error)}\n`);
}

await service.assignDomainSteward(admin, "finance", "sam");

const request = await service.submitChange(sam, {
  id: "chg-100",
  changeType: "update",
  metricName: "net_revenue",
  newDefinition: { name: "net_revenue", definition: "sum(amount) - sum(refunds)" },
  author: "dana",
  authorEmail: "dana@example.com",
  createdAt: new Date(),
  description: "Subtract refunds",
  justification: "Finance reports net figures",
});

console.log(`\n  Request ${request.id} is ${request.status}\n`);

// =============================================================================
// STEP 3: Review
// =============================================================================

console.log("Step 3: dana approves\n");

const approved = await service.approveChange(steward, request.id, "Matches the finance definition");
console.log(`\n  Status: ${approved.status}, approver: ${approved.approver}\n`);

// =============================================================================
// STEP 4: Audit
// =============================================================================

console.log("Step 4: Audit trail\n");

for (const entry of await service.getAuditTrail(admin)) {
  console.log(`  ${entry.timestamp.toISOString()}  ${entry.user.padEnd(5)} ${entry.action}`);
}

const health = await service.health();
console.log(`\n  Audit integrity: ${health.auditIntegrity.integrityScore}`);
console.log(`  Pending approvals: ${health.pendingApprovals}\n`);
