/**
 * Auto-Approval Policy Evaluation
 *
 * Decides whether a submitted change bypasses human review. Rules are
 * evaluated in order and the first that applies wins:
 * 1. Breaking changes are never auto-approved
 * 2. Admin submitters are auto-approved
 * 3. Non-breaking updates submitted by the change's own author are auto-approved
 * 4. A change matching any criterion of any active policy is auto-approved
 * 5. Everything else waits for review
 */

import type {
  AutoApprovalCriterion,
  GovernancePolicy,
  SemanticChange,
  User,
} from "./schemas.js";

export type AutoApprovalRule =
  | "breaking_change"
  | "admin_submitter"
  | "author_update"
  | "policy_match"
  | "no_match";

export interface AutoApprovalDecision {
  autoApproved: boolean;
  rule: AutoApprovalRule;
  /** Name of the policy whose criterion matched (rule policy_match only) */
  matchedPolicy?: string;
  /** Index of the matching criterion within that policy */
  matchedCriterion?: number;
}

/**
 * A criterion matches when every key it specifies agrees with the change.
 * `owner` matches when it contains the change author.
 */
export function matchesCriterion(change: SemanticChange, criterion: AutoApprovalCriterion): boolean {
  if (criterion.changeType !== undefined && change.changeType !== criterion.changeType) {
    return false;
  }
  if (criterion.breakingChange !== undefined && change.breakingChange !== criterion.breakingChange) {
    return false;
  }
  if (criterion.owner !== undefined && !criterion.owner.includes(change.author)) {
    return false;
  }
  return true;
}

export function evaluateAutoApproval(
  change: SemanticChange,
  requestingUser: Pick<User, "username" | "role">,
  policies: Iterable<GovernancePolicy>
): AutoApprovalDecision {
  if (change.breakingChange) {
    return { autoApproved: false, rule: "breaking_change" };
  }

  if (requestingUser.role === "admin") {
    return { autoApproved: true, rule: "admin_submitter" };
  }

  if (change.changeType === "update" && change.author === requestingUser.username) {
    return { autoApproved: true, rule: "author_update" };
  }

  for (const policy of policies) {
    const index = policy.autoApprovalCriteria.findIndex((criterion) =>
      matchesCriterion(change, criterion)
    );
    if (index >= 0) {
      return {
        autoApproved: true,
        rule: "policy_match",
        matchedPolicy: policy.name,
        matchedCriterion: index,
      };
    }
  }

  return { autoApproved: false, rule: "no_match" };
}
