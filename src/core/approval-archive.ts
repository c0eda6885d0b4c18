/**
 * Approval Archive - Durable Storage for Approval Requests
 *
 * The engine keeps pending requests in memory. Once a request reaches a
 * terminal state (or is auto-approved at submission) it leaves the pending
 * table and is written here, so decided requests remain retrievable.
 *
 * Database tables:
 * - approval_requests: one row per request, upserted on every decision
 *
 * @example
 * ```typescript
 * const archive = createApprovalArchive(supabaseClient);
 * const engine = new ApprovalEngine({ auditLogger, notifier, accessControl, archive });
 *
 * const decided = await archive.list({ status: "rejected", limit: 20 });
 * ```
 */

import type { SupabaseClient } from "@supabase/supabase-js";
import { z } from "zod";
import {
  ApprovalRequestSchema,
  type ApprovalRequest,
  type ApprovalStatus,
} from "./schemas.js";

// =============================================================================
// Database Row Types
// =============================================================================

const ApprovalRequestRowSchema = z.object({
  id: z.string(),
  change_id: z.string(),
  metric_name: z.string(),
  status: z.string(),
  approver: z.string().nullable(),
  approved_at: z.string().nullable(),
  comments: z.string(),
  auto_approved: z.boolean(),
  approval_criteria: z.record(z.unknown()).nullable(),
  created_at: z.string(),
});
type ApprovalRequestRow = z.infer<typeof ApprovalRequestRowSchema>;

export interface ArchiveQuery {
  status?: ApprovalStatus;
  metricName?: string;
  limit?: number;
}

// =============================================================================
// ApprovalArchive Interface
// =============================================================================

export interface ApprovalArchive {
  save(request: ApprovalRequest): Promise<void>;
  get(id: string): Promise<ApprovalRequest | null>;
  list(query?: ArchiveQuery): Promise<ApprovalRequest[]>;
}

function requestToRow(request: ApprovalRequest): ApprovalRequestRow {
  return {
    id: request.id,
    change_id: request.changeId,
    metric_name: request.metricName,
    status: request.status,
    approver: request.approver,
    approved_at: request.approvedAt ? request.approvedAt.toISOString() : null,
    comments: request.comments,
    auto_approved: request.autoApproved,
    approval_criteria: request.approvalCriteria,
    created_at: request.createdAt.toISOString(),
  };
}

/**
 * Convert a database row to an ApprovalRequest, validating the row shape,
 * status and timestamps on the way in.
 */
function rowToRequest(raw: unknown): ApprovalRequest {
  const row = ApprovalRequestRowSchema.parse(raw);
  return ApprovalRequestSchema.parse({
    id: row.id,
    changeId: row.change_id,
    metricName: row.metric_name,
    status: row.status,
    approver: row.approver,
    approvedAt: row.approved_at,
    comments: row.comments,
    autoApproved: row.auto_approved,
    approvalCriteria: row.approval_criteria ?? {},
    createdAt: row.created_at,
  });
}

// =============================================================================
// SupabaseApprovalArchive Class
// =============================================================================

export class SupabaseApprovalArchive implements ApprovalArchive {
  private client: SupabaseClient;
  private tableName: string;

  constructor(client: SupabaseClient, options: { tableName?: string } = {}) {
    this.client = client;
    this.tableName = options.tableName ?? "approval_requests";
  }

  async save(request: ApprovalRequest): Promise<void> {
    const { error } = await this.client
      .from(this.tableName)
      .upsert(requestToRow(request), { onConflict: "id" });

    if (error) {
      throw new Error(`Failed to archive approval request: ${error.message}`);
    }
  }

  async get(id: string): Promise<ApprovalRequest | null> {
    const { data, error } = await this.client
      .from(this.tableName)
      .select("*")
      .eq("id", id)
      .maybeSingle();

    if (error) {
      throw new Error(`Failed to get archived approval request: ${error.message}`);
    }

    return data ? rowToRequest(data) : null;
  }

  async list(query: ArchiveQuery = {}): Promise<ApprovalRequest[]> {
    let builder = this.client
      .from(this.tableName)
      .select("*")
      .order("created_at", { ascending: false });

    if (query.status) {
      builder = builder.eq("status", query.status);
    }
    if (query.metricName) {
      builder = builder.eq("metric_name", query.metricName);
    }
    if (query.limit) {
      builder = builder.limit(query.limit);
    }

    const { data, error } = await builder;

    if (error) {
      throw new Error(`Failed to list archived approval requests: ${error.message}`);
    }

    return (data ?? []).map((row) => rowToRequest(row));
  }
}

// =============================================================================
// InMemoryApprovalArchive (for testing)
// =============================================================================

export class InMemoryApprovalArchive implements ApprovalArchive {
  private requests: Map<string, ApprovalRequest> = new Map();

  async save(request: ApprovalRequest): Promise<void> {
    this.requests.set(request.id, { ...request });
  }

  async get(id: string): Promise<ApprovalRequest | null> {
    const request = this.requests.get(id);
    return request ? { ...request } : null;
  }

  async list(query: ArchiveQuery = {}): Promise<ApprovalRequest[]> {
    let results = Array.from(this.requests.values());

    if (query.status) {
      results = results.filter((r) => r.status === query.status);
    }
    if (query.metricName) {
      results = results.filter((r) => r.metricName === query.metricName);
    }

    results.sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime());

    if (query.limit) {
      results = results.slice(0, query.limit);
    }

    return results.map((r) => ({ ...r }));
  }

  /**
   * Clear all data (for testing)
   */
  clear(): void {
    this.requests.clear();
  }
}

// =============================================================================
// Factory Functions
// =============================================================================

/**
 * Create a Supabase-backed archive
 *
 * @param client - Supabase client (service role for server-side writes)
 */
export function createApprovalArchive(client: SupabaseClient): ApprovalArchive {
  return new SupabaseApprovalArchive(client);
}

export function createInMemoryApprovalArchive(): InMemoryApprovalArchive {
  return new InMemoryApprovalArchive();
}
