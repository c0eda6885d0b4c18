/**
 * Audit Logger
 *
 * Append-only audit trail for every governance operation: who changed what,
 * when, and with which details. Entries are written as one JSON object per
 * line and read back by a linear scan with filter predicates.
 *
 * @example
 * ```typescript
 * const audit = new AuditLogger(new FileAuditSink("semantic_audit.jsonl"));
 *
 * await audit.logAction({
 *   user: "alice",
 *   action: "metric_domain_assigned",
 *   resourceType: "metric",
 *   resourceId: "active_users",
 *   details: { domain: "growth" },
 * });
 *
 * const trail = await audit.getAuditTrail({ user: "alice", limit: 50 });
 * const integrity = await audit.verifyIntegrity();
 * ```
 */

import { randomUUID } from "node:crypto";
import { closeSync, openSync } from "node:fs";
import { appendFile, readFile } from "node:fs/promises";
import { z } from "zod";
import type { AuditEntry, ChangeType } from "./schemas.js";

// =============================================================================
// Action Vocabulary
// =============================================================================

export const AUDIT_ACTIONS = {
  CHANGE_SUBMITTED: "change_submitted",
  CHANGE_APPROVED: "change_approved",
  CHANGE_REJECTED: "change_rejected",
  APPROVAL_EXPIRED: "approval_expired",
  METRIC_CREATE: "metric_create",
  METRIC_UPDATE: "metric_update",
  METRIC_DELETE: "metric_delete",
  ADAPTER_GENERATED: "adapter_generated",
  API_ACCESS: "api_access",
  USER_CREATED: "user_created",
  STEWARD_ASSIGNED: "steward_assigned",
  METRIC_DOMAIN_ASSIGNED: "metric_domain_assigned",
} as const;
export type AuditAction = (typeof AUDIT_ACTIONS)[keyof typeof AUDIT_ACTIONS];

// =============================================================================
// Persisted Row Format
// =============================================================================

/**
 * On-disk line format. Unknown fields are dropped on read.
 */
const AuditEntryRowSchema = z.object({
  id: z.string(),
  timestamp: z.string().refine((value) => !Number.isNaN(Date.parse(value)), {
    message: "Invalid timestamp",
  }),
  user: z.string(),
  action: z.string(),
  resource_type: z.string(),
  resource_id: z.string(),
  details: z.record(z.unknown()).default({}),
  ip_address: z.string().nullish(),
  user_agent: z.string().nullish(),
});
type AuditEntryRow = z.infer<typeof AuditEntryRowSchema>;

function entryToRow(entry: AuditEntry): AuditEntryRow {
  return {
    id: entry.id,
    timestamp: entry.timestamp.toISOString(),
    user: entry.user,
    action: entry.action,
    resource_type: entry.resourceType,
    resource_id: entry.resourceId,
    details: entry.details,
    ip_address: entry.ipAddress ?? null,
    user_agent: entry.userAgent ?? null,
  };
}

function rowToEntry(row: AuditEntryRow): AuditEntry {
  return {
    id: row.id,
    timestamp: new Date(row.timestamp),
    user: row.user,
    action: row.action,
    resourceType: row.resource_type,
    resourceId: row.resource_id,
    details: row.details,
    ipAddress: row.ip_address ?? undefined,
    userAgent: row.user_agent ?? undefined,
  };
}

/**
 * Parse one persisted line, or null when it is malformed.
 */
export function parseAuditLine(line: string): AuditEntry | null {
  let raw: unknown;
  try {
    raw = JSON.parse(line);
  } catch {
    return null;
  }
  const result = AuditEntryRowSchema.safeParse(raw);
  return result.success ? rowToEntry(result.data) : null;
}

// =============================================================================
// Sinks
// =============================================================================

/**
 * Line-oriented persistence for the audit log.
 *
 * Implementations must append each line whole and in call order.
 */
export interface AuditSink {
  append(line: string): Promise<void>;
  readLines(): Promise<string[]>;
}

/**
 * Newline-delimited JSON file sink.
 *
 * The file is created owner-readable only and is never truncated or
 * rewritten. Appends go through a promise queue so that concurrent callers
 * never interleave partial lines.
 */
export class FileAuditSink implements AuditSink {
  readonly filePath: string;
  private writeQueue: Promise<void> = Promise.resolve();

  constructor(filePath: string) {
    this.filePath = filePath;
    closeSync(openSync(filePath, "a", 0o600));
  }

  append(line: string): Promise<void> {
    const write = this.writeQueue.then(() => appendFile(this.filePath, `${line}\n`, "utf8"));
    // The queue continues after a failed write; the caller still receives the rejection.
    this.writeQueue = write.then(
      () => undefined,
      () => undefined
    );
    return write;
  }

  async readLines(): Promise<string[]> {
    try {
      const content = await readFile(this.filePath, "utf8");
      return content.split("\n");
    } catch (error) {
      if (error instanceof Error && "code" in error && error.code === "ENOENT") {
        return [];
      }
      throw error;
    }
  }
}

/**
 * In-memory sink for testing
 */
export class InMemoryAuditSink implements AuditSink {
  private lines: string[] = [];

  async append(line: string): Promise<void> {
    this.lines.push(line);
  }

  async readLines(): Promise<string[]> {
    return [...this.lines];
  }

  /**
   * Clear all lines (for testing)
   */
  clear(): void {
    this.lines = [];
  }
}

// =============================================================================
// Query and Report Types
// =============================================================================

export interface LogActionInput {
  user: string;
  action: string;
  resourceType: string;
  resourceId: string;
  details?: Record<string, unknown>;
  ipAddress?: string;
  userAgent?: string;
}

/**
 * Filters for audit trail queries. All supplied filters must match.
 */
export interface AuditTrailQuery {
  startDate?: Date;
  endDate?: Date;
  user?: string;
  resourceType?: string;
  resourceId?: string;
  action?: string;
  /** Stop after this many matches (default: 1000) */
  limit?: number;
}

export interface ComplianceStatistics {
  totalActions: number;
  uniqueUsers: number;
  actionsByType: Record<string, number>;
  usersByActivity: Record<string, number>;
  metricsModified: number;
  failedOperations: number;
}

export interface ComplianceReport {
  reportPeriod: { start: string; end: string };
  statistics: ComplianceStatistics;
  entries: AuditEntry[];
}

export interface IntegrityReport {
  totalEntries: number;
  corruptedEntries: number;
  integrityScore: number;
  dateRange: { earliest: string | null; latest: string | null };
}

export const DEFAULT_TRAIL_LIMIT = 1000;

function matchesQuery(entry: AuditEntry, query: AuditTrailQuery): boolean {
  if (query.startDate && entry.timestamp < query.startDate) return false;
  if (query.endDate && entry.timestamp > query.endDate) return false;
  if (query.user !== undefined && entry.user !== query.user) return false;
  if (query.resourceType !== undefined && entry.resourceType !== query.resourceType) return false;
  if (query.resourceId !== undefined && entry.resourceId !== query.resourceId) return false;
  if (query.action !== undefined && entry.action !== query.action) return false;
  return true;
}

function timestampOf(line: string): Date | null {
  let raw: unknown;
  try {
    raw = JSON.parse(line);
  } catch {
    return null;
  }
  if (raw === null || typeof raw !== "object" || !("timestamp" in raw)) {
    return null;
  }
  const { timestamp } = raw;
  if (typeof timestamp !== "string") return null;
  const parsed = new Date(timestamp);
  return Number.isNaN(parsed.getTime()) ? null : parsed;
}

// =============================================================================
// AuditLogger
// =============================================================================

export class AuditLogger {
  private readonly sink: AuditSink;

  constructor(sink: AuditSink) {
    this.sink = sink;
  }

  /**
   * Append one entry with a fresh id and the current timestamp.
   */
  async logAction(input: LogActionInput): Promise<AuditEntry> {
    const entry: AuditEntry = {
      id: randomUUID(),
      timestamp: new Date(),
      user: input.user,
      action: input.action,
      resourceType: input.resourceType,
      resourceId: input.resourceId,
      details: input.details ?? {},
      ipAddress: input.ipAddress,
      userAgent: input.userAgent,
    };

    try {
      await this.sink.append(JSON.stringify(entryToRow(entry)));
    } catch (error) {
      console.error(
        `[AuditLogger] Failed to append ${entry.action} for ${entry.resourceType}/${entry.resourceId}:`,
        error
      );
      throw error;
    }

    return entry;
  }

  /**
   * Log a create, update or delete of a metric definition
   */
  async logMetricChange(input: {
    user: string;
    metricName: string;
    changeType: ChangeType;
    oldDefinition?: Record<string, unknown>;
    newDefinition: Record<string, unknown>;
    approvedBy?: string;
  }): Promise<AuditEntry> {
    return this.logAction({
      user: input.user,
      action: `metric_${input.changeType}`,
      resourceType: "metric",
      resourceId: input.metricName,
      details: {
        oldDefinition: input.oldDefinition ?? null,
        newDefinition: input.newDefinition,
        approvedBy: input.approvedBy ?? null,
        changeType: input.changeType,
      },
    });
  }

  /**
   * Log the outcome of rendering a metric into a vendor artifact
   */
  async logAdapterGeneration(input: {
    user: string;
    metricName: string;
    adapterType: string;
    outputFile: string;
    success: boolean;
    errorMessage?: string;
  }): Promise<AuditEntry> {
    return this.logAction({
      user: input.user,
      action: AUDIT_ACTIONS.ADAPTER_GENERATED,
      resourceType: "adapter",
      resourceId: `${input.metricName}_${input.adapterType}`,
      details: {
        metricName: input.metricName,
        adapterType: input.adapterType,
        outputFile: input.outputFile,
        success: input.success,
        errorMessage: input.errorMessage ?? null,
      },
    });
  }

  async logApiAccess(input: {
    user: string;
    endpoint: string;
    method: string;
    responseCode: number;
    ipAddress: string;
    userAgent: string;
  }): Promise<AuditEntry> {
    return this.logAction({
      user: input.user,
      action: AUDIT_ACTIONS.API_ACCESS,
      resourceType: "endpoint",
      resourceId: input.endpoint,
      details: { method: input.method, responseCode: input.responseCode },
      ipAddress: input.ipAddress,
      userAgent: input.userAgent,
    });
  }

  /**
   * Scan the log in write order, returning entries that match every filter.
   * Malformed lines are skipped.
   */
  async getAuditTrail(query: AuditTrailQuery = {}): Promise<AuditEntry[]> {
    const limit = query.limit ?? DEFAULT_TRAIL_LIMIT;
    const entries: AuditEntry[] = [];
    if (limit <= 0) return entries;

    const lines = await this.sink.readLines();
    for (const line of lines) {
      if (line.trim().length === 0) continue;
      const entry = parseAuditLine(line);
      if (!entry || !matchesQuery(entry, query)) continue;

      entries.push(entry);
      if (entries.length >= limit) break;
    }

    return entries;
  }

  /**
   * Complete change history for one metric
   */
  async getMetricHistory(metricName: string): Promise<AuditEntry[]> {
    return this.getAuditTrail({ resourceType: "metric", resourceId: metricName });
  }

  async generateComplianceReport(startDate: Date, endDate: Date): Promise<ComplianceReport> {
    const entries = await this.getAuditTrail({ startDate, endDate });

    const actionsByType: Record<string, number> = {};
    const usersByActivity: Record<string, number> = {};
    const metrics = new Set<string>();
    let failedOperations = 0;

    for (const entry of entries) {
      actionsByType[entry.action] = (actionsByType[entry.action] ?? 0) + 1;
      usersByActivity[entry.user] = (usersByActivity[entry.user] ?? 0) + 1;

      if (entry.resourceType === "metric") {
        metrics.add(entry.resourceId);
      }
      if (entry.resourceType === "adapter" && entry.details.success === false) {
        failedOperations++;
      }
    }

    return {
      reportPeriod: { start: startDate.toISOString(), end: endDate.toISOString() },
      statistics: {
        totalActions: entries.length,
        uniqueUsers: Object.keys(usersByActivity).length,
        actionsByType,
        usersByActivity,
        metricsModified: metrics.size,
        failedOperations,
      },
      entries,
    };
  }

  /**
   * Count lines that fail to parse or carry no valid timestamp.
   * Blank lines are not entries and are not counted.
   */
  async verifyIntegrity(): Promise<IntegrityReport> {
    const lines = await this.sink.readLines();

    let totalEntries = 0;
    let corruptedEntries = 0;
    let earliest: Date | null = null;
    let latest: Date | null = null;

    for (const line of lines) {
      if (line.trim().length === 0) continue;
      totalEntries++;

      const timestamp = timestampOf(line);
      if (!timestamp) {
        corruptedEntries++;
        continue;
      }
      if (!earliest || timestamp < earliest) earliest = timestamp;
      if (!latest || timestamp > latest) latest = timestamp;
    }

    return {
      totalEntries,
      corruptedEntries,
      integrityScore: totalEntries > 0 ? (totalEntries - corruptedEntries) / totalEntries : 0,
      dateRange: {
        earliest: earliest ? earliest.toISOString() : null,
        latest: latest ? latest.toISOString() : null,
      },
    };
  }
}

// =============================================================================
// Factory Functions
// =============================================================================

export function createFileAuditLogger(filePath: string): AuditLogger {
  return new AuditLogger(new FileAuditSink(filePath));
}

export function createInMemoryAuditLogger(): { logger: AuditLogger; sink: InMemoryAuditSink } {
  const sink = new InMemoryAuditSink();
  return { logger: new AuditLogger(sink), sink };
}
