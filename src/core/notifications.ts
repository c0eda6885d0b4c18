/**
 * Notifications - Channel Routing for Governance Events
 *
 * A channel group (stewards, general, critical) expands to a fixed list of
 * concrete channels. Each channel is a capability: it accepts a message and
 * optional metadata and reports whether delivery succeeded. One channel's
 * failure never blocks another channel or the caller.
 *
 * @example
 * ```typescript
 * const notifier = new NotificationService();
 * notifier.addChannel("slack_general", new ChatWebhookChannel(webhookUrl));
 *
 * const results = await notifier.sendNotification("general", "Metric approved");
 * // { slack_general: true }
 * ```
 */

import {
  DEFAULT_CHANNEL_ROUTING,
  isChannelGroup,
  type ChannelGroup,
} from "../config/defaults/index.js";
import type { ChangeType } from "./schemas.js";

// =============================================================================
// Channel Capability
// =============================================================================

export type NotificationMetadata = Record<string, unknown>;

export interface NotificationChannel {
  send(message: string, metadata?: NotificationMetadata): Promise<boolean>;
}

/**
 * Minimal fetch signature used by the webhook channels
 */
export type FetchLike = (
  url: string,
  init: {
    method: string;
    headers: Record<string, string>;
    body: string;
    signal?: AbortSignal;
  }
) => Promise<{ ok: boolean; status: number }>;

export interface WebhookChannelOptions {
  /** Injected fetch implementation (default: global fetch) */
  fetch?: FetchLike;
  /** Request timeout in milliseconds (default: 10000) */
  timeoutMs?: number;
}

const DEFAULT_WEBHOOK_TIMEOUT_MS = 10_000;

async function postJson(
  fetchImpl: FetchLike,
  url: string,
  payload: unknown,
  timeoutMs: number
): Promise<boolean> {
  try {
    const response = await fetchImpl(url, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(payload),
      signal: AbortSignal.timeout(timeoutMs),
    });
    if (!response.ok) {
      console.warn(`[Notifications] Webhook responded with status ${response.status}`);
    }
    return response.ok;
  } catch (error) {
    console.error(
      "[Notifications] Webhook delivery failed:",
      error instanceof Error ? error.message : String(error)
    );
    return false;
  }
}

function stringField(metadata: NotificationMetadata | undefined, key: string): string | undefined {
  const value = metadata?.[key];
  return typeof value === "string" ? value : undefined;
}

// =============================================================================
// Concrete Channels
// =============================================================================

/**
 * Chat webhook (Slack-compatible incoming webhook payload)
 */
export class ChatWebhookChannel implements NotificationChannel {
  private readonly webhookUrl: string;
  private readonly channel?: string;
  private readonly fetchImpl: FetchLike;
  private readonly timeoutMs: number;

  constructor(webhookUrl: string, options: WebhookChannelOptions & { channel?: string } = {}) {
    this.webhookUrl = webhookUrl;
    this.channel = options.channel;
    this.fetchImpl = options.fetch ?? fetch;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_WEBHOOK_TIMEOUT_MS;
  }

  buildPayload(message: string, metadata?: NotificationMetadata): Record<string, unknown> {
    const payload: Record<string, unknown> = {
      text: message,
      username: "Semantic Governance",
      icon_emoji: ":shield:",
    };

    if (this.channel) {
      payload.channel = this.channel;
    }

    const approvalId = stringField(metadata, "approvalId");
    if (approvalId) {
      payload.attachments = [
        {
          color: metadata?.decision === "approved" ? "good" : "warning",
          fields: [
            { title: "Approval ID", value: approvalId, short: true },
            {
              title: "Change Type",
              value: stringField(metadata, "changeType") ?? "unknown",
              short: true,
            },
          ],
        },
      ];
    }

    return payload;
  }

  send(message: string, metadata?: NotificationMetadata): Promise<boolean> {
    return postJson(this.fetchImpl, this.webhookUrl, this.buildPayload(message, metadata), this.timeoutMs);
  }
}

/**
 * Incident webhook (Teams-compatible MessageCard payload)
 */
export class IncidentWebhookChannel implements NotificationChannel {
  private readonly webhookUrl: string;
  private readonly approvalBaseUrl?: string;
  private readonly fetchImpl: FetchLike;
  private readonly timeoutMs: number;

  constructor(
    webhookUrl: string,
    options: WebhookChannelOptions & { approvalBaseUrl?: string } = {}
  ) {
    this.webhookUrl = webhookUrl;
    this.approvalBaseUrl = options.approvalBaseUrl;
    this.fetchImpl = options.fetch ?? fetch;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_WEBHOOK_TIMEOUT_MS;
  }

  buildPayload(message: string, metadata?: NotificationMetadata): Record<string, unknown> {
    const payload: Record<string, unknown> = {
      "@type": "MessageCard",
      "@context": "https://schema.org/extensions",
      summary: "Semantic Governance Notification",
      themeColor: "0078D4",
      title: "Semantic Layer Governance",
      text: message,
    };

    const approvalId = stringField(metadata, "approvalId");
    if (approvalId && this.approvalBaseUrl) {
      payload.potentialAction = [
        {
          "@type": "OpenUri",
          name: "View Approval",
          targets: [{ os: "default", uri: `${this.approvalBaseUrl}/approvals/${approvalId}` }],
        },
      ];
    }

    return payload;
  }

  send(message: string, metadata?: NotificationMetadata): Promise<boolean> {
    return postJson(this.fetchImpl, this.webhookUrl, this.buildPayload(message, metadata), this.timeoutMs);
  }
}

/**
 * Email channel. SMTP delivery is not wired; messages are written to the
 * console for the configured recipients.
 */
export class EmailChannel implements NotificationChannel {
  private readonly recipients: string[];

  constructor(recipients: string[]) {
    this.recipients = [...recipients];
  }

  async send(message: string): Promise<boolean> {
    if (this.recipients.length === 0) {
      console.warn("[Notifications] Email channel has no recipients");
      return false;
    }
    console.log(`[Notifications] EMAIL to ${this.recipients.join(", ")}: ${message}`);
    return true;
  }
}

// =============================================================================
// NotificationService
// =============================================================================

export type DeliveryResults = Record<string, boolean>;

export interface ChannelTestResult {
  status: "success" | "failed" | "error";
  error: string | null;
}

export interface StaleApprovalSummary {
  metricName: string;
  changeType: ChangeType;
  daysPending: number;
}

export interface SystemEventDetails {
  message?: string;
  timestamp?: Date;
  components?: string[];
  /** "high" routes the event to the critical group */
  severity?: "low" | "medium" | "high";
  [key: string]: unknown;
}

export class NotificationService {
  private readonly channels = new Map<string, NotificationChannel>();
  private readonly routing: Record<ChannelGroup, readonly string[]>;
  private readonly enabled: boolean;

  constructor(
    options: { routing?: Record<ChannelGroup, readonly string[]>; enabled?: boolean } = {}
  ) {
    this.routing = options.routing ?? DEFAULT_CHANNEL_ROUTING;
    this.enabled = options.enabled ?? true;
  }

  addChannel(name: string, channel: NotificationChannel): void {
    this.channels.set(name, channel);
  }

  removeChannel(name: string): boolean {
    return this.channels.delete(name);
  }

  getChannelNames(): string[] {
    return Array.from(this.channels.keys());
  }

  /**
   * Send to every channel of a group. Never throws: each channel reports
   * true or false, and unregistered channels report false.
   */
  async sendNotification(
    group: string,
    message: string,
    metadata?: NotificationMetadata
  ): Promise<DeliveryResults> {
    if (!this.enabled) {
      return {};
    }
    if (!isChannelGroup(group)) {
      console.warn(`[Notifications] Unknown channel group: ${group}`);
      return {};
    }

    const targets = this.routing[group];
    const outcomes = await Promise.all(
      targets.map(async (name): Promise<[string, boolean]> => {
        const channel = this.channels.get(name);
        if (!channel) {
          return [name, false];
        }
        try {
          return [name, await channel.send(message, metadata)];
        } catch (error) {
          console.error(
            `[Notifications] Channel ${name} threw during delivery:`,
            error instanceof Error ? error.message : String(error)
          );
          return [name, false];
        }
      })
    );

    const results: DeliveryResults = {};
    for (const [name, delivered] of outcomes) {
      results[name] = delivered;
    }
    return results;
  }

  /**
   * Announce a new pending request. Breaking changes go to the critical group.
   */
  async notifyApprovalRequest(input: {
    approvalId: string;
    metricName: string;
    changeType: ChangeType;
    author: string;
    breakingChange: boolean;
    description?: string;
    justification?: string;
  }): Promise<DeliveryResults> {
    const group: ChannelGroup = input.breakingChange ? "critical" : "stewards";

    const lines = [
      "**Semantic Change Approval Required**",
      "",
      `**Metric:** ${input.metricName}`,
      `**Type:** ${input.changeType}`,
      `**Author:** ${input.author}`,
      `**Breaking Change:** ${input.breakingChange ? "YES" : "No"}`,
    ];
    if (input.description) lines.push("", `**Description:** ${input.description}`);
    if (input.justification) lines.push(`**Justification:** ${input.justification}`);
    lines.push("", `**Approval ID:** ${input.approvalId}`);

    return this.sendNotification(group, lines.join("\n"), {
      approvalId: input.approvalId,
      changeType: input.changeType,
      breakingChange: input.breakingChange,
    });
  }

  async notifyApprovalDecision(input: {
    approvalId: string;
    metricName: string;
    decision: "approved" | "rejected";
    approver: string;
    comments: string;
  }): Promise<DeliveryResults> {
    const title = input.decision === "approved" ? "Approved" : "Rejected";
    const message = [
      `**Semantic Change ${title}**`,
      "",
      `**Metric:** ${input.metricName}`,
      `**Decision:** ${input.decision}`,
      `**Approver:** ${input.approver}`,
      `**Comments:** ${input.comments || "None"}`,
      "",
      `**Approval ID:** ${input.approvalId}`,
    ].join("\n");

    return this.sendNotification("general", message, {
      approvalId: input.approvalId,
      decision: input.decision,
    });
  }

  /**
   * Alert the critical group about requests pending past the threshold.
   * Sends nothing when the list is empty.
   */
  async notifyStaleApprovals(
    stale: StaleApprovalSummary[],
    maxAgeDays: number
  ): Promise<DeliveryResults> {
    if (stale.length === 0) {
      return {};
    }

    const lines = [
      `**${stale.length} Stale Approval Requests**`,
      "",
      `The following approval requests have been pending for more than ${maxAgeDays} days:`,
      "",
      ...stale.map(
        (item) => `- ${item.metricName} (${item.changeType}) - ${item.daysPending} days`
      ),
      "",
      "Please review these requests to maintain governance compliance.",
    ];

    return this.sendNotification("critical", lines.join("\n"));
  }

  /**
   * Announce an operational event. High severity goes to the critical group,
   * everything else to general.
   */
  async notifySystemEvent(
    eventType: string,
    details: SystemEventDetails = {}
  ): Promise<DeliveryResults> {
    const group: ChannelGroup = details.severity === "high" ? "critical" : "general";

    const message = [
      `**System Event: ${eventType}**`,
      "",
      details.message ?? "No additional details",
      "",
      `**Timestamp:** ${details.timestamp ? details.timestamp.toISOString() : "Unknown"}`,
      `**Affected Components:** ${(details.components ?? []).join(", ")}`,
    ].join("\n");

    return this.sendNotification(group, message, details);
  }

  /**
   * Send a test message through every registered channel
   */
  async testNotifications(): Promise<Record<string, ChannelTestResult>> {
    const results: Record<string, ChannelTestResult> = {};
    const message = "Semantic governance notification test. This is a test message.";

    for (const [name, channel] of this.channels) {
      try {
        const delivered = await channel.send(message, { test: true });
        results[name] = { status: delivered ? "success" : "failed", error: null };
      } catch (error) {
        results[name] = {
          status: "error",
          error: error instanceof Error ? error.message : String(error),
        };
      }
    }

    return results;
  }
}
