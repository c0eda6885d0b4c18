/**
 * Notification Routing Defaults
 *
 * Channel groups expand to fixed lists of concrete channel names. The
 * concrete channels are registered on the NotificationService at startup.
 */

export const CHANNEL_GROUPS = ["stewards", "general", "critical"] as const;
export type ChannelGroup = (typeof CHANNEL_GROUPS)[number];

export const CHANNEL_NAMES = {
  SLACK_STEWARDS: "slack_stewards",
  TEAMS_STEWARDS: "teams_stewards",
  SLACK_GENERAL: "slack_general",
  EMAIL_ADMINS: "email_admins",
} as const;

export const DEFAULT_CHANNEL_ROUTING: Record<ChannelGroup, readonly string[]> = {
  stewards: [CHANNEL_NAMES.SLACK_STEWARDS, CHANNEL_NAMES.TEAMS_STEWARDS],
  general: [CHANNEL_NAMES.SLACK_GENERAL],
  critical: [
    CHANNEL_NAMES.SLACK_STEWARDS,
    CHANNEL_NAMES.TEAMS_STEWARDS,
    CHANNEL_NAMES.EMAIL_ADMINS,
  ],
};

export function isChannelGroup(value: string): value is ChannelGroup {
  return (CHANNEL_GROUPS as readonly string[]).includes(value);
}
