/**
 * Default Configuration Exports
 *
 * Re-exports the role permission table and notification routing defaults.
 *
 * @example
 * ```typescript
 * import {
 *   DEFAULT_ROLE_PERMISSIONS,
 *   DEFAULT_CHANNEL_ROUTING,
 * } from "semantic-layer-governance/config";
 * ```
 */

// Role Permissions
export {
  ANALYST_PERMISSIONS,
  STEWARD_PERMISSIONS,
  ADMIN_PERMISSIONS,
  DEFAULT_ROLE_PERMISSIONS,
  getRolePermissions,
  roleCoversResource,
  type RolePermissionTable,
} from "./role-permissions.js";

// Notification Routing
export {
  CHANNEL_GROUPS,
  CHANNEL_NAMES,
  DEFAULT_CHANNEL_ROUTING,
  isChannelGroup,
  type ChannelGroup,
} from "./channel-routing.js";
