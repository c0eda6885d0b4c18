/**
 * Role Permission Defaults
 *
 * Static role -> resource -> permissions table used by the access-control
 * manager. A resource missing from a role's map denies every permission on
 * it for that role.
 */

import type { Permission, Resource, UserRole } from "../../core/schemas.js";

export type RolePermissionTable = Record<UserRole, Partial<Record<Resource, readonly Permission[]>>>;

export const ANALYST_PERMISSIONS: RolePermissionTable["analyst"] = {
  metric: ["read"],
  dimension: ["read"],
  adapter: ["read"],
};

export const STEWARD_PERMISSIONS: RolePermissionTable["steward"] = {
  metric: ["read", "write", "approve"],
  dimension: ["read", "write", "approve"],
  adapter: ["read", "write"],
  approval: ["read", "write"],
  audit: ["read"],
};

export const ADMIN_PERMISSIONS: RolePermissionTable["admin"] = {
  metric: ["read", "write", "approve", "delete", "admin"],
  dimension: ["read", "write", "approve", "delete", "admin"],
  adapter: ["read", "write", "delete", "admin"],
  approval: ["read", "write", "approve", "delete", "admin"],
  audit: ["read", "admin"],
  user: ["read", "write", "delete", "admin"],
};

export const DEFAULT_ROLE_PERMISSIONS: RolePermissionTable = {
  analyst: ANALYST_PERMISSIONS,
  steward: STEWARD_PERMISSIONS,
  admin: ADMIN_PERMISSIONS,
};

/**
 * Permissions a role holds on a resource (empty when the role has none).
 */
export function getRolePermissions(
  role: UserRole,
  resource: Resource,
  table: RolePermissionTable = DEFAULT_ROLE_PERMISSIONS
): readonly Permission[] {
  return table[role][resource] ?? [];
}

/**
 * Whether the role table lists the resource at all for this role.
 */
export function roleCoversResource(
  role: UserRole,
  resource: Resource,
  table: RolePermissionTable = DEFAULT_ROLE_PERMISSIONS
): boolean {
  return table[role][resource] !== undefined;
}
