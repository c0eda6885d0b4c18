/**
 * Access Control - Role-Based Permissions with Domain Scoping
 *
 * Resolves (user, resource, permission, resource id) to allow/deny:
 * 1. The user must be registered
 * 2. The role table must grant the permission on the resource
 * 3. For metrics and dimensions named by id, the user must have access to
 *    the metric's domain (team member, domain steward, or admin)
 * 4. Per-user overrides never rescue a role-level deny, and once the role
 *    gate passes they add nothing
 *
 * Step 4 is current behavior and is tracked as an open design question.
 *
 * @example
 * ```typescript
 * const acl = new AccessControlManager();
 * acl.addUser({ username: "dana", email: "dana@example.com", role: "steward", teams: [] });
 * acl.setMetricDomain("net_revenue", "finance");
 * acl.assignDomainSteward("finance", "dana");
 *
 * acl.canApproveChanges("dana", "net_revenue"); // true
 * ```
 */

import {
  DEFAULT_ROLE_PERMISSIONS,
  getRolePermissions,
  roleCoversResource,
  type RolePermissionTable,
} from "../config/defaults/index.js";
import {
  UserSchema,
  type Permission,
  type Resource,
  type User,
  type UserInput,
  type UserRole,
} from "./schemas.js";

/**
 * Capabilities summary for one user
 */
export interface PermissionSummary {
  username: string;
  role: UserRole;
  teams: string[];
  domains: string[];
  accessibleMetricsCount: number;
  permissions: {
    canReadMetrics: boolean;
    canWriteMetrics: boolean;
    canApproveChanges: boolean;
    canDeleteMetrics: boolean;
    canManageUsers: boolean;
    canViewAudit: boolean;
  };
}

const DOMAIN_SCOPED_RESOURCES: ReadonlySet<Resource> = new Set(["metric", "dimension"]);

function copyUser(user: User): User {
  const permissions: User["permissions"] = {};
  for (const [key, values] of Object.entries(user.permissions)) {
    permissions[key] = [...values];
  }
  return { ...user, teams: [...user.teams], permissions };
}

export class AccessControlManager {
  private readonly users = new Map<string, User>();
  private readonly domainStewards = new Map<string, string[]>();
  private readonly metricDomains = new Map<string, string>();
  private readonly rolePermissions: RolePermissionTable;

  constructor(options: { rolePermissions?: RolePermissionTable } = {}) {
    this.rolePermissions = options.rolePermissions ?? DEFAULT_ROLE_PERMISSIONS;
  }

  // ---------------------------------------------------------------------------
  // Users
  // ---------------------------------------------------------------------------

  /**
   * Register a user (replaces any user with the same username)
   */
  addUser(input: UserInput): User {
    const user = UserSchema.parse(input);
    this.users.set(user.username, user);
    return copyUser(user);
  }

  getUser(username: string): User | undefined {
    const user = this.users.get(username);
    return user ? copyUser(user) : undefined;
  }

  removeUser(username: string): boolean {
    return this.users.delete(username);
  }

  listUsers(): User[] {
    return Array.from(this.users.values(), copyUser);
  }

  // ---------------------------------------------------------------------------
  // Domain Bookkeeping
  // ---------------------------------------------------------------------------

  /**
   * Make a user steward of a domain and add the domain to their teams.
   * Repeated assignment is a no-op.
   */
  assignDomainSteward(domain: string, username: string): void {
    const stewards = this.domainStewards.get(domain) ?? [];
    if (!stewards.includes(username)) {
      stewards.push(username);
    }
    this.domainStewards.set(domain, stewards);

    const user = this.users.get(username);
    if (user && !user.teams.includes(domain)) {
      user.teams.push(domain);
    }
  }

  getDomainStewards(domain: string): string[] {
    return [...(this.domainStewards.get(domain) ?? [])];
  }

  /**
   * Assign a metric to a domain (last write wins)
   */
  setMetricDomain(metricName: string, domain: string): void {
    this.metricDomains.set(metricName, domain);
  }

  getMetricDomain(metricName: string): string | undefined {
    return this.metricDomains.get(metricName);
  }

  // ---------------------------------------------------------------------------
  // Permission Checks
  // ---------------------------------------------------------------------------

  checkPermission(
    username: string,
    resource: Resource,
    permission: Permission,
    resourceId?: string
  ): boolean {
    const user = this.users.get(username);
    if (!user) return false;

    // Role gate: a miss here denies before overrides are consulted
    if (!roleCoversResource(user.role, resource, this.rolePermissions)) return false;
    if (!getRolePermissions(user.role, resource, this.rolePermissions).includes(permission)) {
      return false;
    }

    if (DOMAIN_SCOPED_RESOURCES.has(resource) && resourceId) {
      return this.hasDomainAccess(user, resourceId);
    }

    // Overrides in user.permissions can only widen access, and the role gate
    // has already granted it, so they do not change the outcome here.
    return true;
  }

  /**
   * Whether a user may decide (approve or reject) an approval request.
   *
   * Reads the role of the user passed in. Stewards are not restricted to
   * their domains here.
   */
  canDecideApproval(user: Pick<User, "role">): boolean {
    return user.role === "admin" || user.role === "steward";
  }

  canReadMetric(username: string, metricName: string): boolean {
    return this.checkPermission(username, "metric", "read", metricName);
  }

  canWriteMetric(username: string, metricName: string): boolean {
    return this.checkPermission(username, "metric", "write", metricName);
  }

  canApproveChanges(username: string, metricName: string): boolean {
    return this.checkPermission(username, "metric", "approve", metricName);
  }

  canDeleteMetric(username: string, metricName: string): boolean {
    return this.checkPermission(username, "metric", "delete", metricName);
  }

  canGenerateAdapter(username: string): boolean {
    return this.checkPermission(username, "adapter", "read");
  }

  canViewAudit(username: string): boolean {
    return this.checkPermission(username, "audit", "read");
  }

  // ---------------------------------------------------------------------------
  // Derived Queries
  // ---------------------------------------------------------------------------

  /**
   * Teams plus every domain the user stewards
   */
  getUserDomains(username: string): string[] {
    const user = this.users.get(username);
    if (!user) return [];

    const domains = new Set(user.teams);
    for (const [domain, stewards] of this.domainStewards) {
      if (stewards.includes(username)) {
        domains.add(domain);
      }
    }
    return Array.from(domains);
  }

  /**
   * Metrics with a domain assignment that the user can reach.
   * Admins see every assigned metric.
   */
  getAccessibleMetrics(username: string): string[] {
    const user = this.users.get(username);
    if (!user) return [];

    if (user.role === "admin") {
      return Array.from(this.metricDomains.keys());
    }

    const domains = new Set(this.getUserDomains(username));
    const accessible: string[] = [];
    for (const [metricName, domain] of this.metricDomains) {
      if (domains.has(domain)) {
        accessible.push(metricName);
      }
    }
    return accessible;
  }

  getPermissionSummary(username: string): PermissionSummary | null {
    const user = this.users.get(username);
    if (!user) return null;

    const domains = this.getUserDomains(username);
    const accessibleMetrics = this.getAccessibleMetrics(username);
    const isSteward = user.role === "steward";
    const isAdmin = user.role === "admin";

    return {
      username: user.username,
      role: user.role,
      teams: [...user.teams],
      domains,
      accessibleMetricsCount: accessibleMetrics.length,
      permissions: {
        canReadMetrics: accessibleMetrics.length > 0,
        canWriteMetrics: isSteward || isAdmin,
        canApproveChanges: isSteward || isAdmin,
        canDeleteMetrics: isAdmin,
        canManageUsers: isAdmin,
        canViewAudit: isSteward || isAdmin,
      },
    };
  }

  // ---------------------------------------------------------------------------
  // Helper Methods
  // ---------------------------------------------------------------------------

  private hasDomainAccess(user: User, resourceId: string): boolean {
    if (user.role === "admin") return true;

    const domain = this.metricDomains.get(resourceId);
    if (domain === undefined) return true;

    if (user.teams.includes(domain)) return true;

    return this.domainStewards.get(domain)?.includes(user.username) ?? false;
  }
}

/**
 * Create an access-control manager with the default role table
 */
export function createAccessControl(): AccessControlManager {
  return new AccessControlManager();
}
