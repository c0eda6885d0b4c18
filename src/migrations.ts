/**
 * Semantic Layer Governance - SQL Migrations
 *
 * Locates the SQL files that create the approval archive tables.
 *
 * @example
 * ```typescript
 * import { readAllMigrations } from "semantic-layer-governance/migrations";
 *
 * for (const { name, sql } of readAllMigrations()) {
 *   await runSql(name, sql);
 * }
 * ```
 */

import { fileURLToPath } from "node:url";
import { dirname, join } from "node:path";
import { readFileSync, existsSync } from "node:fs";

const moduleDir = dirname(fileURLToPath(import.meta.url));

// Resolves from both src/ and dist/
const MIGRATIONS_DIR = join(moduleDir, "..", "migrations");

export const MIGRATIONS = {
  APPROVAL_REQUESTS: "001_approval_requests.sql",
} as const;

export type MigrationName = (typeof MIGRATIONS)[keyof typeof MIGRATIONS];

export const MIGRATION_ORDER: readonly MigrationName[] = [MIGRATIONS.APPROVAL_REQUESTS];

export function getMigrationsDir(): string {
  return MIGRATIONS_DIR;
}

export function getMigrationPath(migration: MigrationName): string {
  return join(MIGRATIONS_DIR, migration);
}

export function readMigration(migration: MigrationName): string {
  const path = getMigrationPath(migration);
  if (!existsSync(path)) {
    throw new Error(`Migration file not found: ${path}`);
  }
  return readFileSync(path, "utf-8");
}

/**
 * Read all migrations, in order, as { name, sql } pairs
 */
export function readAllMigrations(): Array<{ name: MigrationName; sql: string }> {
  return MIGRATION_ORDER.map((name) => ({ name, sql: readMigration(name) }));
}

export function validateMigrations(): { valid: boolean; missing: string[] } {
  const missing = MIGRATION_ORDER.filter((file) => !existsSync(getMigrationPath(file)));
  return { valid: missing.length === 0, missing };
}
