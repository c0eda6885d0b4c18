/**
 * Governance Errors
 *
 * Every error carries a machine-readable `code` so the API layer can map it
 * to a status (NOT_FOUND -> 404, PERMISSION_DENIED -> 403,
 * VALIDATION_ERROR -> 400) without parsing messages.
 */

import type { ZodError } from "zod";

export type GovernanceErrorCode = "NOT_FOUND" | "PERMISSION_DENIED" | "VALIDATION_ERROR";

/**
 * Base class for all governance errors.
 */
export class GovernanceError extends Error {
  readonly code: GovernanceErrorCode;

  constructor(code: GovernanceErrorCode, message: string) {
    super(message);
    this.name = "GovernanceError";
    this.code = code;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Thrown when an approval request is not in the pending table, including
 * requests that were pending but have already been decided.
 */
export class NotFoundError extends GovernanceError {
  readonly resourceId: string;

  constructor(resourceType: string, resourceId: string) {
    super("NOT_FOUND", `${resourceType} ${resourceId} not found`);
    this.name = "NotFoundError";
    this.resourceId = resourceId;
  }
}

/**
 * Thrown when a user is not authorized for the requested operation.
 */
export class PermissionDeniedError extends GovernanceError {
  readonly username: string;

  constructor(username: string, message: string) {
    super("PERMISSION_DENIED", message);
    this.name = "PermissionDeniedError";
    this.username = username;
  }
}

/**
 * Thrown at the service boundary when input fails validation.
 */
export class ValidationError extends GovernanceError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super("VALIDATION_ERROR", message);
    this.name = "ValidationError";
    this.issues = issues;
  }

  static fromZod(subject: string, error: ZodError): ValidationError {
    const issues = error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
    );
    return new ValidationError(`Invalid ${subject}: ${issues.join("; ")}`, issues);
  }
}

export function isGovernanceError(error: unknown): error is GovernanceError {
  return error instanceof GovernanceError;
}
