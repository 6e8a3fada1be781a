// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/common/errors`
 * Purpose: Cross-domain errors shared by every feature (not found, forbidden, unauthorized, field validation).
 * Scope: Pure error types with no infrastructure dependencies. Does not handle HTTP status codes.
 * Invariants: Messages never include credentials or token material.
 * Side-effects: none (error definitions only)
 * Notes: Route handlers map these to 404/403/401/400 via handleRouteError.
 * Links: src/app/_lib/http/handleRouteError.ts
 * @public
 */

export type EntityKind =
  | "user"
  | "profile"
  | "skill"
  | "project"
  | "tag"
  | "review"
  | "message";

export class NotFoundError extends Error {
  public readonly code = "NOT_FOUND" as const;

  constructor(
    public readonly entity: EntityKind,
    public readonly entityId: string
  ) {
    super(`${entity} ${entityId} not found`);
    this.name = "NotFoundError";
  }
}

/**
 * Caller is authenticated but may not perform the action on this resource.
 */
export class ForbiddenError extends Error {
  public readonly code = "FORBIDDEN" as const;

  constructor(public readonly action: string) {
    super(`Forbidden: ${action}`);
    this.name = "ForbiddenError";
  }
}

/**
 * Missing, malformed, tampered, expired or wrong-kind session token.
 * `reason` is for logs only; never surfaced to clients.
 */
export class UnauthorizedError extends Error {
  public readonly code = "UNAUTHORIZED" as const;

  constructor(
    public readonly reason:
      | "missing"
      | "invalid"
      | "expired"
      | "wrong_kind"
      | "inactive" = "invalid"
  ) {
    super("Unauthorized");
    this.name = "UnauthorizedError";
  }
}

export type FieldErrors = Readonly<Record<string, readonly string[]>>;

/**
 * Per-field validation failure (form-style); keys are input field names.
 */
export class FieldValidationError extends Error {
  public readonly code = "FIELD_VALIDATION" as const;

  constructor(public readonly fieldErrors: FieldErrors) {
    super(`Validation failed for: ${Object.keys(fieldErrors).join(", ")}`);
    this.name = "FieldValidationError";
  }
}

export function isNotFoundError(error: unknown): error is NotFoundError {
  return error instanceof NotFoundError;
}

export function isForbiddenError(error: unknown): error is ForbiddenError {
  return error instanceof ForbiddenError;
}

export function isUnauthorizedError(
  error: unknown
): error is UnauthorizedError {
  return error instanceof UnauthorizedError;
}

export function isFieldValidationError(
  error: unknown
): error is FieldValidationError {
  return error instanceof FieldValidationError;
}
