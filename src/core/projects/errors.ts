// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/projects/errors`
 * Purpose: Domain errors for voting and tagging.
 * Scope: Pure error types. Does not handle HTTP status codes.
 * Invariants: Both map to 409 Conflict at the route layer.
 * Side-effects: none (error definitions only)
 * Links: features/projects/services
 * @public
 */

/**
 * A voter already has a review on this project. Re-voting is rejected;
 * the existing review is edited or deleted instead.
 */
export class AlreadyVotedError extends Error {
  public readonly code = "ALREADY_VOTED" as const;

  constructor(
    public readonly projectId: string,
    public readonly voterId: string
  ) {
    super(`User ${voterId} has already reviewed project ${projectId}`);
    this.name = "AlreadyVotedError";
  }
}

export class DuplicateTagError extends Error {
  public readonly code = "DUPLICATE_TAG" as const;

  constructor(
    public readonly projectId: string,
    public readonly tagName: string
  ) {
    super(`Project ${projectId} already has tag "${tagName}"`);
    this.name = "DuplicateTagError";
  }
}

export function isAlreadyVotedError(
  error: unknown
): error is AlreadyVotedError {
  return error instanceof AlreadyVotedError;
}

export function isDuplicateTagError(
  error: unknown
): error is DuplicateTagError {
  return error instanceof DuplicateTagError;
}
