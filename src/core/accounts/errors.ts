// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/accounts/errors`
 * Purpose: Domain errors for credentials and one-time token redemption.
 * Scope: Pure error types. Does not handle HTTP status codes.
 * Invariants: InvalidCredentialsError never says which credential failed.
 * Side-effects: none (error definitions only)
 * Links: features/auth/services
 * @public
 */

import type { OneTimeTokenPurpose } from "./model";

export class InvalidCredentialsError extends Error {
  public readonly code = "INVALID_CREDENTIALS" as const;

  constructor() {
    super("Invalid credentials");
    this.name = "InvalidCredentialsError";
  }
}

/** Unknown token, or token issued to a different user or purpose. */
export class InvalidTokenError extends Error {
  public readonly code = "INVALID_TOKEN" as const;

  constructor(public readonly purpose: OneTimeTokenPurpose) {
    super(`Invalid ${purpose} token`);
    this.name = "InvalidTokenError";
  }
}

export class TokenExpiredError extends Error {
  public readonly code = "TOKEN_EXPIRED" as const;

  constructor(
    public readonly purpose: OneTimeTokenPurpose,
    public readonly expiresAt: Date
  ) {
    super(`The ${purpose} token expired at ${expiresAt.toISOString()}`);
    this.name = "TokenExpiredError";
  }
}

export class TokenAlreadyUsedError extends Error {
  public readonly code = "TOKEN_ALREADY_USED" as const;

  constructor(public readonly purpose: OneTimeTokenPurpose) {
    super(`The ${purpose} token has already been used`);
    this.name = "TokenAlreadyUsedError";
  }
}

export function isInvalidCredentialsError(
  error: unknown
): error is InvalidCredentialsError {
  return error instanceof InvalidCredentialsError;
}

export function isInvalidTokenError(
  error: unknown
): error is InvalidTokenError {
  return error instanceof InvalidTokenError;
}

export function isTokenExpiredError(
  error: unknown
): error is TokenExpiredError {
  return error instanceof TokenExpiredError;
}

export function isTokenAlreadyUsedError(
  error: unknown
): error is TokenAlreadyUsedError {
  return error instanceof TokenAlreadyUsedError;
}
