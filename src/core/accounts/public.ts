// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/accounts/public`
 * Purpose: Public API for the accounts domain.
 * Scope: Barrel export. Does not expose internal implementation details.
 * Invariants: Only exports stable public interfaces and functions.
 * Side-effects: none (re-exports only)
 * Links: Imported via @/core
 * @public
 */

export {
  InvalidCredentialsError,
  InvalidTokenError,
  isInvalidCredentialsError,
  isInvalidTokenError,
  isTokenAlreadyUsedError,
  isTokenExpiredError,
  TokenAlreadyUsedError,
  TokenExpiredError,
} from "./errors";
export type {
  AuthenticatedUser,
  OneTimeToken,
  OneTimeTokenPurpose,
  User,
} from "./model";
export {
  assertTokenRedeemable,
  EMAIL_MAX_LENGTH,
  isValidEmailFormat,
  normalizeEmail,
  PASSWORD_MAX_LENGTH,
  PASSWORD_MIN_LENGTH,
  passwordPolicyViolations,
  USERNAME_MAX_LENGTH,
  USERNAME_MIN_LENGTH,
  usernameFormatViolations,
} from "./rules";
