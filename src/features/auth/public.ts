// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/auth/public`
 * Purpose: Single entrypoint for the auth feature.
 * Scope: Re-exports credential, session and emailed-token operations. Does not expose internals.
 * Side-effects: none
 * Links: Used by app facades under src/app/_facades/auth
 * @public
 */

export {
  authenticate,
  changePassword,
  type CredentialDeps,
  type SignUpDeps,
  type SignUpInput,
  type SignUpResult,
  signUp,
} from "./services/credentials";
export {
  type EmailTokenConfig,
  type EmailTokenDeps,
  hashToken,
  PASSWORD_RESET_SUBJECT,
  type PasswordResetDeps,
  requestEmailVerification,
  requestPasswordReset,
  resetPassword,
  type TokenRedemption,
  VERIFICATION_SUBJECT,
  verifyEmail,
} from "./services/emailVerification";
export {
  login,
  refresh,
  type SessionDeps,
  type SessionTokens,
} from "./services/session";
