// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/accounts/model`
 * Purpose: Account identity and one-time token entities.
 * Scope: Pure types. Does not contain persistence or hashing.
 * Invariants: passwordHash never leaves the credential store boundary; one-time tokens are stored hashed.
 * Side-effects: none
 * Links: ports/user.port.ts, ports/one-time-token.port.ts
 * @public
 */

export interface User {
  id: string;
  username: string;
  /** Lower-cased */
  email: string;
  passwordHash: string;
  isVerified: boolean;
  isActive: boolean;
  createdAt: Date;
}

/** User projection returned after a successful credential check. */
export interface AuthenticatedUser {
  id: string;
  username: string;
  email: string;
  isVerified: boolean;
}

export type OneTimeTokenPurpose = "email_verification" | "password_reset";

export interface OneTimeToken {
  id: string;
  userId: string;
  purpose: OneTimeTokenPurpose;
  tokenHash: string;
  expiresAt: Date;
  consumedAt: Date | null;
  createdAt: Date;
}
