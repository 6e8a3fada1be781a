// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/accounts/rules`
 * Purpose: Pure account rules: password policy, username/email format, one-time token redemption checks.
 * Scope: Validation and classification only. Does not touch storage, hashing or mail.
 * Invariants: Password policy reports every violated rule, in a fixed order.
 * Side-effects: none
 * Links: features/auth/services/credentials.ts, features/auth/services/emailVerification.ts
 * @public
 */

import {
  InvalidTokenError,
  TokenAlreadyUsedError,
  TokenExpiredError,
} from "./errors";
import type { OneTimeToken, OneTimeTokenPurpose } from "./model";

export const PASSWORD_MIN_LENGTH = 8;
export const PASSWORD_MAX_LENGTH = 50;

export const USERNAME_MIN_LENGTH = 3;
export const USERNAME_MAX_LENGTH = 50;
const USERNAME_PATTERN = /^[A-Za-z0-9_.-]+$/;

// Matches the widest column an address is copied into (messages.sender_email).
export const EMAIL_MAX_LENGTH = 200;
// Shape check only; deliverability is not verified here.
const EMAIL_PATTERN = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;

/**
 * Returns the message for every password rule the candidate breaks.
 * Empty array means the password is acceptable.
 */
export function passwordPolicyViolations(password: string): string[] {
  const violations: string[] = [];

  if (password.length < PASSWORD_MIN_LENGTH) {
    violations.push("Password must be at least 8 characters.");
  }
  if (password.length > PASSWORD_MAX_LENGTH) {
    violations.push("Password must not exceed 50 characters.");
  }
  if (!/[A-Z]/.test(password)) {
    violations.push("Password must contain at least one uppercase letter.");
  }
  if (!/[a-z]/.test(password)) {
    violations.push("Password must contain at least one lowercase letter.");
  }
  if (!/[0-9]/.test(password)) {
    violations.push("Password must contain at least one digit.");
  }
  if (/\s/.test(password)) {
    violations.push("Password must not contain spaces.");
  }
  if (!/[^A-Za-z0-9\s]/.test(password)) {
    violations.push("Password must contain at least one symbol.");
  }

  return violations;
}

export function usernameFormatViolations(username: string): string[] {
  const violations: string[] = [];
  if (
    username.length < USERNAME_MIN_LENGTH ||
    username.length > USERNAME_MAX_LENGTH
  ) {
    violations.push("Username must be between 3 and 50 characters.");
  }
  if (username.length > 0 && !USERNAME_PATTERN.test(username)) {
    violations.push(
      "Username may only contain letters, digits, dots, dashes and underscores."
    );
  }
  return violations;
}

export function isValidEmailFormat(email: string): boolean {
  return email.length <= EMAIL_MAX_LENGTH && EMAIL_PATTERN.test(email);
}

export function normalizeEmail(email: string): string {
  return email.trim().toLowerCase();
}

/**
 * Ordered redemption checks for a one-time token that was looked up by hash.
 * Throws the first failing condition; returns normally when the token may be consumed.
 */
export function assertTokenRedeemable(
  token: OneTimeToken | null,
  expected: { userId: string; purpose: OneTimeTokenPurpose },
  now: Date
): asserts token is OneTimeToken {
  if (
    !token ||
    token.purpose !== expected.purpose ||
    token.userId !== expected.userId
  ) {
    throw new InvalidTokenError(expected.purpose);
  }
  if (token.consumedAt !== null) {
    throw new TokenAlreadyUsedError(expected.purpose);
  }
  if (token.expiresAt.getTime() <= now.getTime()) {
    throw new TokenExpiredError(expected.purpose, token.expiresAt);
  }
}
