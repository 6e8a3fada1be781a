// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/auth/services/credentials`
 * Purpose: Password-based identity: authenticate, sign up, change password.
 * Scope: Orchestrates UserRepository + PasswordHasher. Does not issue session tokens (see session.ts).
 * Invariants:
 * - Authentication failures are indistinguishable: unknown user, wrong password and inactive account all raise InvalidCredentialsError.
 * - Signup collects every field problem before failing.
 * - Names longer than the profile columns are field errors, never storage errors.
 * Side-effects: IO (via ports)
 * Links: core/accounts/rules.ts, emailVerification.ts
 * @public
 */

import type { AuthenticatedUser, FieldErrors, User } from "@/core";
import {
  FieldValidationError,
  InvalidCredentialsError,
  isValidEmailFormat,
  NotFoundError,
  normalizeEmail,
  PROFILE_TEXT_MAX_LENGTH,
  passwordPolicyViolations,
  usernameFormatViolations,
} from "@/core";
import type { PasswordHasher, UserRepository } from "@/ports";
import { isAccountConflictPortError, isMailDeliveryPortError } from "@/ports";

import {
  type EmailTokenDeps,
  requestEmailVerification,
} from "./emailVerification";

export interface CredentialDeps {
  users: UserRepository;
  passwordHasher: PasswordHasher;
}

export interface SignUpDeps extends CredentialDeps, EmailTokenDeps {}

export interface SignUpInput {
  username: string;
  email: string;
  password: string;
  firstName?: string | null | undefined;
  lastName?: string | null | undefined;
}

export interface SignUpResult {
  user: AuthenticatedUser;
  /** false when the mail transport rejected the verification mail */
  verificationSent: boolean;
}

const USERNAME_TAKEN = "Username used before!";
const EMAIL_TAKEN = "Email used before!";
const NAME_TOO_LONG = `Must be at most ${PROFILE_TEXT_MAX_LENGTH} characters.`;

export function toAuthenticatedUser(user: User): AuthenticatedUser {
  return {
    id: user.id,
    username: user.username,
    email: user.email,
    isVerified: user.isVerified,
  };
}

export async function authenticate(
  deps: CredentialDeps,
  input: { usernameOrEmail: string; password: string }
): Promise<AuthenticatedUser> {
  const user = await deps.users.findByUsernameOrEmail(input.usernameOrEmail);
  if (!user || !user.isActive) {
    throw new InvalidCredentialsError();
  }

  const matches = await deps.passwordHasher.verify(
    input.password,
    user.passwordHash
  );
  if (!matches) {
    throw new InvalidCredentialsError();
  }

  return toAuthenticatedUser(user);
}

export async function signUp(
  deps: SignUpDeps,
  input: SignUpInput
): Promise<SignUpResult> {
  const username = input.username.trim();
  const email = normalizeEmail(input.email);
  const fieldErrors: Record<string, string[]> = {};

  const usernameProblems = usernameFormatViolations(username);
  if (usernameProblems.length === 0 && (await deps.users.usernameExists(username))) {
    usernameProblems.push(USERNAME_TAKEN);
  }
  if (usernameProblems.length > 0) fieldErrors.username = usernameProblems;

  if (!isValidEmailFormat(email)) {
    fieldErrors.email = ["Enter a valid email address."];
  } else if (await deps.users.emailExists(email)) {
    fieldErrors.email = [EMAIL_TAKEN];
  }

  const passwordProblems = passwordPolicyViolations(input.password);
  if (passwordProblems.length > 0) fieldErrors.password = passwordProblems;

  const firstName = input.firstName?.trim() || null;
  const lastName = input.lastName?.trim() || null;
  if (firstName && firstName.length > PROFILE_TEXT_MAX_LENGTH) {
    fieldErrors.firstName = [NAME_TOO_LONG];
  }
  if (lastName && lastName.length > PROFILE_TEXT_MAX_LENGTH) {
    fieldErrors.lastName = [NAME_TOO_LONG];
  }

  if (Object.keys(fieldErrors).length > 0) {
    throw new FieldValidationError(fieldErrors);
  }

  const passwordHash = await deps.passwordHasher.hash(input.password);

  let user: User;
  try {
    user = await deps.users.createWithProfile({
      username,
      email,
      passwordHash,
      firstName,
      lastName,
    });
  } catch (error) {
    // Lost a race with a concurrent signup for the same name or address
    if (isAccountConflictPortError(error)) {
      const conflict: FieldErrors =
        error.field === "username"
          ? { username: [USERNAME_TAKEN] }
          : { email: [EMAIL_TAKEN] };
      throw new FieldValidationError(conflict);
    }
    throw error;
  }

  let verificationSent = true;
  try {
    await requestEmailVerification(deps, user.id);
  } catch (error) {
    if (!isMailDeliveryPortError(error)) throw error;
    verificationSent = false;
  }

  return { user: toAuthenticatedUser(user), verificationSent };
}

export async function changePassword(
  deps: CredentialDeps,
  input: { userId: string; currentPassword: string; newPassword: string }
): Promise<void> {
  const user = await deps.users.findById(input.userId);
  if (!user || !user.isActive) {
    throw new NotFoundError("user", input.userId);
  }

  const matches = await deps.passwordHasher.verify(
    input.currentPassword,
    user.passwordHash
  );
  if (!matches) {
    throw new InvalidCredentialsError();
  }

  const violations = passwordPolicyViolations(input.newPassword);
  if (violations.length > 0) {
    throw new FieldValidationError({ newPassword: violations });
  }

  await deps.users.updatePasswordHash(
    user.id,
    await deps.passwordHasher.hash(input.newPassword)
  );
}
