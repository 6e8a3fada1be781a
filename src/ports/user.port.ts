// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports/user.port`
 * Purpose: Persistence port for user accounts (credentials and flags).
 * Scope: Defines the repository contract and port-level errors. Does not hash passwords.
 * Invariants: Users are never hard-deleted; email is compared lower-cased; username lookups are case-insensitive.
 * Side-effects: none (interface only)
 * Links: adapters/server/accounts/drizzle-user.adapter.ts
 * @public
 */

import type { User } from "@/core";

export type { User } from "@/core";

/**
 * Port-level error thrown when a unique username/email constraint fires on insert
 * (lost race against a concurrent signup).
 */
export class AccountConflictPortError extends Error {
  constructor(public readonly field: "username" | "email") {
    super(`Account ${field} already in use`);
    this.name = "AccountConflictPortError";
  }
}

export function isAccountConflictPortError(
  error: unknown
): error is AccountConflictPortError {
  return error instanceof Error && error.name === "AccountConflictPortError";
}

export interface CreateUserParams {
  username: string;
  /** Already normalized */
  email: string;
  passwordHash: string;
  firstName?: string | null | undefined;
  lastName?: string | null | undefined;
}

export interface UserRepository {
  findById(userId: string): Promise<User | null>;

  /**
   * Lookup for login: matches username (case-insensitive) or email.
   */
  findByUsernameOrEmail(identifier: string): Promise<User | null>;

  findByEmail(email: string): Promise<User | null>;

  usernameExists(username: string): Promise<boolean>;

  emailExists(email: string): Promise<boolean>;

  /**
   * Create the user and its empty profile in one transaction.
   * @throws AccountConflictPortError on unique violation
   */
  createWithProfile(params: CreateUserParams): Promise<User>;

  updatePasswordHash(userId: string, passwordHash: string): Promise<void>;

  /** Soft delete: sets isActive=false. */
  deactivate(userId: string): Promise<void>;
}
