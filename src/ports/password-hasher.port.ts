// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports/password-hasher.port`
 * Purpose: One-way password hashing.
 * Scope: Hash and verify only. Does not apply password policy.
 * Invariants: verify() never throws for a malformed hash; it returns false.
 * Side-effects: none (interface only)
 * Links: adapters/server/auth/bcrypt-password-hasher.adapter.ts
 * @public
 */

export interface PasswordHasher {
  hash(plain: string): Promise<string>;
  verify(plain: string, hash: string): Promise<boolean>;
}
