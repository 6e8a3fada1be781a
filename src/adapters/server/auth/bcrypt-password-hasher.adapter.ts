// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/auth/bcrypt-password-hasher`
 * Purpose: PasswordHasher backed by bcryptjs.
 * Scope: Salted one-way hashing and constant-time comparison. Does not enforce password policy.
 * Invariants: Plain passwords are never logged or returned.
 * Side-effects: none (CPU only)
 * Links: ports/password-hasher.port.ts
 * @public
 */

import bcrypt from "bcryptjs";

import type { PasswordHasher } from "@/ports";

export const DEFAULT_BCRYPT_COST = 12;

export class BcryptPasswordHasher implements PasswordHasher {
  constructor(private readonly cost: number = DEFAULT_BCRYPT_COST) {}

  async hash(plain: string): Promise<string> {
    return bcrypt.hash(plain, this.cost);
  }

  async verify(plain: string, hash: string): Promise<boolean> {
    return bcrypt.compare(plain, hash);
  }
}
