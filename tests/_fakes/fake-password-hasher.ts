// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/_fakes/fake-password-hasher`
 * Purpose: Reversible PasswordHasher for fast unit tests.
 * Scope: Never use outside tests; the "hash" embeds the plain text.
 * Side-effects: none
 * Links: ports/password-hasher.port.ts
 * @public
 */

import type { PasswordHasher } from "@/ports";

export class FakePasswordHasher implements PasswordHasher {
  async hash(plain: string): Promise<string> {
    return `hashed:${plain}`;
  }

  async verify(plain: string, hash: string): Promise<boolean> {
    return hash === `hashed:${plain}`;
  }
}
