// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports/token-service.port`
 * Purpose: Signed session token issuance and verification.
 * Scope: Stateless tokens carrying user identity, kind and expiry. Does not store or revoke tokens.
 * Invariants:
 * - Expiry is the only invalidation mechanism.
 * - verify() rejects missing, malformed, tampered, expired and wrong-kind tokens with UnauthorizedError.
 * Side-effects: none (interface only)
 * Links: adapters/server/auth/jwt-token-service.adapter.ts
 * @public
 */

import type { SessionUser } from "@/shared/auth";

export type TokenKind = "access" | "refresh";

export interface IssuedToken {
  token: string;
  expiresAt: Date;
}

export interface TokenService {
  issue(identity: SessionUser, kind: TokenKind): Promise<IssuedToken>;

  /**
   * @throws UnauthorizedError on any verification failure
   */
  verify(token: string | null | undefined, kind: TokenKind): Promise<SessionUser>;
}
