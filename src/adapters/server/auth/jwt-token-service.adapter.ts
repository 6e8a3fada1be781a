// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/auth/jwt-token-service`
 * Purpose: TokenService issuing encrypted session tokens via next-auth/jwt.
 * Scope: Issue and verify access/refresh tokens. Does not check that the user is still active.
 * Invariants:
 * - Access and refresh tokens use distinct salts and carry a `kind` claim; one never verifies as the other.
 * - Every verification failure surfaces as UnauthorizedError; the reason distinguishes expiry.
 * Side-effects: none (crypto only)
 * Notes: next-auth/jwt encrypts with A256GCM under an HKDF-derived key and enforces exp on decode.
 * Links: ports/token-service.port.ts
 * @public
 */

import { decode, encode, type JWT } from "next-auth/jwt";

import { UnauthorizedError } from "@/core";
import type { IssuedToken, TokenKind, TokenService } from "@/ports";
import type { SessionUser } from "@/shared/auth";

export interface JwtTokenServiceConfig {
  secret: string;
  accessTtlSeconds: number;
  refreshTtlSeconds: number;
  now?: () => number;
}

const SALT: Record<TokenKind, string> = {
  access: "devsearch.access-token",
  refresh: "devsearch.refresh-token",
};

export class JwtTokenService implements TokenService {
  private readonly now: () => number;

  constructor(private readonly config: JwtTokenServiceConfig) {
    this.now = config.now ?? Date.now;
  }

  async issue(identity: SessionUser, kind: TokenKind): Promise<IssuedToken> {
    const maxAge = this.ttl(kind);
    const token = await encode({
      token: { sub: identity.id, username: identity.username, kind },
      secret: this.config.secret,
      salt: SALT[kind],
      maxAge,
    });
    return { token, expiresAt: new Date(this.now() + maxAge * 1000) };
  }

  async verify(
    token: string | null | undefined,
    kind: TokenKind
  ): Promise<SessionUser> {
    if (!token) {
      throw new UnauthorizedError("missing");
    }

    let claims: JWT | null;
    try {
      claims = await decode({
        token,
        secret: this.config.secret,
        salt: SALT[kind],
      });
    } catch (error) {
      throw new UnauthorizedError(isExpiredError(error) ? "expired" : "invalid");
    }

    if (!claims) {
      throw new UnauthorizedError("invalid");
    }
    if (claims.kind !== kind) {
      throw new UnauthorizedError("wrong_kind");
    }
    if (typeof claims.sub !== "string" || typeof claims.username !== "string") {
      throw new UnauthorizedError("invalid");
    }
    return { id: claims.sub, username: claims.username };
  }

  private ttl(kind: TokenKind): number {
    return kind === "access"
      ? this.config.accessTtlSeconds
      : this.config.refreshTtlSeconds;
  }
}

function isExpiredError(error: unknown): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    error.code === "ERR_JWT_EXPIRED"
  );
}
