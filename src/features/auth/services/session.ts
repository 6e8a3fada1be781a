// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/auth/services/session`
 * Purpose: Login and refresh: exchange credentials or a refresh token for session tokens.
 * Scope: Composes authenticate() with TokenService. Cookie handling stays in the route.
 * Invariants: Refresh only succeeds for users that still exist and are active; the refresh token is returned unchanged.
 * Side-effects: IO (via ports)
 * Links: credentials.ts, ports/token-service.port.ts
 * @public
 */

import { UnauthorizedError } from "@/core";
import type { TokenService, UserRepository } from "@/ports";

import { authenticate, type CredentialDeps } from "./credentials";

export interface SessionDeps extends CredentialDeps {
  tokenService: TokenService;
}

export interface SessionTokens {
  accessToken: string;
  refreshToken: string;
  tokenType: "bearer";
  /** Access token expiry */
  expiresAt: Date;
}

export async function login(
  deps: SessionDeps,
  input: { usernameOrEmail: string; password: string }
): Promise<SessionTokens & { userId: string }> {
  const user = await authenticate(deps, input);
  const identity = { id: user.id, username: user.username };

  const access = await deps.tokenService.issue(identity, "access");
  const refresh = await deps.tokenService.issue(identity, "refresh");

  return {
    userId: user.id,
    accessToken: access.token,
    refreshToken: refresh.token,
    tokenType: "bearer",
    expiresAt: access.expiresAt,
  };
}

export async function refresh(
  deps: { users: UserRepository; tokenService: TokenService },
  refreshToken: string
): Promise<SessionTokens> {
  const identity = await deps.tokenService.verify(refreshToken, "refresh");

  const user = await deps.users.findById(identity.id);
  if (!user || !user.isActive) {
    throw new UnauthorizedError("inactive");
  }

  const access = await deps.tokenService.issue(
    { id: user.id, username: user.username },
    "access"
  );
  return {
    accessToken: access.token,
    refreshToken,
    tokenType: "bearer",
    expiresAt: access.expiresAt,
  };
}
