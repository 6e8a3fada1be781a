// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@app/_facades/auth/session.server`
 * Purpose: App-layer wiring for login and token refresh.
 * Scope: Server-only facade. Maps token expiry to ISO strings and records login outcomes. Does not set cookies; the route does.
 * Invariants: Tokens never reach logs; failed logins are counted without naming the credential that failed.
 * Side-effects: IO (via UserRepository, PasswordHasher, TokenService ports), metrics
 * Links: features/auth/services/session, contracts/auth.session.v1.contract
 * @public
 */

import { getContainer } from "@/bootstrap/container";
import type {
  AuthLoginInput,
  SessionTokensDto,
} from "@/contracts/auth.session.v1.contract";
import { isInvalidCredentialsError } from "@/core";
import { login, refresh, type SessionTokens } from "@/features/auth/public";
import {
  authLoginsTotal,
  EVENT_NAMES,
  logEvent,
  type RequestContext,
} from "@/shared/observability";

function toTokensDto(tokens: SessionTokens): SessionTokensDto {
  return {
    accessToken: tokens.accessToken,
    refreshToken: tokens.refreshToken,
    tokenType: tokens.tokenType,
    expiresAt: tokens.expiresAt.toISOString(),
  };
}

/**
 * @returns contract DTO plus the raw expiry the route needs for the cookie
 */
export async function loginFacade(
  input: AuthLoginInput,
  ctx: RequestContext
): Promise<{ dto: SessionTokensDto & { userId: string }; expiresAt: Date }> {
  let result: Awaited<ReturnType<typeof login>>;
  try {
    result = await login(getContainer(), input);
  } catch (error) {
    if (isInvalidCredentialsError(error)) {
      authLoginsTotal.inc({ outcome: "failure" });
      logEvent(ctx.log, EVENT_NAMES.AUTH_LOGIN_FAILED, {
        reqId: ctx.reqId,
        routeId: ctx.routeId,
      });
    }
    throw error;
  }

  authLoginsTotal.inc({ outcome: "success" });
  logEvent(ctx.log, EVENT_NAMES.AUTH_LOGIN_SUCCESS, {
    reqId: ctx.reqId,
    routeId: ctx.routeId,
    userId: result.userId,
  });

  return {
    dto: { ...toTokensDto(result), userId: result.userId },
    expiresAt: result.expiresAt,
  };
}

export async function refreshFacade(
  refreshToken: string,
  ctx: RequestContext
): Promise<{ dto: SessionTokensDto; expiresAt: Date }> {
  const tokens = await refresh(getContainer(), refreshToken);

  logEvent(ctx.log, EVENT_NAMES.AUTH_TOKEN_REFRESHED, {
    reqId: ctx.reqId,
    routeId: ctx.routeId,
  });

  return { dto: toTokensDto(tokens), expiresAt: tokens.expiresAt };
}
