// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@app/api/v1/auth/refresh`
 * Purpose: HTTP endpoint exchanging a refresh token for a new access token.
 * Scope: Also renews the session cookie. Does not rotate the refresh token.
 * Invariants: Rate limited per client IP; any token problem answers 401.
 * Side-effects: IO (HTTP request/response, database), cookie
 * Links: contracts/auth.session.v1.contract, app/_facades/auth/session.server
 * @public
 */

import { NextResponse } from "next/server";

import { refreshFacade } from "@/app/_facades/auth/session.server";
import {
  handleRouteError,
  readJsonBody,
  setSessionCookie,
} from "@/app/_lib/http";
import { getContainer } from "@/bootstrap/container";
import { wrapRateLimitedRoute } from "@/bootstrap/http";
import { authRefreshOperation } from "@/contracts/auth.session.v1.contract";

export const dynamic = "force-dynamic";
export const runtime = "nodejs";

export const POST = wrapRateLimitedRoute(
  { routeId: "auth.refresh" },
  async (ctx, request) => {
    try {
      const { refreshToken } = authRefreshOperation.input.parse(
        await readJsonBody(request)
      );
      const { dto, expiresAt } = await refreshFacade(refreshToken, ctx);

      const response = NextResponse.json(authRefreshOperation.output.parse(dto));
      setSessionCookie(
        response,
        dto.accessToken,
        expiresAt,
        getContainer().config.secureCookies
      );
      return response;
    } catch (error) {
      const errorResponse = handleRouteError(ctx, error);
      if (errorResponse) return errorResponse;
      throw error;
    }
  }
);
