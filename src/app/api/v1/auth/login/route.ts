// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@app/api/v1/auth/login`
 * Purpose: HTTP endpoint for username-or-email login.
 * Scope: Returns the token pair in the body and sets the HttpOnly session cookie. Does not contain business logic.
 * Invariants: Rate limited per client IP; a failed login answers 401 "Invalid credentials" whatever failed.
 * Side-effects: IO (HTTP request/response, database), cookie
 * Links: contracts/auth.session.v1.contract, app/_facades/auth/session.server
 * @public
 */

import { NextResponse } from "next/server";

import { loginFacade } from "@/app/_facades/auth/session.server";
import {
  handleRouteError,
  readJsonBody,
  setSessionCookie,
} from "@/app/_lib/http";
import { getContainer } from "@/bootstrap/container";
import { wrapRateLimitedRoute } from "@/bootstrap/http";
import { authLoginOperation } from "@/contracts/auth.session.v1.contract";

export const dynamic = "force-dynamic";
export const runtime = "nodejs";

export const POST = wrapRateLimitedRoute(
  { routeId: "auth.login" },
  async (ctx, request) => {
    try {
      const input = authLoginOperation.input.parse(await readJsonBody(request));
      const { dto, expiresAt } = await loginFacade(input, ctx);

      const response = NextResponse.json(authLoginOperation.output.parse(dto));
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
