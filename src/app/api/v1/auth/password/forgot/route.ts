// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@app/api/v1/auth/password/forgot`
 * Purpose: HTTP endpoint requesting a password reset link.
 * Scope: Delegates to the verification facade. Does not contain business logic.
 * Invariants: Rate limited per client IP; always 202 with the same body so addresses cannot be probed.
 * Side-effects: IO (HTTP request/response, database, mail)
 * Links: contracts/auth.password.v1.contract, app/_facades/auth/verification.server
 * @public
 */

import { NextResponse } from "next/server";

import { forgotPasswordFacade } from "@/app/_facades/auth/verification.server";
import { handleRouteError, readJsonBody } from "@/app/_lib/http";
import { wrapRateLimitedRoute } from "@/bootstrap/http";
import { authForgotPasswordOperation } from "@/contracts/auth.password.v1.contract";

export const dynamic = "force-dynamic";
export const runtime = "nodejs";

export const POST = wrapRateLimitedRoute(
  { routeId: "auth.password.forgot" },
  async (ctx, request) => {
    try {
      const { email } = authForgotPasswordOperation.input.parse(
        await readJsonBody(request)
      );
      const result = await forgotPasswordFacade(email, ctx);
      return NextResponse.json(
        authForgotPasswordOperation.output.parse(result),
        { status: 202 }
      );
    } catch (error) {
      const errorResponse = handleRouteError(ctx, error);
      if (errorResponse) return errorResponse;
      throw error;
    }
  }
);
