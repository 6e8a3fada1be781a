// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@app/api/v1/auth/password/reset`
 * Purpose: HTTP endpoint setting a new password from a reset link.
 * Scope: Delegates to the verification facade. Does not contain business logic.
 * Invariants: Rate limited per client IP; link problems are reported before password policy problems.
 * Side-effects: IO (HTTP request/response, database)
 * Links: contracts/auth.password.v1.contract, app/_facades/auth/verification.server
 * @public
 */

import { NextResponse } from "next/server";

import { resetPasswordFacade } from "@/app/_facades/auth/verification.server";
import { handleRouteError, readJsonBody } from "@/app/_lib/http";
import { wrapRateLimitedRoute } from "@/bootstrap/http";
import { authResetPasswordOperation } from "@/contracts/auth.password.v1.contract";

export const dynamic = "force-dynamic";
export const runtime = "nodejs";

export const POST = wrapRateLimitedRoute(
  { routeId: "auth.password.reset" },
  async (ctx, request) => {
    try {
      const input = authResetPasswordOperation.input.parse(
        await readJsonBody(request)
      );
      const result = await resetPasswordFacade(input, ctx);
      return NextResponse.json(authResetPasswordOperation.output.parse(result));
    } catch (error) {
      const errorResponse = handleRouteError(ctx, error);
      if (errorResponse) return errorResponse;
      throw error;
    }
  }
);
