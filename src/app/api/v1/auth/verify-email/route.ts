// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@app/api/v1/auth/verify-email`
 * Purpose: HTTP endpoint redeeming an email verification link.
 * Scope: Validates `{ uid, token }` and delegates to the verification facade. Does not contain business logic.
 * Invariants: Rate limited per client IP; expired or invalid links answer 400, used links 409.
 * Side-effects: IO (HTTP request/response, database)
 * Links: contracts/auth.email-verification.v1.contract, app/_facades/auth/verification.server
 * @public
 */

import { NextResponse } from "next/server";

import { verifyEmailFacade } from "@/app/_facades/auth/verification.server";
import { handleRouteError, readJsonBody } from "@/app/_lib/http";
import { wrapRateLimitedRoute } from "@/bootstrap/http";
import { authVerifyEmailOperation } from "@/contracts/auth.email-verification.v1.contract";

export const dynamic = "force-dynamic";
export const runtime = "nodejs";

export const POST = wrapRateLimitedRoute(
  { routeId: "auth.verify_email" },
  async (ctx, request) => {
    try {
      const input = authVerifyEmailOperation.input.parse(
        await readJsonBody(request)
      );
      const result = await verifyEmailFacade(input, ctx);
      return NextResponse.json(authVerifyEmailOperation.output.parse(result));
    } catch (error) {
      const errorResponse = handleRouteError(ctx, error);
      if (errorResponse) return errorResponse;
      throw error;
    }
  }
);
