// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@app/api/v1/auth/signup`
 * Purpose: HTTP endpoint for account registration.
 * Scope: Validates input with the auth.signup.v1 contract and delegates to the signup facade. Does not contain business logic.
 * Invariants: Rate limited per client IP; 201 on success; per-field errors on 400.
 * Side-effects: IO (HTTP request/response, database, mail)
 * Links: contracts/auth.signup.v1.contract, app/_facades/auth/credentials.server
 * @public
 */

import { NextResponse } from "next/server";

import { signUpFacade } from "@/app/_facades/auth/credentials.server";
import { handleRouteError, readJsonBody } from "@/app/_lib/http";
import { wrapRateLimitedRoute } from "@/bootstrap/http";
import { authSignupOperation } from "@/contracts/auth.signup.v1.contract";

export const dynamic = "force-dynamic";
export const runtime = "nodejs";

export const POST = wrapRateLimitedRoute(
  { routeId: "auth.signup" },
  async (ctx, request) => {
    try {
      const input = authSignupOperation.input.parse(await readJsonBody(request));
      const result = await signUpFacade(input, ctx);
      return NextResponse.json(authSignupOperation.output.parse(result), {
        status: 201,
      });
    } catch (error) {
      const errorResponse = handleRouteError(ctx, error);
      if (errorResponse) return errorResponse;
      throw error;
    }
  }
);
