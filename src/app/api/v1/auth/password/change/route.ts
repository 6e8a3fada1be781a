// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@app/api/v1/auth/password/change`
 * Purpose: HTTP endpoint changing the caller's password.
 * Scope: Auth-protected. Does not contain business logic.
 * Invariants: A wrong current password answers 401; policy violations answer 400 under fieldErrors.newPassword.
 * Side-effects: IO (HTTP request/response, database)
 * Links: contracts/auth.password.v1.contract, app/_facades/auth/credentials.server
 * @public
 */

import { NextResponse } from "next/server";

import { changePasswordFacade } from "@/app/_facades/auth/credentials.server";
import { getSessionUser } from "@/app/_lib/auth/session";
import { handleRouteError, readJsonBody } from "@/app/_lib/http";
import { wrapRouteHandlerWithLogging } from "@/bootstrap/http";
import { authChangePasswordOperation } from "@/contracts/auth.password.v1.contract";

export const dynamic = "force-dynamic";
export const runtime = "nodejs";

export const POST = wrapRouteHandlerWithLogging(
  { routeId: "auth.password.change", auth: { mode: "required", getSessionUser } },
  async (ctx, request, sessionUser) => {
    try {
      if (!sessionUser) throw new Error("sessionUser required");
      const input = authChangePasswordOperation.input.parse(
        await readJsonBody(request)
      );
      await changePasswordFacade({ sessionUser, ...input }, ctx);
      return NextResponse.json(
        authChangePasswordOperation.output.parse({ status: "ok" })
      );
    } catch (error) {
      const errorResponse = handleRouteError(ctx, error);
      if (errorResponse) return errorResponse;
      throw error;
    }
  }
);
