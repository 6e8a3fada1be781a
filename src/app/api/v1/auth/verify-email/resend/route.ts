// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@app/api/v1/auth/verify-email/resend`
 * Purpose: HTTP endpoint sending the caller a fresh verification link.
 * Scope: Auth-protected. Does not contain business logic.
 * Invariants: Earlier unredeemed links stay valid until they expire.
 * Side-effects: IO (HTTP request/response, database, mail)
 * Links: contracts/auth.email-verification.v1.contract, app/_facades/auth/verification.server
 * @public
 */

import { NextResponse } from "next/server";

import { resendVerificationFacade } from "@/app/_facades/auth/verification.server";
import { getSessionUser } from "@/app/_lib/auth/session";
import { handleRouteError } from "@/app/_lib/http";
import { wrapRouteHandlerWithLogging } from "@/bootstrap/http";
import { authResendVerificationOperation } from "@/contracts/auth.email-verification.v1.contract";

export const dynamic = "force-dynamic";
export const runtime = "nodejs";

export const POST = wrapRouteHandlerWithLogging(
  {
    routeId: "auth.verify_email.resend",
    auth: { mode: "required", getSessionUser },
  },
  async (ctx, _request, sessionUser) => {
    try {
      if (!sessionUser) throw new Error("sessionUser required");
      const result = await resendVerificationFacade({ sessionUser }, ctx);
      return NextResponse.json(
        authResendVerificationOperation.output.parse(result)
      );
    } catch (error) {
      const errorResponse = handleRouteError(ctx, error);
      if (errorResponse) return errorResponse;
      throw error;
    }
  }
);
