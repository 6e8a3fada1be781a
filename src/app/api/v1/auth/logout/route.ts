// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@app/api/v1/auth/logout`
 * Purpose: HTTP endpoint clearing the session cookie.
 * Scope: Cookie only; issued tokens stay valid until they expire.
 * Invariants: Always 204, signed in or not.
 * Side-effects: cookie
 * Links: contracts/auth.session.v1.contract
 * @public
 */

import { NextResponse } from "next/server";

import { clearSessionCookie } from "@/app/_lib/http";
import { getContainer } from "@/bootstrap/container";
import { wrapRouteHandlerWithLogging } from "@/bootstrap/http";

export const dynamic = "force-dynamic";
export const runtime = "nodejs";

export const POST = wrapRouteHandlerWithLogging(
  { routeId: "auth.logout", auth: { mode: "none" } },
  async () => {
    const response = new NextResponse(null, { status: 204 });
    clearSessionCookie(response, getContainer().config.secureCookies);
    return response;
  }
);
