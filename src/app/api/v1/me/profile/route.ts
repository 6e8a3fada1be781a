// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@app/api/v1/me/profile`
 * Purpose: HTTP endpoints for the caller's own profile (read, edit, deactivate).
 * Scope: Auth-protected GET/PATCH/DELETE. Does not contain business logic.
 * Invariants:
 *   - Identity always from the session
 *   - DELETE deactivates (soft delete) and clears the session cookie; 204
 * Side-effects: IO (HTTP request/response, database), cookie
 * Links: contracts/profiles.me.v1.contract, app/_facades/profiles/profiles.server
 * @public
 */

import { NextResponse } from "next/server";

import {
  deactivateAccountFacade,
  getOwnProfileFacade,
  updateProfileFacade,
} from "@/app/_facades/profiles/profiles.server";
import { getSessionUser } from "@/app/_lib/auth/session";
import {
  clearSessionCookie,
  handleRouteError,
  readJsonBody,
} from "@/app/_lib/http";
import { getContainer } from "@/bootstrap/container";
import { wrapRouteHandlerWithLogging } from "@/bootstrap/http";
import {
  profilesMeReadOperation,
  profilesUpdateOperation,
} from "@/contracts/profiles.me.v1.contract";

export const dynamic = "force-dynamic";
export const runtime = "nodejs";

export const GET = wrapRouteHandlerWithLogging(
  { routeId: "profiles.me.read", auth: { mode: "required", getSessionUser } },
  async (ctx, _request, sessionUser) => {
    try {
      if (!sessionUser) throw new Error("sessionUser required");
      const profile = await getOwnProfileFacade({ sessionUser });
      return NextResponse.json(profilesMeReadOperation.output.parse(profile));
    } catch (error) {
      const errorResponse = handleRouteError(ctx, error);
      if (errorResponse) return errorResponse;
      throw error;
    }
  }
);

export const PATCH = wrapRouteHandlerWithLogging(
  { routeId: "profiles.update", auth: { mode: "required", getSessionUser } },
  async (ctx, request, sessionUser) => {
    try {
      if (!sessionUser) throw new Error("sessionUser required");
      const patch = profilesUpdateOperation.input.parse(
        await readJsonBody(request)
      );
      const profile = await updateProfileFacade({ sessionUser, patch }, ctx);
      return NextResponse.json(profilesUpdateOperation.output.parse(profile));
    } catch (error) {
      const errorResponse = handleRouteError(ctx, error);
      if (errorResponse) return errorResponse;
      throw error;
    }
  }
);

export const DELETE = wrapRouteHandlerWithLogging(
  { routeId: "profiles.deactivate", auth: { mode: "required", getSessionUser } },
  async (ctx, _request, sessionUser) => {
    try {
      if (!sessionUser) throw new Error("sessionUser required");
      await deactivateAccountFacade({ sessionUser }, ctx);

      const response = new NextResponse(null, { status: 204 });
      clearSessionCookie(response, getContainer().config.secureCookies);
      return response;
    } catch (error) {
      const errorResponse = handleRouteError(ctx, error);
      if (errorResponse) return errorResponse;
      throw error;
    }
  }
);
