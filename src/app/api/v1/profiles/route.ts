// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@app/api/v1/profiles`
 * Purpose: HTTP endpoint for developer search.
 * Scope: Public GET. Reads `q`, repeated `skill`, `page` and `size` from the query string. Does not contain business logic.
 * Invariants: Deactivated accounts never appear; output validated against profiles.search.v1.
 * Side-effects: IO (HTTP request/response, database)
 * Links: contracts/profiles.read.v1.contract, app/_facades/search/search.server
 * @public
 */

import { NextResponse } from "next/server";

import { searchDevelopersFacade } from "@/app/_facades/search/search.server";
import { handleRouteError, searchParamsRecord } from "@/app/_lib/http";
import { wrapRouteHandlerWithLogging } from "@/bootstrap/http";
import { profilesSearchOperation } from "@/contracts/profiles.read.v1.contract";

export const dynamic = "force-dynamic";
export const runtime = "nodejs";

export const GET = wrapRouteHandlerWithLogging(
  { routeId: "profiles.search", auth: { mode: "none" } },
  async (ctx, request) => {
    try {
      const query = profilesSearchOperation.input.parse(
        searchParamsRecord(request, ["skill"])
      );
      const page = await searchDevelopersFacade(query, ctx);
      return NextResponse.json(profilesSearchOperation.output.parse(page));
    } catch (error) {
      const errorResponse = handleRouteError(ctx, error);
      if (errorResponse) return errorResponse;
      throw error;
    }
  }
);
