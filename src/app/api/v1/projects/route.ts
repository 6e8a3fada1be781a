// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@app/api/v1/projects`
 * Purpose: HTTP endpoints for project search and creation.
 * Scope: Public GET (`q`, repeated `tag`, `page`, `size`); auth-protected POST. Does not contain business logic.
 * Invariants: POST answers 201; the caller becomes the owner.
 * Side-effects: IO (HTTP request/response, database)
 * Links: contracts/projects.v1.contract, app/_facades/projects/projects.server, app/_facades/search/search.server
 * @public
 */

import { NextResponse } from "next/server";

import { createProjectFacade } from "@/app/_facades/projects/projects.server";
import { searchProjectsFacade } from "@/app/_facades/search/search.server";
import { getSessionUser } from "@/app/_lib/auth/session";
import {
  handleRouteError,
  readJsonBody,
  searchParamsRecord,
} from "@/app/_lib/http";
import { wrapRouteHandlerWithLogging } from "@/bootstrap/http";
import {
  projectsCreateOperation,
  projectsSearchOperation,
} from "@/contracts/projects.v1.contract";

export const dynamic = "force-dynamic";
export const runtime = "nodejs";

export const GET = wrapRouteHandlerWithLogging(
  { routeId: "projects.search", auth: { mode: "none" } },
  async (ctx, request) => {
    try {
      const query = projectsSearchOperation.input.parse(
        searchParamsRecord(request, ["tag"])
      );
      const page = await searchProjectsFacade(query, ctx);
      return NextResponse.json(projectsSearchOperation.output.parse(page));
    } catch (error) {
      const errorResponse = handleRouteError(ctx, error);
      if (errorResponse) return errorResponse;
      throw error;
    }
  }
);

export const POST = wrapRouteHandlerWithLogging(
  { routeId: "projects.create", auth: { mode: "required", getSessionUser } },
  async (ctx, request, sessionUser) => {
    try {
      if (!sessionUser) throw new Error("sessionUser required");
      const input = projectsCreateOperation.input.parse(
        await readJsonBody(request)
      );
      const project = await createProjectFacade({ sessionUser, input }, ctx);
      return NextResponse.json(projectsCreateOperation.output.parse(project), {
        status: 201,
      });
    } catch (error) {
      const errorResponse = handleRouteError(ctx, error);
      if (errorResponse) return errorResponse;
      throw error;
    }
  }
);
