// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@app/api/v1/me/skills`
 * Purpose: HTTP endpoints listing and adding the caller's skills.
 * Scope: Auth-protected GET/POST. Does not contain business logic.
 * Invariants: POST answers 201 with the created skill.
 * Side-effects: IO (HTTP request/response, database)
 * Links: contracts/skills.v1.contract, app/_facades/profiles/skills.server
 * @public
 */

import { NextResponse } from "next/server";

import {
  addSkillFacade,
  listSkillsFacade,
} from "@/app/_facades/profiles/skills.server";
import { getSessionUser } from "@/app/_lib/auth/session";
import { handleRouteError, readJsonBody } from "@/app/_lib/http";
import { wrapRouteHandlerWithLogging } from "@/bootstrap/http";
import {
  skillsCreateOperation,
  skillsListOperation,
} from "@/contracts/skills.v1.contract";

export const dynamic = "force-dynamic";
export const runtime = "nodejs";

export const GET = wrapRouteHandlerWithLogging(
  { routeId: "skills.list", auth: { mode: "required", getSessionUser } },
  async (ctx, _request, sessionUser) => {
    try {
      if (!sessionUser) throw new Error("sessionUser required");
      const skills = await listSkillsFacade({ sessionUser });
      return NextResponse.json(skillsListOperation.output.parse({ skills }));
    } catch (error) {
      const errorResponse = handleRouteError(ctx, error);
      if (errorResponse) return errorResponse;
      throw error;
    }
  }
);

export const POST = wrapRouteHandlerWithLogging(
  { routeId: "skills.create", auth: { mode: "required", getSessionUser } },
  async (ctx, request, sessionUser) => {
    try {
      if (!sessionUser) throw new Error("sessionUser required");
      const input = skillsCreateOperation.input.parse(
        await readJsonBody(request)
      );
      const skill = await addSkillFacade({ sessionUser, input }, ctx);
      return NextResponse.json(skillsCreateOperation.output.parse(skill), {
        status: 201,
      });
    } catch (error) {
      const errorResponse = handleRouteError(ctx, error);
      if (errorResponse) return errorResponse;
      throw error;
    }
  }
);
