// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@app/api/v1/me/profile/image`
 * Purpose: HTTP endpoint replacing the caller's profile image.
 * Scope: Auth-protected multipart PUT with a single `image` field. Does not decode images itself.
 * Invariants: Rejected uploads (type, size, empty, undecodable) answer 400 and store nothing.
 * Side-effects: IO (HTTP request/response, database, file storage)
 * Links: contracts/profiles.me.v1.contract, features/uploads/services/imagePipeline
 * @public
 */

import { NextResponse } from "next/server";

import { updateProfileImageFacade } from "@/app/_facades/profiles/profiles.server";
import { getSessionUser } from "@/app/_lib/auth/session";
import { handleRouteError, readImageUpload } from "@/app/_lib/http";
import { wrapRouteHandlerWithLogging } from "@/bootstrap/http";
import { profilesImageOperation } from "@/contracts/profiles.me.v1.contract";

export const dynamic = "force-dynamic";
export const runtime = "nodejs";

export const PUT = wrapRouteHandlerWithLogging(
  { routeId: "profiles.image", auth: { mode: "required", getSessionUser } },
  async (ctx, request, sessionUser) => {
    try {
      if (!sessionUser) throw new Error("sessionUser required");
      const upload = await readImageUpload(request);
      const profile = await updateProfileImageFacade(
        { sessionUser, upload },
        ctx
      );
      return NextResponse.json(profilesImageOperation.output.parse(profile));
    } catch (error) {
      const errorResponse = handleRouteError(ctx, error);
      if (errorResponse) return errorResponse;
      throw error;
    }
  }
);
