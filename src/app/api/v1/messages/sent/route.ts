// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@app/api/v1/messages/sent`
 * Purpose: HTTP endpoint listing messages the caller sent.
 * Scope: Auth-protected GET. Does not contain business logic.
 * Invariants: Messages the caller deleted on the sender side are omitted.
 * Side-effects: IO (HTTP request/response, database)
 * Links: contracts/messages.v1.contract
 * @public
 */

import { NextResponse } from "next/server";

import { sentFacade } from "@/app/_facades/messaging/messages.server";
import { getSessionUser } from "@/app/_lib/auth/session";
import { handleRouteError } from "@/app/_lib/http";
import { wrapRouteHandlerWithLogging } from "@/bootstrap/http";
import { messagesSentOperation } from "@/contracts/messages.v1.contract";

export const dynamic = "force-dynamic";
export const runtime = "nodejs";

export const GET = wrapRouteHandlerWithLogging(
  { routeId: "messages.sent", auth: { mode: "required", getSessionUser } },
  async (ctx, _request, sessionUser) => {
    try {
      if (!sessionUser) throw new Error("sessionUser required");
      const messages = await sentFacade({ sessionUser });
      return NextResponse.json(messagesSentOperation.output.parse({ messages }));
    } catch (error) {
      const errorResponse = handleRouteError(ctx, error);
      if (errorResponse) return errorResponse;
      throw error;
    }
  }
);
