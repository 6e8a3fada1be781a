// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@app/api/v1/messages/unread-count`
 * Purpose: HTTP endpoint returning the caller's unread message count.
 * Scope: Auth-protected GET. Does not contain business logic.
 * Invariants: Never negative.
 * Side-effects: IO (HTTP request/response, database)
 * Links: contracts/messages.v1.contract
 * @public
 */

import { NextResponse } from "next/server";

import { unreadCountFacade } from "@/app/_facades/messaging/messages.server";
import { getSessionUser } from "@/app/_lib/auth/session";
import { handleRouteError } from "@/app/_lib/http";
import { wrapRouteHandlerWithLogging } from "@/bootstrap/http";
import { messagesUnreadCountOperation } from "@/contracts/messages.v1.contract";

export const dynamic = "force-dynamic";
export const runtime = "nodejs";

export const GET = wrapRouteHandlerWithLogging(
  {
    routeId: "messages.unread_count",
    auth: { mode: "required", getSessionUser },
  },
  async (ctx, _request, sessionUser) => {
    try {
      if (!sessionUser) throw new Error("sessionUser required");
      const unreadCount = await unreadCountFacade({ sessionUser });
      return NextResponse.json(
        messagesUnreadCountOperation.output.parse({ unreadCount })
      );
    } catch (error) {
      const errorResponse = handleRouteError(ctx, error);
      if (errorResponse) return errorResponse;
      throw error;
    }
  }
);
