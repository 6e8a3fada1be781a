// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@app/api/v1/messages/guest`
 * Purpose: HTTP endpoint for messages from visitors without an account.
 * Scope: Public POST. Does not contain business logic.
 * Invariants: Rate limited per client IP; 201 on success; recipient must be an active account.
 * Side-effects: IO (HTTP request/response, database)
 * Links: contracts/messages.v1.contract, app/_facades/messaging/messages.server
 * @public
 */

import { NextResponse } from "next/server";

import { sendGuestMessageFacade } from "@/app/_facades/messaging/messages.server";
import { handleRouteError, readJsonBody } from "@/app/_lib/http";
import { wrapRateLimitedRoute } from "@/bootstrap/http";
import { messagesGuestSendOperation } from "@/contracts/messages.v1.contract";

export const dynamic = "force-dynamic";
export const runtime = "nodejs";

export const POST = wrapRateLimitedRoute(
  { routeId: "messages.guest_send" },
  async (ctx, request) => {
    try {
      const input = messagesGuestSendOperation.input.parse(
        await readJsonBody(request)
      );
      const message = await sendGuestMessageFacade(input, ctx);
      return NextResponse.json(
        messagesGuestSendOperation.output.parse(message),
        { status: 201 }
      );
    } catch (error) {
      const errorResponse = handleRouteError(ctx, error);
      if (errorResponse) return errorResponse;
      throw error;
    }
  }
);
