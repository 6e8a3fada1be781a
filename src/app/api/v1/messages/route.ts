// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@app/api/v1/messages`
 * Purpose: HTTP endpoints for the caller's inbox and for sending a message.
 * Scope: Auth-protected GET/POST. Does not contain business logic.
 * Invariants: POST answers 201; sender name and email come from the account, never the body.
 * Side-effects: IO (HTTP request/response, database)
 * Links: contracts/messages.v1.contract, app/_facades/messaging/messages.server
 * @public
 */

import { NextResponse } from "next/server";

import {
  inboxFacade,
  sendMessageFacade,
} from "@/app/_facades/messaging/messages.server";
import { getSessionUser } from "@/app/_lib/auth/session";
import { handleRouteError, readJsonBody } from "@/app/_lib/http";
import { wrapRouteHandlerWithLogging } from "@/bootstrap/http";
import {
  messagesInboxOperation,
  messagesSendOperation,
} from "@/contracts/messages.v1.contract";

export const dynamic = "force-dynamic";
export const runtime = "nodejs";

export const GET = wrapRouteHandlerWithLogging(
  { routeId: "messages.inbox", auth: { mode: "required", getSessionUser } },
  async (ctx, _request, sessionUser) => {
    try {
      if (!sessionUser) throw new Error("sessionUser required");
      const result = await inboxFacade({ sessionUser });
      return NextResponse.json(messagesInboxOperation.output.parse(result));
    } catch (error) {
      const errorResponse = handleRouteError(ctx, error);
      if (errorResponse) return errorResponse;
      throw error;
    }
  }
);

export const POST = wrapRouteHandlerWithLogging(
  { routeId: "messages.send", auth: { mode: "required", getSessionUser } },
  async (ctx, request, sessionUser) => {
    try {
      if (!sessionUser) throw new Error("sessionUser required");
      const input = messagesSendOperation.input.parse(
        await readJsonBody(request)
      );
      const message = await sendMessageFacade({ sessionUser, input }, ctx);
      return NextResponse.json(messagesSendOperation.output.parse(message), {
        status: 201,
      });
    } catch (error) {
      const errorResponse = handleRouteError(ctx, error);
      if (errorResponse) return errorResponse;
      throw error;
    }
  }
);
