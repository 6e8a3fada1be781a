// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@bootstrap/http/wrapRouteHandlerWithLogging`
 * Purpose: Route wrapper to eliminate boilerplate for request logging envelope and metrics.
 * Scope: Bootstrap-layer utility. Handles ctx creation, timing, envelope logging, and Prometheus metrics. Does not implement route-specific business logic.
 * Invariants: Always logs request start/end exactly once; always measures duration; catches unhandled errors; always records metrics (even on 5xx).
 * Side-effects: IO (creates request context, emits structured log entries, records Prometheus metrics)
 * Notes: Use this wrapper for all instrumented routes. Domain events go in facades/features, not here.
 *        logRequestEnd runs exactly once in the finally block for all paths (success, 401, 5xx).
 *        For unhandled errors: logs error, then rethrows in dev/test (APP_ENV != production) for diagnosis.
 *        In production, converts to 500 for safety.
 *        Metrics are recorded in a finally block to ensure all paths are captured.
 * Links: Used by route handlers; delegates to shared/observability helpers; records to shared/observability/server/metrics.
 * @public
 */

import { type NextRequest, NextResponse } from "next/server";

import { getContainer } from "@/bootstrap/container";
import type { SessionUser } from "@/shared/auth";
import {
  createRequestContext,
  httpRequestDurationMs,
  httpRequestsTotal,
  logRequestEnd,
  logRequestError,
  logRequestStart,
  type RequestContext,
  statusBucket,
} from "@/shared/observability";

type RouteHandler<TContext = unknown> = (
  ctx: RequestContext,
  request: NextRequest,
  sessionUser: SessionUser | null,
  context?: TContext
) => Promise<NextResponse>;

type GetSessionUser = (request: NextRequest) => Promise<SessionUser | null>;

type WrapOptions =
  | {
      routeId: string;
      auth: { mode: "required" | "optional"; getSessionUser: GetSessionUser };
    }
  | {
      routeId: string;
      auth?: { mode: "none" };
    };

/**
 * Wraps a route handler with consistent request logging envelope.
 * Handles ctx creation, session check, timing, logRequestStart/End/Error automatically.
 *
 * @param options.routeId - Route identifier for logging and metrics (e.g., "projects.create")
 * @param options.auth - { mode: "required"|"optional"|"none", getSessionUser(request) }
 * @param handler - Route handler that receives (ctx, request, sessionUser, context?)
 *
 * @example
 * // Dynamic route (Next.js 15 async params)
 * export const GET = wrapRouteHandlerWithLogging<{ params: Promise<{ projectId: string }> }>(
 *   { routeId: "projects.get", auth: { mode: "optional", getSessionUser } },
 *   async (ctx, _request, _sessionUser, context) => {
 *     const { projectId } = await requireParams(context);
 *     return NextResponse.json(await getProjectFacade(projectId, ctx));
 *   }
 * );
 */
export function wrapRouteHandlerWithLogging<TContext = unknown>(
  options: WrapOptions,
  handler: RouteHandler<TContext>
): (request: NextRequest, context?: TContext) => Promise<NextResponse> {
  return async (
    request: NextRequest,
    context?: TContext
  ): Promise<NextResponse> => {
    const container = getContainer();

    // Fetch session based on auth mode
    const sessionUser =
      options.auth && options.auth.mode !== "none"
        ? await options.auth.getSessionUser(request)
        : null;

    const ctx = createRequestContext(
      { baseLog: container.log, clock: container.clock },
      request,
      {
        routeId: options.routeId,
        session: sessionUser ?? undefined,
      }
    );

    // Get config once before try block to avoid env failures masking real errors
    const { unhandledErrorPolicy } = container.config;

    logRequestStart(ctx.log);
    const start = performance.now();

    // Track response for metrics/logging (captured in try/catch, used in finally)
    let responseStatus = 500;
    let response: NextResponse;

    try {
      // Check session requirement before calling handler
      if (options.auth?.mode === "required" && !sessionUser) {
        responseStatus = 401;
        response = NextResponse.json(
          { error: "Unauthorized" },
          { status: responseStatus }
        );
        return response;
      }

      response = await handler(ctx, request, sessionUser, context);
      responseStatus = response.status;
      return response;
    } catch (error) {
      // Wrapper only catches unhandled errors - route should handle domain errors
      responseStatus = 500;
      logRequestError(ctx.log, error, "INTERNAL_SERVER_ERROR");

      if (unhandledErrorPolicy === "rethrow") {
        throw error;
      }

      // respond_500: convert to 500 for production safety
      response = NextResponse.json(
        { error: "Internal server error" },
        { status: responseStatus }
      );
      return response;
    } finally {
      // Always log request end exactly once and record metrics
      const durationMs = performance.now() - start;

      logRequestEnd(ctx.log, { status: responseStatus, durationMs });

      httpRequestsTotal.inc({
        route: options.routeId,
        method: request.method,
        status: statusBucket(responseStatus),
      });
      httpRequestDurationMs.observe(
        { route: options.routeId, method: request.method },
        durationMs
      );
    }
  };
}
