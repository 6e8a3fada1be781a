// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@bootstrap/http`
 * Purpose: HTTP route utilities for bootstrapping.
 * Scope: Bootstrap-layer exports; creates the bound wrapRateLimitedRoute lazily. Does NOT handle request-scoped lifecycle or business logic.
 * Invariants: Unauthenticated write endpoints use wrapRateLimitedRoute(); everything else uses wrapRouteHandlerWithLogging().
 * Side-effects: global (lazy container init on first request, not module import)
 * Notes: Container init deferred to first actual request to avoid build-time env validation.
 * Links: Re-exports from bootstrap/http/*
 * @public
 */

import type { NextRequest, NextResponse } from "next/server";

import { getContainer } from "@/bootstrap/container";
import type { RequestContext } from "@/shared/observability";

import { authApiLimiter } from "./rateLimiter";
import {
  makeWrapRateLimitedRoute,
  type RateLimitedRouteConfig,
} from "./wrapRateLimitedRoute";

export {
  authApiLimiter,
  extractClientIp,
  TokenBucketRateLimiter,
} from "./rateLimiter";
export { makeWrapRateLimitedRoute } from "./wrapRateLimitedRoute";
export { wrapRouteHandlerWithLogging } from "./wrapRouteHandlerWithLogging";

let _wrapRateLimitedRoute: ReturnType<typeof makeWrapRateLimitedRoute> | null =
  null;

/**
 * Rate-limited route wrapper bound to the container config.
 * Initialized on first request, not import.
 *
 * @example
 * export const POST = wrapRateLimitedRoute(
 *   { routeId: "auth.login" },
 *   async (ctx, request) => { ... }
 * );
 */
export function wrapRateLimitedRoute<TContext = unknown>(
  config: RateLimitedRouteConfig,
  handler: (
    ctx: RequestContext,
    request: NextRequest,
    context?: TContext
  ) => Promise<NextResponse>
): (request: NextRequest, context?: TContext) => Promise<NextResponse> {
  return async (request: NextRequest, context?: TContext) => {
    _wrapRateLimitedRoute ??= makeWrapRateLimitedRoute({
      rateLimitBypass: getContainer().config.rateLimitBypass,
      rateLimiter: authApiLimiter,
    });
    return _wrapRateLimitedRoute(config, handler)(request, context);
  };
}
