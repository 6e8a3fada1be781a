// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@bootstrap/http/wrapRateLimitedRoute`
 * Purpose: Pure factory for the wrapper used by unauthenticated write endpoints (login, signup, password reset, guest messages).
 * Scope: Factory only; no env/container access. bootstrap/http/index.ts binds it to the container config.
 * Invariants: 429 with Retry-After (seconds until the next token) when the caller's bucket is empty; the handler is not invoked; logging envelope and HTTP metrics still apply.
 * Side-effects: IO (rate limiter state, request context, metrics)
 * Links: rateLimiter.ts, wrapRouteHandlerWithLogging.ts
 * @public
 */

import { type NextRequest, NextResponse } from "next/server";

import type { RateLimitBypassConfig } from "@/bootstrap/container";
import {
  logRequestWarn,
  rateLimitExceededTotal,
  type RequestContext,
} from "@/shared/observability";

import { extractClientIp, type TokenBucketRateLimiter } from "./rateLimiter";
import { wrapRouteHandlerWithLogging } from "./wrapRouteHandlerWithLogging";

export interface RateLimitedRouteConfig {
  routeId: string;
}

type RateLimitedHandler<TContext = unknown> = (
  ctx: RequestContext,
  request: NextRequest,
  context?: TContext
) => Promise<NextResponse>;

export interface WrapRateLimitedRouteDeps {
  rateLimitBypass: RateLimitBypassConfig;
  rateLimiter: TokenBucketRateLimiter;
}

/**
 * @example
 * const wrapRateLimitedRoute = makeWrapRateLimitedRoute({
 *   rateLimitBypass: { enabled: false, headerName: "x-test-bypass", headerValue: "1" },
 *   rateLimiter: new TokenBucketRateLimiter({ maxTokens: 1, refillRate: 0, burstSize: 0 }),
 * });
 */
export function makeWrapRateLimitedRoute(deps: WrapRateLimitedRouteDeps) {
  return function wrapRateLimitedRoute<TContext = unknown>(
    config: RateLimitedRouteConfig,
    handler: RateLimitedHandler<TContext>
  ): (request: NextRequest, context?: TContext) => Promise<NextResponse> {
    return wrapRouteHandlerWithLogging<TContext>(
      { routeId: config.routeId, auth: { mode: "none" } },
      async (ctx, request, _sessionUser, context) => {
        // Bypass only honoured when the container enabled it (APP_ENV=test)
        const bypassEnabled =
          deps.rateLimitBypass.enabled &&
          request.headers.get(deps.rateLimitBypass.headerName) ===
            deps.rateLimitBypass.headerValue;

        const clientIp = extractClientIp(request);
        const allowed = bypassEnabled || deps.rateLimiter.consume(clientIp);

        if (!allowed) {
          logRequestWarn(ctx.log, "rate limit exceeded", "RATE_LIMIT_EXCEEDED");
          rateLimitExceededTotal.inc({ route: config.routeId });

          const retryAfter = Math.max(1, deps.rateLimiter.retryAfterSeconds(clientIp));
          return NextResponse.json(
            { error: "Too many requests" },
            { status: 429, headers: { "Retry-After": String(retryAfter) } }
          );
        }

        return handler(ctx, request, context);
      }
    );
  };
}
