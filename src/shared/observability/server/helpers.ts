// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability/server/helpers`
 * Purpose: Standardized request logging helpers to prevent log spam and drift.
 * Scope: Consistent request start/end/error/warn lines. Does not handle domain-specific events.
 * Invariants: Same keys everywhere (reqId, route, method, status, durationMs, errorCode).
 * Side-effects: IO (emits structured log entries via provided logger)
 * Links: Used by wrapRouteHandlerWithLogging and route error mappers.
 * @public
 */

import type { Logger } from "pino";

export function logRequestStart(log: Logger): void {
  log.info("request received");
}

/**
 * Log request end. Level follows the status class (5xx error, 4xx warn).
 */
export function logRequestEnd(
  log: Logger,
  meta: {
    status: number;
    durationMs: number;
  }
): void {
  const level =
    meta.status >= 500 ? "error" : meta.status >= 400 ? "warn" : "info";
  log[level](
    { status: meta.status, durationMs: meta.durationMs },
    "request complete"
  );
}

/**
 * Log an unexpected failure with a stable error code.
 */
export function logRequestError(
  log: Logger,
  error: unknown,
  errorCode: string
): void {
  log.error({ err: error, errorCode }, "request failed");
}

/**
 * Log an expected client-side failure (4xx) without the stack.
 */
export function logRequestWarn(
  log: Logger,
  error: unknown,
  errorCode: string
): void {
  const message = error instanceof Error ? error.message : String(error);
  log.warn({ errorCode, errMessage: message }, "request rejected");
}
