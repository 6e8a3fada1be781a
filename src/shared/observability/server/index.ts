// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability/server`
 * Purpose: Server-side logging and metrics utilities (pino, prom-client).
 * Scope: Logger factory, helpers, logEvent() and metric handles. Does not define events.
 * Invariants: none
 * Side-effects: IO (logging to stdout)
 * Links: Event names from ../events.
 * @public
 */

export {
  logRequestEnd,
  logRequestError,
  logRequestStart,
  logRequestWarn,
} from "./helpers";
export { logEvent } from "./logEvent";
export type { Logger } from "./logger";
export { makeLogger, makeNoopLogger } from "./logger";
export {
  authLoginsTotal,
  httpRequestDurationMs,
  httpRequestsTotal,
  imageUploadsTotal,
  messagesSentTotal,
  metricsRegistry,
  rateLimitExceededTotal,
  statusBucket,
} from "./metrics";
export { REDACT_PATHS } from "./redact";
