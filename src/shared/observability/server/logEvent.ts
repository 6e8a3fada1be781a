// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability/server/logEvent`
 * Purpose: Type-safe event logger that enforces event name registry and base fields.
 * Scope: Single function for logging structured domain events. Does not create loggers.
 * Invariants: reqId MUST be present (throws under Vitest, logs an invariant line elsewhere); event name MUST be from registry.
 * Side-effects: IO (logging)
 * Links: EVENT_NAMES registry in ../events; called by facades.
 * @public
 */

import type { Logger } from "pino";

import type { EventBase, EventName } from "../events";

export function logEvent(
  logger: Logger,
  eventName: EventName,
  fields: EventBase & Record<string, unknown>,
  message?: string
): void {
  if (!fields.reqId) {
    if (process.env.VITEST === "true") {
      throw new Error(
        `INVARIANT VIOLATION: logEvent("${eventName}") called without reqId`
      );
    }
    logger.error(
      { event: eventName, missingField: "reqId" },
      "inv_missing_reqId_in_logEvent"
    );
    return;
  }

  logger.info({ event: eventName, ...fields }, message ?? eventName);
}
