// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability/context/types`
 * Purpose: Request-scoped context type for passing logger, session, and clock through layers.
 * Scope: Define RequestContext interface. Does not implement context creation or lifecycle.
 * Invariants: log is child logger with reqId, route, method bound.
 * Side-effects: none
 * Notes: Pass ctx through facades for logging. Cross-cutting observability concern.
 * Links: Used by factory module; passed through all request handlers.
 * @public
 */

import type { Logger } from "pino";

import type { SessionUser } from "@/shared/auth";

/**
 * Minimal clock interface for timestamp generation.
 * Structural typing - any object with now() satisfies this (including ports/Clock).
 */
export interface Clock {
  now(): string;
}

export interface RequestContext {
  log: Logger; // Child logger with reqId, route, method
  reqId: string; // Request correlation ID
  routeId?: string | undefined;
  session?: SessionUser | undefined; // Authenticated user (optional)
  clock: Clock;
}
