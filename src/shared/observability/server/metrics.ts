// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability/server/metrics`
 * Purpose: Prometheus metrics registry and metric definitions.
 * Scope: Shared observability singleton. Provides registry and metric handles. Does not implement the scrape endpoint.
 * Invariants: Single registry per process via globalThis; labels always low-cardinality; survives HMR.
 * Side-effects: global (module-scoped registry via globalThis)
 * Notes: getOrCreate pattern prevents duplicate registration errors during HMR/tests.
 * Links: Exposed via /api/metrics; recorded by wrapRouteHandlerWithLogging and facades.
 * @public
 */

import type { Counter, Histogram, Registry } from "prom-client";
import client from "prom-client";

const globalForMetrics = globalThis as typeof globalThis & {
  metricsRegistry?: Registry;
  metricsInitialized?: boolean;
};

export const metricsRegistry: Registry =
  globalForMetrics.metricsRegistry ?? new client.Registry();

if (!globalForMetrics.metricsInitialized) {
  globalForMetrics.metricsRegistry = metricsRegistry;
  globalForMetrics.metricsInitialized = true;

  metricsRegistry.setDefaultLabels({ app: "devsearch" });
  client.collectDefaultMetrics({ register: metricsRegistry });
}

function getOrCreateCounter<T extends string>(
  name: string,
  help: string,
  labelNames: readonly T[] = [] as readonly T[]
): Counter<T> {
  const existing = metricsRegistry.getSingleMetric(name);
  if (existing) return existing as Counter<T>;
  return new client.Counter({
    name,
    help,
    labelNames: [...labelNames],
    registers: [metricsRegistry],
  });
}

function getOrCreateHistogram<T extends string>(
  name: string,
  help: string,
  labelNames: readonly T[],
  buckets: number[]
): Histogram<T> {
  const existing = metricsRegistry.getSingleMetric(name);
  if (existing) return existing as Histogram<T>;
  return new client.Histogram({
    name,
    help,
    labelNames: [...labelNames],
    buckets,
    registers: [metricsRegistry],
  });
}

// =============================================================================
// HTTP Metrics
// =============================================================================

export const httpRequestsTotal = getOrCreateCounter(
  "http_requests_total",
  "Total number of HTTP requests",
  ["route", "method", "status"] as const
);

export const httpRequestDurationMs = getOrCreateHistogram(
  "http_request_duration_ms",
  "HTTP request duration in milliseconds",
  ["route", "method"] as const,
  [5, 10, 25, 50, 100, 250, 500, 1000, 2500, 5000, 10000]
);

export const rateLimitExceededTotal = getOrCreateCounter(
  "rate_limit_exceeded_total",
  "Requests rejected by the per-IP rate limiter",
  ["route"] as const
);

// =============================================================================
// Domain Metrics
// =============================================================================

export const authLoginsTotal = getOrCreateCounter(
  "auth_logins_total",
  "Login attempts by outcome",
  ["outcome"] as const
);

export const messagesSentTotal = getOrCreateCounter(
  "messages_sent_total",
  "Direct messages sent",
  ["sender"] as const
);

export const imageUploadsTotal = getOrCreateCounter(
  "image_uploads_total",
  "Image uploads by outcome",
  ["target", "outcome"] as const
);

// =============================================================================
// Helpers
// =============================================================================

/**
 * Map HTTP status code to bucket for low-cardinality label.
 */
export function statusBucket(status: number): "2xx" | "3xx" | "4xx" | "5xx" {
  if (status >= 200 && status < 300) return "2xx";
  if (status >= 300 && status < 400) return "3xx";
  if (status >= 400 && status < 500) return "4xx";
  return "5xx";
}
