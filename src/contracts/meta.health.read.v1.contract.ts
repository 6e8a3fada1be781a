// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@contracts/meta.health.read.v1.contract`
 * Purpose: Contract for the liveness endpoint.
 * Scope: Defines the health response. Does not probe the database or mail transport.
 * Invariants: Always `{ status: "ok" }` while the process serves requests.
 * Side-effects: none
 * Links: /api/v1/health route
 * @internal
 */

import { z } from "zod";

export const metaHealthOutputSchema = z.object({
  status: z.literal("ok"),
});

export const metaHealthOperation = {
  id: "meta.health.read.v1",
  summary: "Liveness check",
  description: "Returns ok while the process is serving requests.",
  input: null,
  output: metaHealthOutputSchema,
} as const;
