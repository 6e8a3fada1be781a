// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@app/api/v1/health`
 * Purpose: Liveness endpoint.
 * Scope: Returns a constant ok body. Does not touch the database or mail transport.
 * Invariants: Output validated against meta.health.read.v1 contract.
 * Side-effects: none
 * Links: contracts/meta.health.read.v1.contract
 * @public
 */

import { NextResponse } from "next/server";

import { wrapRouteHandlerWithLogging } from "@/bootstrap/http";
import { metaHealthOperation } from "@/contracts/meta.health.read.v1.contract";

export const dynamic = "force-dynamic";
export const runtime = "nodejs";

export const GET = wrapRouteHandlerWithLogging(
  { routeId: "meta.health", auth: { mode: "none" } },
  async () => {
    return NextResponse.json(metaHealthOperation.output.parse({ status: "ok" }));
  }
);
