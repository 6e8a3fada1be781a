// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@app/_lib/pageContext.server`
 * Purpose: RequestContext for server-rendered pages that call facades directly.
 * Scope: Reads request headers through next/headers. Does not resolve the session; callers pass it.
 * Side-effects: none
 * Links: shared/observability/context/factory
 * @internal
 */

import { headers } from "next/headers";

import { getContainer } from "@/bootstrap/container";
import type { SessionUser } from "@/shared/auth";
import { createPageContext, type RequestContext } from "@/shared/observability";

export async function getPageContext(
  routeId: string,
  session?: SessionUser
): Promise<RequestContext> {
  const container = getContainer();
  return createPageContext(
    { baseLog: container.log, clock: container.clock },
    await headers(),
    { routeId, session }
  );
}
