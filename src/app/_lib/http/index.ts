// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@app/_lib/http`
 * Purpose: Barrel for route-handler helpers.
 * Scope: Re-exports only. Does not implement logic.
 * Invariants: none
 * Side-effects: none
 * @public
 */
export { clearSessionCookie, setSessionCookie } from "./cookies";
export { handleRouteError } from "./handleRouteError";
export {
  InvalidRequestBodyError,
  isInvalidRequestBodyError,
  parseEntityId,
  readImageUpload,
  readJsonBody,
  requireParams,
  searchParamsRecord,
} from "./request";
