// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/auth/session`
 * Purpose: Canonical session identity type shared across layers, plus the session cookie name.
 * Scope: Minimal user identity fields carried in access tokens; does not contain runtime behavior.
 * Invariants: Contains only serializable primitives.
 * Side-effects: none
 * Links: app/_lib/auth/session, ports/token-service.port
 * @public
 */

export interface SessionUser {
  id: string;
  username: string;
}

/** HttpOnly cookie that carries the access token for page requests. */
export const SESSION_COOKIE_NAME = "ds_session";
