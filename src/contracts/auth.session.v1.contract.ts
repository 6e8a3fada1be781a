// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@contracts/auth.session.v1.contract`
 * Purpose: Contracts for login, token refresh and logout.
 * Scope: Wire shapes for /api/v1/auth/{login,refresh,logout}. Does not describe cookie attributes.
 * Invariants:
 *   - expiresAt is the access token expiry (ISO 8601)
 *   - refresh never rotates the refresh token
 * Side-effects: none
 * Links: /api/v1/auth/login route, features/auth/services/session
 * @internal
 */

import { z } from "zod";

import { IdSchema } from "./common.v1.contract";

export const SessionTokensSchema = z.object({
  accessToken: z.string(),
  refreshToken: z.string(),
  tokenType: z.literal("bearer"),
  expiresAt: z.string().datetime(),
});

export const authLoginOperation = {
  id: "auth.login.v1",
  summary: "Log in with username or email",
  description:
    "Checks credentials and returns an access/refresh token pair. Also sets the HttpOnly session cookie.",
  input: z.object({
    usernameOrEmail: z.string().trim().min(1, "Enter your username or email."),
    password: z.string().min(1, "Enter your password."),
  }),
  output: SessionTokensSchema.extend({ userId: IdSchema }),
} as const;

export const authRefreshOperation = {
  id: "auth.refresh.v1",
  summary: "Exchange a refresh token for a new access token",
  description: "Returns a fresh access token; the refresh token is echoed back.",
  input: z.object({
    refreshToken: z.string().min(1),
  }),
  output: SessionTokensSchema,
} as const;

export const authLogoutOperation = {
  id: "auth.logout.v1",
  summary: "Clear the session cookie",
  description:
    "Expires the session cookie. Issued tokens stay valid until they expire.",
  input: z.object({}),
  output: z.object({}), // 204 No Content
} as const;

export type SessionTokensDto = z.infer<typeof SessionTokensSchema>;
export type AuthLoginInput = z.infer<typeof authLoginOperation.input>;
export type AuthLoginOutput = z.infer<typeof authLoginOperation.output>;
export type AuthRefreshInput = z.infer<typeof authRefreshOperation.input>;
