// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@app/_lib/http/cookies`
 * Purpose: Set and clear the HttpOnly session cookie carrying the access token.
 * Scope: Cookie attributes only. Does not issue or verify tokens.
 * Invariants: HttpOnly, SameSite=lax, path "/"; Secure when the container says so.
 * Side-effects: none (mutates the given response)
 * Links: shared/auth/session, app/api/v1/auth/login
 * @public
 */
import type { NextResponse } from "next/server";

import { SESSION_COOKIE_NAME } from "@/shared/auth";

export function setSessionCookie(
  response: NextResponse,
  token: string,
  expiresAt: Date,
  secure: boolean
): void {
  response.cookies.set({
    name: SESSION_COOKIE_NAME,
    value: token,
    httpOnly: true,
    sameSite: "lax",
    secure,
    path: "/",
    expires: expiresAt,
  });
}

export function clearSessionCookie(
  response: NextResponse,
  secure: boolean
): void {
  response.cookies.set({
    name: SESSION_COOKIE_NAME,
    value: "",
    httpOnly: true,
    sameSite: "lax",
    secure,
    path: "/",
    maxAge: 0,
  });
}
