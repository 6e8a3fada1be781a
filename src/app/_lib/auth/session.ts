// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@app/_lib/auth/session`
 * Purpose: Server-side session resolver for bearer access tokens and the session cookie.
 * Scope: Derives a SessionUser from an Authorization header or the HttpOnly session cookie. Does not perform database access or user existence checks.
 * Invariants: Only access tokens resolve a session; refresh tokens never do. Returns null instead of throwing on any token failure.
 * Side-effects: none
 * Notes: Without a request (server components), reads headers and cookies through next/headers.
 *        requirePageSession redirects to /login?next= for guarded pages.
 * Links: ports/token-service.port, adapters/server/auth/jwt-token-service.adapter
 * @public
 */
import { cookies, headers } from "next/headers";
import { redirect } from "next/navigation";
import type { NextRequest } from "next/server";

import { getContainer } from "@/bootstrap/container";
import { isUnauthorizedError } from "@/core";
import { SESSION_COOKIE_NAME, type SessionUser } from "@/shared/auth";

const BEARER_PREFIX = "bearer ";

export function extractBearerToken(
  authorization: string | null | undefined
): string | null {
  if (!authorization) return null;
  if (!authorization.toLowerCase().startsWith(BEARER_PREFIX)) return null;
  const token = authorization.slice(BEARER_PREFIX.length).trim();
  return token.length > 0 ? token : null;
}

async function resolveToken(request?: NextRequest): Promise<string | null> {
  if (request) {
    return (
      extractBearerToken(request.headers.get("authorization")) ??
      request.cookies.get(SESSION_COOKIE_NAME)?.value ??
      null
    );
  }

  const headerStore = await headers();
  const cookieStore = await cookies();
  return (
    extractBearerToken(headerStore.get("authorization")) ??
    cookieStore.get(SESSION_COOKIE_NAME)?.value ??
    null
  );
}

export async function getSessionUser(
  request?: NextRequest
): Promise<SessionUser | null> {
  const token = await resolveToken(request);
  if (!token) return null;

  try {
    return await getContainer().tokenService.verify(token, "access");
  } catch (error) {
    if (isUnauthorizedError(error)) return null;
    throw error;
  }
}

/**
 * Session for a page that requires sign-in; redirects to the login page otherwise.
 */
export async function requirePageSession(path: string): Promise<SessionUser> {
  const user = await getSessionUser();
  if (!user) redirect(`/login?next=${encodeURIComponent(path)}`);
  return user;
}
