// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@app/_facades/auth/credentials.server`
 * Purpose: App-layer wiring for signup and password change. Resolves dependencies from the container, delegates to auth services, and maps results to contract DTOs.
 * Scope: Server-only facade. Does not perform HTTP handling or persistence.
 * Invariants: Never logs passwords or hashes; return types use z.infer.
 * Side-effects: IO (via UserRepository, OneTimeTokenRepository, Mailer ports)
 * Notes: Errors bubble to route handlers for HTTP mapping.
 * Links: features/auth/services/credentials, contracts/auth.signup.v1.contract
 * @public
 */

import { getContainer } from "@/bootstrap/container";
import type {
  AuthSignupInput,
  AuthSignupOutput,
} from "@/contracts/auth.signup.v1.contract";
import { changePassword, signUp } from "@/features/auth/public";
import type { SessionUser } from "@/shared/auth";
import {
  EVENT_NAMES,
  logEvent,
  type RequestContext,
} from "@/shared/observability";

export async function signUpFacade(
  input: AuthSignupInput,
  ctx: RequestContext
): Promise<AuthSignupOutput> {
  const result = await signUp(getContainer(), input);

  logEvent(ctx.log, EVENT_NAMES.AUTH_SIGNUP_SUCCESS, {
    reqId: ctx.reqId,
    routeId: ctx.routeId,
    userId: result.user.id,
    verificationSent: result.verificationSent,
  });

  return { user: result.user, verificationSent: result.verificationSent };
}

export async function changePasswordFacade(
  params: {
    sessionUser: SessionUser;
    currentPassword: string;
    newPassword: string;
  },
  ctx: RequestContext
): Promise<void> {
  await changePassword(getContainer(), {
    userId: params.sessionUser.id,
    currentPassword: params.currentPassword,
    newPassword: params.newPassword,
  });

  logEvent(ctx.log, EVENT_NAMES.AUTH_PASSWORD_CHANGED, {
    reqId: ctx.reqId,
    routeId: ctx.routeId,
    userId: params.sessionUser.id,
  });
}
