// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@app/_facades/auth/verification.server`
 * Purpose: App-layer wiring for email verification and password reset links.
 * Scope: Server-only facade over the one-time token flows. Does not perform HTTP handling.
 * Invariants: Raw tokens are never logged; forgot-password answers the same whether or not the address exists or the mail went out.
 * Side-effects: IO (via OneTimeTokenRepository, UserRepository, Mailer ports)
 * Links: features/auth/services/emailVerification, contracts/auth.email-verification.v1.contract
 * @public
 */

import { getContainer } from "@/bootstrap/container";
import type { TokenRedemptionInput } from "@/contracts/auth.email-verification.v1.contract";
import type { AuthResetPasswordInput } from "@/contracts/auth.password.v1.contract";
import {
  requestEmailVerification,
  requestPasswordReset,
  resetPassword,
  verifyEmail,
} from "@/features/auth/public";
import { isMailDeliveryPortError } from "@/ports";
import type { SessionUser } from "@/shared/auth";
import {
  EVENT_NAMES,
  logEvent,
  type RequestContext,
} from "@/shared/observability";

export async function verifyEmailFacade(
  input: TokenRedemptionInput,
  ctx: RequestContext
): Promise<{ verified: true }> {
  await verifyEmail(getContainer(), input);

  logEvent(ctx.log, EVENT_NAMES.AUTH_EMAIL_VERIFIED, {
    reqId: ctx.reqId,
    routeId: ctx.routeId,
    userId: input.uid,
  });
  return { verified: true };
}

export async function resendVerificationFacade(
  params: { sessionUser: SessionUser },
  ctx: RequestContext
): Promise<{ expiresAt: string }> {
  const { expiresAt } = await requestEmailVerification(
    getContainer(),
    params.sessionUser.id
  );

  logEvent(ctx.log, EVENT_NAMES.AUTH_EMAIL_VERIFICATION_SENT, {
    reqId: ctx.reqId,
    routeId: ctx.routeId,
    userId: params.sessionUser.id,
  });
  return { expiresAt: expiresAt.toISOString() };
}

export async function forgotPasswordFacade(
  email: string,
  ctx: RequestContext
): Promise<{ status: "accepted" }> {
  try {
    await requestPasswordReset(getContainer(), email);
  } catch (error) {
    // Mail failure must not reveal that the address exists
    if (!isMailDeliveryPortError(error)) throw error;
    ctx.log.warn({ err: error }, "password reset mail not delivered");
  }

  logEvent(ctx.log, EVENT_NAMES.AUTH_PASSWORD_RESET_REQUESTED, {
    reqId: ctx.reqId,
    routeId: ctx.routeId,
  });
  return { status: "accepted" };
}

export async function resetPasswordFacade(
  input: AuthResetPasswordInput,
  ctx: RequestContext
): Promise<{ status: "ok" }> {
  await resetPassword(getContainer(), input);

  logEvent(ctx.log, EVENT_NAMES.AUTH_PASSWORD_RESET, {
    reqId: ctx.reqId,
    routeId: ctx.routeId,
    userId: input.uid,
  });
  return { status: "ok" };
}
