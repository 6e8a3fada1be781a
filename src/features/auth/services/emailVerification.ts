// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/auth/services/emailVerification`
 * Purpose: Single-use emailed tokens for address verification and password reset.
 * Scope: Token minting, mail composition, ordered redemption checks. Storage and delivery go through ports.
 * Invariants:
 * - Raw tokens leave this module only inside the mailed link; the store sees sha256 only.
 * - Redemption order: unknown/mismatched -> InvalidToken, consumed -> TokenAlreadyUsed, expired -> TokenExpired.
 * - A lost consume race is reported as TokenAlreadyUsed.
 * - requestPasswordReset never reveals whether the address is registered.
 * Side-effects: IO (via ports)
 * Links: core/accounts/rules.ts (assertTokenRedeemable), ports/one-time-token.port.ts
 * @public
 */

import { createHash, randomBytes } from "node:crypto";

import type { OneTimeTokenPurpose } from "@/core";
import {
  assertTokenRedeemable,
  FieldValidationError,
  NotFoundError,
  normalizeEmail,
  passwordPolicyViolations,
  TokenAlreadyUsedError,
} from "@/core";
import type {
  Clock,
  Mailer,
  OneTimeTokenRepository,
  PasswordHasher,
  TokenEffect,
  UserRepository,
} from "@/ports";

export interface EmailTokenConfig {
  appBaseUrl: string;
  emailTokenTtlSeconds: number;
}

export interface EmailTokenDeps {
  users: UserRepository;
  oneTimeTokens: OneTimeTokenRepository;
  mailer: Mailer;
  clock: Clock;
  config: EmailTokenConfig;
}

export interface PasswordResetDeps extends EmailTokenDeps {
  passwordHasher: PasswordHasher;
}

export interface TokenRedemption {
  uid: string;
  token: string;
}

export const VERIFICATION_SUBJECT = "DevSearch Account Verification";
export const PASSWORD_RESET_SUBJECT = "DevSearch Password Reset";

export function generateRawToken(): string {
  return randomBytes(32).toString("base64url");
}

export function hashToken(raw: string): string {
  return createHash("sha256").update(raw).digest("hex");
}

function buildLink(
  config: EmailTokenConfig,
  pathname: string,
  uid: string,
  token: string
): string {
  const url = new URL(pathname, config.appBaseUrl);
  url.searchParams.set("uid", uid);
  url.searchParams.set("token", token);
  return url.toString();
}

async function mintToken(
  deps: EmailTokenDeps,
  userId: string,
  purpose: OneTimeTokenPurpose
): Promise<{ raw: string; expiresAt: Date }> {
  const raw = generateRawToken();
  const now = new Date(deps.clock.now());
  const expiresAt = new Date(
    now.getTime() + deps.config.emailTokenTtlSeconds * 1000
  );

  await deps.oneTimeTokens.create({
    userId,
    purpose,
    tokenHash: hashToken(raw),
    expiresAt,
  });
  return { raw, expiresAt };
}

/**
 * Looks the token up by hash, runs the ordered checks, then consumes it and
 * applies the effect atomically.
 */
async function redeem(
  deps: Pick<EmailTokenDeps, "oneTimeTokens" | "clock">,
  redemption: TokenRedemption,
  purpose: OneTimeTokenPurpose,
  effect: TokenEffect
): Promise<void> {
  const now = new Date(deps.clock.now());
  const token = await deps.oneTimeTokens.findByHash(hashToken(redemption.token));

  assertTokenRedeemable(token, { userId: redemption.uid, purpose }, now);

  const consumed = await deps.oneTimeTokens.consume(token.id, now, effect);
  if (!consumed) {
    throw new TokenAlreadyUsedError(purpose);
  }
}

export async function requestEmailVerification(
  deps: EmailTokenDeps,
  userId: string
): Promise<{ expiresAt: Date }> {
  const user = await deps.users.findById(userId);
  if (!user || !user.isActive) {
    throw new NotFoundError("user", userId);
  }

  const { raw, expiresAt } = await mintToken(
    deps,
    user.id,
    "email_verification"
  );
  const link = buildLink(deps.config, "/verify-email", user.id, raw);

  await deps.mailer.send({
    to: user.email,
    subject: VERIFICATION_SUBJECT,
    text: [
      `Hi ${user.username},`,
      "",
      "Confirm your DevSearch email address by opening this link:",
      link,
      "",
      `The link expires in ${Math.round(deps.config.emailTokenTtlSeconds / 60)} minutes.`,
    ].join("\n"),
  });

  return { expiresAt };
}

export async function verifyEmail(
  deps: Pick<EmailTokenDeps, "oneTimeTokens" | "clock">,
  redemption: TokenRedemption
): Promise<void> {
  await redeem(deps, redemption, "email_verification", {
    kind: "verify_email",
  });
}

export async function requestPasswordReset(
  deps: EmailTokenDeps,
  email: string
): Promise<void> {
  const user = await deps.users.findByEmail(normalizeEmail(email));
  if (!user || !user.isActive) {
    return;
  }

  const { raw } = await mintToken(deps, user.id, "password_reset");
  const link = buildLink(deps.config, "/reset-password", user.id, raw);

  await deps.mailer.send({
    to: user.email,
    subject: PASSWORD_RESET_SUBJECT,
    text: [
      `Hi ${user.username},`,
      "",
      "Someone asked to reset your DevSearch password. If it was you, open this link:",
      link,
      "",
      "If you did not ask for a reset, ignore this email.",
    ].join("\n"),
  });
}

export async function resetPassword(
  deps: Pick<PasswordResetDeps, "oneTimeTokens" | "clock" | "passwordHasher">,
  input: TokenRedemption & { newPassword: string }
): Promise<void> {
  // Token problems take precedence over password problems
  const now = new Date(deps.clock.now());
  const token = await deps.oneTimeTokens.findByHash(hashToken(input.token));
  assertTokenRedeemable(
    token,
    { userId: input.uid, purpose: "password_reset" },
    now
  );

  const violations = passwordPolicyViolations(input.newPassword);
  if (violations.length > 0) {
    throw new FieldValidationError({ newPassword: violations });
  }

  await redeem(deps, input, "password_reset", {
    kind: "set_password",
    passwordHash: await deps.passwordHasher.hash(input.newPassword),
  });
}
