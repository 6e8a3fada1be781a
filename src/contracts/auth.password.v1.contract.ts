// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@contracts/auth.password.v1.contract`
 * Purpose: Contracts for forgotten-password, reset and change-password flows.
 * Scope: Wire shapes for /api/v1/auth/password/*. Does not encode the password policy.
 * Invariants:
 *   - forgot always answers 202 with the same body, whether or not the address is known
 *   - policy violations come back as fieldErrors.newPassword
 * Side-effects: none
 * Links: /api/v1/auth/password routes, features/auth/services
 * @internal
 */

import { z } from "zod";

import { TokenRedemptionSchema } from "./auth.email-verification.v1.contract";

export const authForgotPasswordOperation = {
  id: "auth.password.forgot.v1",
  summary: "Request a password reset link",
  description:
    "Mails a reset link when the address belongs to an active account. The response does not reveal which.",
  input: z.object({ email: z.string() }),
  output: z.object({ status: z.literal("accepted") }),
} as const;

export const authResetPasswordOperation = {
  id: "auth.password.reset.v1",
  summary: "Set a new password with a reset link",
  description: "Redeems the reset token and replaces the password.",
  input: TokenRedemptionSchema.extend({ newPassword: z.string() }),
  output: z.object({ status: z.literal("ok") }),
} as const;

export const authChangePasswordOperation = {
  id: "auth.password.change.v1",
  summary: "Change the caller's password",
  description: "Requires the current password.",
  input: z.object({
    currentPassword: z.string().min(1, "Enter your current password."),
    newPassword: z.string(),
  }),
  output: z.object({ status: z.literal("ok") }),
} as const;

export type AuthResetPasswordInput = z.infer<
  typeof authResetPasswordOperation.input
>;
export type AuthChangePasswordInput = z.infer<
  typeof authChangePasswordOperation.input
>;
