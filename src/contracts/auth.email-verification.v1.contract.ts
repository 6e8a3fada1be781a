// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@contracts/auth.email-verification.v1.contract`
 * Purpose: Contracts for redeeming and re-requesting email verification links.
 * Scope: Wire shapes for /api/v1/auth/verify-email and /api/v1/auth/verify-email/resend. Does not contain business logic.
 * Invariants: A link redeems exactly once; later attempts get 409.
 * Side-effects: none
 * Links: /api/v1/auth/verify-email route, features/auth/services/emailVerification
 * @internal
 */

import { z } from "zod";

export const TokenRedemptionSchema = z.object({
  uid: z.string().uuid(),
  token: z.string().min(1),
});

export const authVerifyEmailOperation = {
  id: "auth.verify-email.v1",
  summary: "Redeem an email verification link",
  description: "Marks the account's email as verified.",
  input: TokenRedemptionSchema,
  output: z.object({ verified: z.literal(true) }),
} as const;

export const authResendVerificationOperation = {
  id: "auth.verify-email.resend.v1",
  summary: "Send a new verification link to the caller",
  description:
    "Issues a fresh verification token for the authenticated user and mails it.",
  input: z.object({}),
  output: z.object({ expiresAt: z.string().datetime() }),
} as const;

export type TokenRedemptionInput = z.infer<typeof TokenRedemptionSchema>;
