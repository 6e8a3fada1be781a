// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@contracts/auth.signup.v1.contract`
 * Purpose: Contract for account registration.
 * Scope: Wire shapes for POST /api/v1/auth/signup. Does not encode the username or password policy; the service reports those per field.
 * Invariants:
 *   - Output never carries the password hash
 *   - verificationSent is false when the mail transport rejected the message; the account still exists
 * Side-effects: none
 * Links: /api/v1/auth/signup route, features/auth/services/credentials
 * @internal
 */

import { z } from "zod";

import { IdSchema } from "./common.v1.contract";

export const AuthUserSchema = z.object({
  id: IdSchema,
  username: z.string(),
  email: z.string(),
  isVerified: z.boolean(),
});

export const authSignupOperation = {
  id: "auth.signup.v1",
  summary: "Register a new account",
  description:
    "Creates a user with an empty profile and sends an email verification link.",
  input: z.object({
    username: z.string(),
    email: z.string(),
    password: z.string(),
    firstName: z.string().nullable().optional(),
    lastName: z.string().nullable().optional(),
  }),
  output: z.object({
    user: AuthUserSchema,
    verificationSent: z.boolean(),
  }),
} as const;

export type AuthUser = z.infer<typeof AuthUserSchema>;
export type AuthSignupInput = z.infer<typeof authSignupOperation.input>;
export type AuthSignupOutput = z.infer<typeof authSignupOperation.output>;
