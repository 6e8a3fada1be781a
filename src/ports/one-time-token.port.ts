// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports/one-time-token.port`
 * Purpose: Persistence port for single-use email verification and password reset tokens.
 * Scope: Stores hashed tokens and performs atomic consume-and-apply. Does not generate or send tokens.
 * Invariants:
 * - Only sha256 hashes are stored.
 * - consume() flips consumedAt from null exactly once and applies the effect in the same transaction.
 * Side-effects: none (interface only)
 * Links: adapters/server/accounts/drizzle-one-time-token.adapter.ts
 * @public
 */

import type { OneTimeToken, OneTimeTokenPurpose } from "@/core";

export type { OneTimeToken, OneTimeTokenPurpose } from "@/core";

export interface CreateOneTimeTokenParams {
  userId: string;
  purpose: OneTimeTokenPurpose;
  tokenHash: string;
  expiresAt: Date;
}

/** Account mutation applied atomically with token consumption. */
export type TokenEffect =
  | { kind: "verify_email" }
  | { kind: "set_password"; passwordHash: string };

export interface OneTimeTokenRepository {
  create(params: CreateOneTimeTokenParams): Promise<OneTimeToken>;

  findByHash(tokenHash: string): Promise<OneTimeToken | null>;

  /**
   * Conditionally consume (consumedAt IS NULL) and apply the effect.
   * @returns false when another redemption already consumed the token
   */
  consume(tokenId: string, now: Date, effect: TokenEffect): Promise<boolean>;
}
