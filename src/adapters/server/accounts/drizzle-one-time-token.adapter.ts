// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/accounts/drizzle-one-time-token`
 * Purpose: Drizzle implementation of OneTimeTokenRepository.
 * Scope: Hashed token storage and atomic consume-and-apply. Does not generate raw tokens.
 * Invariants: consume() uses UPDATE ... WHERE consumed_at IS NULL so concurrent redemptions yield one winner.
 * Side-effects: IO (database operations)
 * Links: ports/one-time-token.port.ts
 * @public
 */

import { and, eq, isNull } from "drizzle-orm";
import { v4 as uuidv4 } from "uuid";

import type { Database } from "@/adapters/server/db/client";
import type {
  CreateOneTimeTokenParams,
  OneTimeToken,
  OneTimeTokenRepository,
  TokenEffect,
} from "@/ports";
import { oneTimeTokens, users } from "@/shared/db";

type TokenRow = typeof oneTimeTokens.$inferSelect;

export class DrizzleOneTimeTokenRepository implements OneTimeTokenRepository {
  constructor(private readonly db: Database) {}

  async create(params: CreateOneTimeTokenParams): Promise<OneTimeToken> {
    const [row] = await this.db
      .insert(oneTimeTokens)
      .values({
        id: uuidv4(),
        userId: params.userId,
        purpose: params.purpose,
        tokenHash: params.tokenHash,
        expiresAt: params.expiresAt,
      })
      .returning();

    if (!row) {
      throw new Error("Failed to create one-time token");
    }
    return this.mapRow(row);
  }

  async findByHash(tokenHash: string): Promise<OneTimeToken | null> {
    const row = await this.db.query.oneTimeTokens.findFirst({
      where: eq(oneTimeTokens.tokenHash, tokenHash),
    });
    return row ? this.mapRow(row) : null;
  }

  async consume(
    tokenId: string,
    now: Date,
    effect: TokenEffect
  ): Promise<boolean> {
    return await this.db.transaction(async (tx) => {
      const [consumed] = await tx
        .update(oneTimeTokens)
        .set({ consumedAt: now })
        .where(
          and(eq(oneTimeTokens.id, tokenId), isNull(oneTimeTokens.consumedAt))
        )
        .returning({ userId: oneTimeTokens.userId });

      if (!consumed) {
        return false;
      }

      switch (effect.kind) {
        case "verify_email":
          await tx
            .update(users)
            .set({ isVerified: true })
            .where(eq(users.id, consumed.userId));
          break;
        case "set_password":
          await tx
            .update(users)
            .set({ passwordHash: effect.passwordHash })
            .where(eq(users.id, consumed.userId));
          break;
      }
      return true;
    });
  }

  private mapRow(row: TokenRow): OneTimeToken {
    return {
      id: row.id,
      userId: row.userId,
      purpose: row.purpose,
      tokenHash: row.tokenHash,
      expiresAt: row.expiresAt,
      consumedAt: row.consumedAt,
      createdAt: row.createdAt,
    };
  }
}
