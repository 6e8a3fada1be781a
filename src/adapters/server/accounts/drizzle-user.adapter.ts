// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/accounts/drizzle-user`
 * Purpose: Drizzle implementation of UserRepository.
 * Scope: users + profiles persistence. Does not hash passwords or validate input.
 * Invariants: Signup inserts user and profile atomically; unique violations surface as AccountConflictPortError.
 * Side-effects: IO (database operations)
 * Links: ports/user.port.ts
 * @public
 */

import { eq, or, sql } from "drizzle-orm";
import { v4 as uuidv4 } from "uuid";

import type { Database } from "@/adapters/server/db/client";
import { uniqueViolationConstraint } from "@/adapters/server/db/client";
import type { CreateUserParams, User, UserRepository } from "@/ports";
import { AccountConflictPortError } from "@/ports";
import { profiles, users } from "@/shared/db";

type UserRow = typeof users.$inferSelect;

export class DrizzleUserRepository implements UserRepository {
  constructor(private readonly db: Database) {}

  async findById(userId: string): Promise<User | null> {
    const row = await this.db.query.users.findFirst({
      where: eq(users.id, userId),
    });
    return row ? this.mapRow(row) : null;
  }

  async findByUsernameOrEmail(identifier: string): Promise<User | null> {
    const needle = identifier.trim().toLowerCase();
    const row = await this.db.query.users.findFirst({
      where: or(
        eq(sql`lower(${users.username})`, needle),
        eq(users.email, needle)
      ),
    });
    return row ? this.mapRow(row) : null;
  }

  async findByEmail(email: string): Promise<User | null> {
    const row = await this.db.query.users.findFirst({
      where: eq(users.email, email.trim().toLowerCase()),
    });
    return row ? this.mapRow(row) : null;
  }

  async usernameExists(username: string): Promise<boolean> {
    const [row] = await this.db
      .select({ id: users.id })
      .from(users)
      .where(eq(sql`lower(${users.username})`, username.toLowerCase()))
      .limit(1);
    return row !== undefined;
  }

  async emailExists(email: string): Promise<boolean> {
    const [row] = await this.db
      .select({ id: users.id })
      .from(users)
      .where(eq(users.email, email.toLowerCase()))
      .limit(1);
    return row !== undefined;
  }

  async createWithProfile(params: CreateUserParams): Promise<User> {
    try {
      return await this.db.transaction(async (tx) => {
        const [row] = await tx
          .insert(users)
          .values({
            id: uuidv4(),
            username: params.username,
            email: params.email,
            passwordHash: params.passwordHash,
          })
          .returning();

        if (!row) {
          throw new Error("Failed to create user");
        }

        await tx.insert(profiles).values({
          userId: row.id,
          firstName: params.firstName ?? null,
          lastName: params.lastName ?? null,
        });

        return this.mapRow(row);
      });
    } catch (error) {
      const constraint = uniqueViolationConstraint(error);
      if (constraint === "users_username_unique") {
        throw new AccountConflictPortError("username");
      }
      if (constraint === "users_email_unique") {
        throw new AccountConflictPortError("email");
      }
      throw error;
    }
  }

  async updatePasswordHash(userId: string, passwordHash: string): Promise<void> {
    await this.db.update(users).set({ passwordHash }).where(eq(users.id, userId));
  }

  async deactivate(userId: string): Promise<void> {
    await this.db
      .update(users)
      .set({ isActive: false })
      .where(eq(users.id, userId));
  }

  private mapRow(row: UserRow): User {
    return {
      id: row.id,
      username: row.username,
      email: row.email,
      passwordHash: row.passwordHash,
      isVerified: row.isVerified,
      isActive: row.isActive,
      createdAt: row.createdAt,
    };
  }
}
