// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@devsearch/db-schema/accounts`
 * Purpose: Account identity tables: users and their single-use email tokens.
 * Scope: Defines users and one_time_tokens. Does not contain queries or business logic.
 * Invariants:
 * - USERNAME_UNIQUE / EMAIL_UNIQUE: enforced by unique indexes; usernames compare case-insensitively, email stored lower-cased by the adapter.
 * - NO_HARD_DELETE: users are deactivated (is_active = false), never deleted.
 * - TOKEN_HASH_ONLY: one_time_tokens stores sha256(token), never the raw token.
 * - SINGLE_USE: consumed_at is set exactly once via conditional update.
 * Side-effects: none (schema definitions only)
 * Links: packages/db-schema/src/index.ts
 * @public
 */

import { sql } from "drizzle-orm";
import {
  boolean,
  check,
  index,
  pgTable,
  text,
  timestamp,
  uniqueIndex,
} from "drizzle-orm/pg-core";

/**
 * Users table - credentials and account flags.
 * FK target for: profiles, skills, projects, reviews, messages, one_time_tokens
 */
export const users = pgTable(
  "users",
  {
    id: text("id").primaryKey(),
    username: text("username").notNull(),
    email: text("email").notNull(),
    passwordHash: text("password_hash").notNull(),
    isVerified: boolean("is_verified").notNull().default(false),
    isActive: boolean("is_active").notNull().default(true),
    createdAt: timestamp("created_at", { withTimezone: true })
      .notNull()
      .defaultNow(),
  },
  (table) => [
    uniqueIndex("users_username_unique").on(sql`lower(${table.username})`),
    uniqueIndex("users_email_unique").on(table.email),
    index("users_created_at_idx").on(table.createdAt),
  ]
);

/**
 * One-time tokens for email verification and password reset.
 */
export const oneTimeTokens = pgTable(
  "one_time_tokens",
  {
    id: text("id").primaryKey(),
    userId: text("user_id")
      .notNull()
      .references(() => users.id, { onDelete: "cascade" }),
    purpose: text("purpose", {
      enum: ["email_verification", "password_reset"],
    }).notNull(),
    tokenHash: text("token_hash").notNull(),
    expiresAt: timestamp("expires_at", { withTimezone: true }).notNull(),
    consumedAt: timestamp("consumed_at", { withTimezone: true }),
    createdAt: timestamp("created_at", { withTimezone: true })
      .notNull()
      .defaultNow(),
  },
  (table) => [
    check(
      "one_time_tokens_purpose_check",
      sql`${table.purpose} IN ('email_verification', 'password_reset')`
    ),
    uniqueIndex("one_time_tokens_token_hash_unique").on(table.tokenHash),
    index("one_time_tokens_user_id_idx").on(table.userId),
  ]
);
