// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@devsearch/db-schema/profiles`
 * Purpose: Public developer profile and skill tables.
 * Scope: Defines profiles (1:1 with users) and skills. Does not contain queries or business logic.
 * Invariants:
 * - ONE_PROFILE_PER_USER: profiles.user_id is the primary key.
 * - SKILL_ORDER: skills listed by (position, created_at).
 * Side-effects: none (schema definitions only)
 * Links: packages/db-schema/src/accounts.ts
 * @public
 */

import {
  index,
  integer,
  pgTable,
  text,
  timestamp,
  varchar,
} from "drizzle-orm/pg-core";

import { users } from "./accounts";

export const DEFAULT_PROFILE_IMAGE = "/images/default.jpg";

export const profiles = pgTable("profiles", {
  userId: text("user_id")
    .primaryKey()
    .references(() => users.id, { onDelete: "cascade" }),
  firstName: varchar("first_name", { length: 200 }),
  lastName: varchar("last_name", { length: 200 }),
  location: varchar("location", { length: 200 }),
  shortIntro: varchar("short_intro", { length: 200 }),
  bio: text("bio"),
  profileImage: text("profile_image").notNull().default(DEFAULT_PROFILE_IMAGE),
  github: text("github"),
  x: text("x"),
  linkedin: text("linkedin"),
  youtube: text("youtube"),
  website: text("website"),
  updatedAt: timestamp("updated_at", { withTimezone: true })
    .notNull()
    .defaultNow(),
});

export const skills = pgTable(
  "skills",
  {
    id: text("id").primaryKey(),
    ownerId: text("owner_id")
      .notNull()
      .references(() => profiles.userId, { onDelete: "cascade" }),
    name: varchar("name", { length: 200 }).notNull(),
    description: text("description"),
    position: integer("position").notNull(),
    createdAt: timestamp("created_at", { withTimezone: true })
      .notNull()
      .defaultNow(),
  },
  (table) => [
    index("skills_owner_position_idx").on(table.ownerId, table.position),
  ]
);
