// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@devsearch/db-schema/projects`
 * Purpose: Project showcase tables: projects, tags, project_tags and reviews.
 * Scope: Defines tables and constraints only. Does not contain queries or business logic.
 * Invariants:
 * - ONE_REVIEW_PER_VOTER: UNIQUE(project_id, owner_id) on reviews.
 * - TAG_NAME_UNIQUE: tags deduplicated by normalized name.
 * - VOTE_AGGREGATE: vote_total / vote_ratio recomputed from reviews on every review write.
 * Side-effects: none (schema definitions only)
 * Links: packages/db-schema/src/accounts.ts
 * @public
 */

import { sql } from "drizzle-orm";
import {
  check,
  index,
  integer,
  pgTable,
  primaryKey,
  text,
  timestamp,
  uniqueIndex,
  varchar,
} from "drizzle-orm/pg-core";

import { users } from "./accounts";

export const DEFAULT_PROJECT_IMAGE = "/images/default-project.jpg";

export const projects = pgTable(
  "projects",
  {
    id: text("id").primaryKey(),
    ownerId: text("owner_id")
      .notNull()
      .references(() => users.id, { onDelete: "cascade" }),
    title: varchar("title", { length: 200 }).notNull(),
    description: text("description"),
    featuredImage: text("featured_image")
      .notNull()
      .default(DEFAULT_PROJECT_IMAGE),
    demoLink: text("demo_link"),
    sourceCode: text("source_code"),
    voteTotal: integer("vote_total").notNull().default(0),
    voteRatio: integer("vote_ratio").notNull().default(0),
    createdAt: timestamp("created_at", { withTimezone: true })
      .notNull()
      .defaultNow(),
  },
  (table) => [
    index("projects_owner_id_idx").on(table.ownerId),
    index("projects_created_at_idx").on(table.createdAt),
  ]
);

export const tags = pgTable(
  "tags",
  {
    id: text("id").primaryKey(),
    name: varchar("name", { length: 50 }).notNull(),
    createdAt: timestamp("created_at", { withTimezone: true })
      .notNull()
      .defaultNow(),
  },
  (table) => [uniqueIndex("tags_name_unique").on(table.name)]
);

export const projectTags = pgTable(
  "project_tags",
  {
    projectId: text("project_id")
      .notNull()
      .references(() => projects.id, { onDelete: "cascade" }),
    tagId: text("tag_id")
      .notNull()
      .references(() => tags.id, { onDelete: "cascade" }),
  },
  (table) => [
    primaryKey({ columns: [table.projectId, table.tagId] }),
    index("project_tags_tag_id_idx").on(table.tagId),
  ]
);

export const reviews = pgTable(
  "reviews",
  {
    id: text("id").primaryKey(),
    projectId: text("project_id")
      .notNull()
      .references(() => projects.id, { onDelete: "cascade" }),
    ownerId: text("owner_id")
      .notNull()
      .references(() => users.id, { onDelete: "cascade" }),
    value: text("value", { enum: ["up", "down"] }).notNull(),
    body: text("body"),
    createdAt: timestamp("created_at", { withTimezone: true })
      .notNull()
      .defaultNow(),
  },
  (table) => [
    check("reviews_value_check", sql`${table.value} IN ('up', 'down')`),
    uniqueIndex("reviews_project_owner_unique").on(
      table.projectId,
      table.ownerId
    ),
  ]
);
