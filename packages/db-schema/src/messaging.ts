// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@devsearch/db-schema/messaging`
 * Purpose: Direct message table.
 * Scope: Defines messages only. Does not contain queries or business logic.
 * Invariants:
 * - UNREAD_FROM_FLAG: unread count is always COUNT(is_read = false), never stored.
 * - GUEST_SENDER: sender_id is null for guest messages; sender_name/sender_email always set.
 * - SOFT_DELETE_PER_SIDE: row removed only once both deleted_by_* flags are true.
 * Side-effects: none (schema definitions only)
 * Links: packages/db-schema/src/accounts.ts
 * @public
 */

import {
  boolean,
  index,
  pgTable,
  text,
  timestamp,
  varchar,
} from "drizzle-orm/pg-core";

import { users } from "./accounts";

export const messages = pgTable(
  "messages",
  {
    id: text("id").primaryKey(),
    senderId: text("sender_id").references(() => users.id, {
      onDelete: "set null",
    }),
    senderName: varchar("sender_name", { length: 200 }).notNull(),
    senderEmail: varchar("sender_email", { length: 200 }).notNull(),
    recipientId: text("recipient_id")
      .notNull()
      .references(() => users.id, { onDelete: "cascade" }),
    subject: varchar("subject", { length: 200 }).notNull(),
    body: text("body").notNull(),
    isRead: boolean("is_read").notNull().default(false),
    deletedBySender: boolean("deleted_by_sender").notNull().default(false),
    deletedByRecipient: boolean("deleted_by_recipient")
      .notNull()
      .default(false),
    createdAt: timestamp("created_at", { withTimezone: true })
      .notNull()
      .defaultNow(),
  },
  (table) => [
    index("messages_recipient_unread_idx").on(table.recipientId, table.isRead),
    index("messages_sender_id_idx").on(table.senderId),
  ]
);
