// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/messaging/drizzle-message`
 * Purpose: Drizzle implementation of MessageRepository.
 * Scope: Message persistence, per-side soft delete and purge. Does not decide who may read or delete.
 * Invariants:
 * - Unread count is derived from is_read, never cached.
 * - A row is purged in the same transaction that sets its last remaining delete flag.
 * Side-effects: IO (database operations)
 * Links: ports/message.port.ts, core/messaging/rules.ts
 * @public
 */

import { and, asc, count, desc, eq } from "drizzle-orm";
import { v4 as uuidv4 } from "uuid";

import type { Database } from "@/adapters/server/db/client";
import { isPurgeable } from "@/core";
import type { Message, MessageRepository, NewMessage } from "@/ports";
import { messages } from "@/shared/db";

type MessageRow = typeof messages.$inferSelect;

export class DrizzleMessageRepository implements MessageRepository {
  constructor(private readonly db: Database) {}

  async create(message: NewMessage): Promise<Message> {
    const [row] = await this.db
      .insert(messages)
      .values({
        id: uuidv4(),
        senderId: message.senderId,
        senderName: message.senderName,
        senderEmail: message.senderEmail,
        recipientId: message.recipientId,
        subject: message.subject,
        body: message.body,
      })
      .returning();

    if (!row) {
      throw new Error("Failed to create message");
    }
    return this.mapRow(row);
  }

  async findById(messageId: string): Promise<Message | null> {
    const row = await this.db.query.messages.findFirst({
      where: eq(messages.id, messageId),
    });
    return row ? this.mapRow(row) : null;
  }

  async markRead(messageId: string): Promise<void> {
    await this.db
      .update(messages)
      .set({ isRead: true })
      .where(and(eq(messages.id, messageId), eq(messages.isRead, false)));
  }

  async countUnread(recipientId: string): Promise<number> {
    const [row] = await this.db
      .select({ value: count() })
      .from(messages)
      .where(
        and(
          eq(messages.recipientId, recipientId),
          eq(messages.isRead, false),
          eq(messages.deletedByRecipient, false)
        )
      );
    return row?.value ?? 0;
  }

  async listReceived(recipientId: string): Promise<Message[]> {
    const rows = await this.db
      .select()
      .from(messages)
      .where(
        and(
          eq(messages.recipientId, recipientId),
          eq(messages.deletedByRecipient, false)
        )
      )
      .orderBy(asc(messages.isRead), desc(messages.createdAt), desc(messages.id));
    return rows.map((row) => this.mapRow(row));
  }

  async listSent(senderId: string): Promise<Message[]> {
    const rows = await this.db
      .select()
      .from(messages)
      .where(
        and(eq(messages.senderId, senderId), eq(messages.deletedBySender, false))
      )
      .orderBy(desc(messages.createdAt), desc(messages.id));
    return rows.map((row) => this.mapRow(row));
  }

  async markDeleted(
    messageId: string,
    sides: { sender: boolean; recipient: boolean }
  ): Promise<"updated" | "purged"> {
    return await this.db.transaction(async (tx) => {
      const set: Partial<typeof messages.$inferInsert> = {};
      if (sides.sender) set.deletedBySender = true;
      if (sides.recipient) set.deletedByRecipient = true;

      const [row] =
        Object.keys(set).length === 0
          ? await tx.select().from(messages).where(eq(messages.id, messageId))
          : await tx
              .update(messages)
              .set(set)
              .where(eq(messages.id, messageId))
              .returning();

      if (row && isPurgeable(row)) {
        await tx.delete(messages).where(eq(messages.id, messageId));
        return "purged";
      }
      return "updated";
    });
  }

  private mapRow(row: MessageRow): Message {
    return {
      id: row.id,
      senderId: row.senderId,
      senderName: row.senderName,
      senderEmail: row.senderEmail,
      recipientId: row.recipientId,
      subject: row.subject,
      body: row.body,
      isRead: row.isRead,
      deletedBySender: row.deletedBySender,
      deletedByRecipient: row.deletedByRecipient,
      createdAt: row.createdAt,
    };
  }
}
