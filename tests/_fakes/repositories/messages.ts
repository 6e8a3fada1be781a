// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/_fakes/repositories/messages`
 * Purpose: In-memory MessageRepository.
 * Scope: Uses the core ordering, unread and purge rules so the fake agrees with the Drizzle adapter by construction.
 * Side-effects: none
 * Links: adapters/server/messaging/drizzle-message.adapter.ts
 * @public
 */

import type { Message, NewMessage } from "@/core";
import { compareInbox, countUnread, isPurgeable } from "@/core";
import type { MessageRepository } from "@/ports";

import { type InMemoryStore, newestFirst } from "./store";

export class InMemoryMessageRepository implements MessageRepository {
  constructor(private readonly store: InMemoryStore) {}

  async create(message: NewMessage): Promise<Message> {
    const created: Message = {
      id: this.store.nextId(),
      ...message,
      isRead: false,
      deletedBySender: false,
      deletedByRecipient: false,
      createdAt: this.store.now(),
    };
    this.store.messages.set(created.id, created);
    return created;
  }

  async findById(messageId: string): Promise<Message | null> {
    return this.store.messages.get(messageId) ?? null;
  }

  async markRead(messageId: string): Promise<void> {
    const message = this.store.messages.get(messageId);
    if (message) this.store.messages.set(messageId, { ...message, isRead: true });
  }

  async countUnread(recipientId: string): Promise<number> {
    return countUnread([...this.store.messages.values()], recipientId);
  }

  async listReceived(recipientId: string): Promise<Message[]> {
    return [...this.store.messages.values()]
      .filter((m) => m.recipientId === recipientId && !m.deletedByRecipient)
      .sort(compareInbox);
  }

  async listSent(senderId: string): Promise<Message[]> {
    return [...this.store.messages.values()]
      .filter((m) => m.senderId === senderId && !m.deletedBySender)
      .sort(newestFirst);
  }

  async markDeleted(
    messageId: string,
    sides: { sender: boolean; recipient: boolean }
  ): Promise<"updated" | "purged"> {
    const message = this.store.messages.get(messageId);
    if (!message) return "purged";

    const updated: Message = {
      ...message,
      deletedBySender: message.deletedBySender || sides.sender,
      deletedByRecipient: message.deletedByRecipient || sides.recipient,
    };
    if (isPurgeable(updated)) {
      this.store.messages.delete(messageId);
      return "purged";
    }
    this.store.messages.set(messageId, updated);
    return "updated";
  }
}
