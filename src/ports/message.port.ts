// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports/message.port`
 * Purpose: Persistence port for direct messages.
 * Scope: Message writes, per-side deletion and unread counting. Does not enforce read permissions (features do).
 * Invariants:
 * - countUnread is a live COUNT over is_read = false; never cached.
 * - markDeleted purges the row in the same transaction once both sides are gone.
 * Side-effects: none (interface only)
 * Links: adapters/server/messaging/drizzle-message.adapter.ts
 * @public
 */

import type { Message, NewMessage } from "@/core";

export type { Message, NewMessage } from "@/core";

export interface MessageRepository {
  create(message: NewMessage): Promise<Message>;

  findById(messageId: string): Promise<Message | null>;

  markRead(messageId: string): Promise<void>;

  /** Unread, not recipient-deleted, addressed to recipientId. */
  countUnread(recipientId: string): Promise<number>;

  /** Not recipient-deleted; unread first, then newest first. */
  listReceived(recipientId: string): Promise<Message[]>;

  /** Not sender-deleted; newest first. */
  listSent(senderId: string): Promise<Message[]>;

  /**
   * Mark the given sides deleted.
   * @returns "purged" when the row was removed
   */
  markDeleted(
    messageId: string,
    sides: { sender: boolean; recipient: boolean }
  ): Promise<"updated" | "purged">;
}
