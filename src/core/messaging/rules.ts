// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/messaging/rules`
 * Purpose: Pure messaging rules: participation, inbox ordering, purge condition, unread derivation.
 * Scope: Computation only. Does not touch storage.
 * Invariants:
 * - A deleted side no longer participates.
 * - Guest-sent messages have no sender side.
 * - Inbox order: unread first, then newest first.
 * Side-effects: none
 * Links: features/messaging/services
 * @public
 */

import type { Message, MessageParticipation } from "./model";

export const MESSAGE_SUBJECT_MAX_LENGTH = 200;
export const MESSAGE_BODY_MAX_LENGTH = 10_000;

export function participation(
  message: Pick<
    Message,
    "senderId" | "recipientId" | "deletedBySender" | "deletedByRecipient"
  >,
  userId: string
): MessageParticipation {
  return {
    asSender: message.senderId === userId && !message.deletedBySender,
    asRecipient: message.recipientId === userId && !message.deletedByRecipient,
  };
}

export function isParticipant(p: MessageParticipation): boolean {
  return p.asSender || p.asRecipient;
}

/** Row may be removed once neither side remains. Guest messages have no sender side. */
export function isPurgeable(
  message: Pick<Message, "senderId" | "deletedBySender" | "deletedByRecipient">
): boolean {
  const senderGone = message.senderId === null || message.deletedBySender;
  return senderGone && message.deletedByRecipient;
}

export function compareInbox(
  a: Pick<Message, "isRead" | "createdAt" | "id">,
  b: Pick<Message, "isRead" | "createdAt" | "id">
): number {
  if (a.isRead !== b.isRead) return a.isRead ? 1 : -1;
  const byTime = b.createdAt.getTime() - a.createdAt.getTime();
  if (byTime !== 0) return byTime;
  return a.id < b.id ? 1 : a.id > b.id ? -1 : 0;
}

/** Reference definition of the unread count over a message set. */
export function countUnread(
  messages: readonly Pick<
    Message,
    "recipientId" | "isRead" | "deletedByRecipient"
  >[],
  recipientId: string
): number {
  return messages.filter(
    (m) => m.recipientId === recipientId && !m.isRead && !m.deletedByRecipient
  ).length;
}
