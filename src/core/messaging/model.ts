// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/messaging/model`
 * Purpose: Direct message entity.
 * Scope: Pure types. Does not contain persistence.
 * Invariants: senderId null means a guest sender; unread count is derived, never stored.
 * Side-effects: none
 * Links: ports/message.port.ts
 * @public
 */

export interface Message {
  id: string;
  senderId: string | null;
  senderName: string;
  senderEmail: string;
  recipientId: string;
  subject: string;
  body: string;
  isRead: boolean;
  deletedBySender: boolean;
  deletedByRecipient: boolean;
  createdAt: Date;
}

export interface NewMessage {
  senderId: string | null;
  senderName: string;
  senderEmail: string;
  recipientId: string;
  subject: string;
  body: string;
}

/** Which live sides of a message a given user holds. */
export interface MessageParticipation {
  asSender: boolean;
  asRecipient: boolean;
}
