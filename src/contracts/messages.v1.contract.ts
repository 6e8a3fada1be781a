// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@contracts/messages.v1.contract`
 * Purpose: Contracts for direct messages between users and from guests.
 * Scope: Wire shapes for /api/v1/messages/**. Does not contain business logic.
 * Invariants:
 *   - Only the sender and recipient can see a message; anyone else gets 404
 *   - Inbox lists unread first, then newest first
 *   - Opening a message as its recipient marks it read
 *   - Delete hides the message for the caller only; it is purged once both sides deleted it
 * Side-effects: none
 * Links: /api/v1/messages routes, features/messaging/services/messaging
 * @internal
 */

import { z } from "zod";

import { IdSchema } from "./common.v1.contract";

export const MessageSchema = z.object({
  id: IdSchema,
  senderId: IdSchema.nullable(),
  senderName: z.string(),
  senderEmail: z.string(),
  recipientId: IdSchema,
  subject: z.string(),
  body: z.string(),
  isRead: z.boolean(),
  createdAt: z.string().datetime(),
});

const MessageContentSchema = z.object({
  recipientId: IdSchema,
  subject: z.string(),
  body: z.string(),
});

export const messagesInboxOperation = {
  id: "messages.inbox.v1",
  summary: "List received messages",
  description: "Returns the caller's inbox with the unread count.",
  input: z.object({}),
  output: z.object({
    messages: z.array(MessageSchema),
    unreadCount: z.number().int().min(0),
  }),
} as const;

export const messagesSentOperation = {
  id: "messages.sent.v1",
  summary: "List sent messages",
  description: "Messages the caller sent and has not deleted, newest first.",
  input: z.object({}),
  output: z.object({ messages: z.array(MessageSchema) }),
} as const;

export const messagesUnreadCountOperation = {
  id: "messages.unread-count.v1",
  summary: "Count unread messages",
  description: "Number of unread, undeleted messages addressed to the caller.",
  input: z.object({}),
  output: z.object({ unreadCount: z.number().int().min(0) }),
} as const;

export const messagesSendOperation = {
  id: "messages.send.v1",
  summary: "Message a developer",
  description:
    "Sends a message from the session user; sender name and email come from the account.",
  input: MessageContentSchema,
  output: MessageSchema,
} as const;

export const messagesGuestSendOperation = {
  id: "messages.guest-send.v1",
  summary: "Message a developer without an account",
  description: "Guest sender supplies a name and reply address.",
  input: MessageContentSchema.extend({
    name: z.string(),
    email: z.string(),
  }),
  output: MessageSchema,
} as const;

export const messagesGetOperation = {
  id: "messages.get.v1",
  summary: "Open a message",
  description: "Returns the message; as recipient, marks it read.",
  input: z.object({ messageId: IdSchema }),
  output: MessageSchema,
} as const;

export const messagesMarkReadOperation = {
  id: "messages.mark-read.v1",
  summary: "Mark a message read",
  description: "Recipient only. Idempotent.",
  input: z.object({}),
  output: MessageSchema,
} as const;

export const messagesDeleteOperation = {
  id: "messages.delete.v1",
  summary: "Delete a message for the caller",
  description:
    "Hides the message from the caller's lists; the row is purged when both participants deleted it.",
  input: z.object({}),
  output: z.object({}), // 204 No Content
} as const;

export type MessageDto = z.infer<typeof MessageSchema>;
export type MessagesInboxOutput = z.infer<typeof messagesInboxOperation.output>;
export type MessagesSendInput = z.infer<typeof messagesSendOperation.input>;
export type MessagesGuestSendInput = z.infer<
  typeof messagesGuestSendOperation.input
>;
