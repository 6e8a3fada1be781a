// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/messaging/services/messaging`
 * Purpose: Direct messages between users (and from guests) with per-recipient unread counts.
 * Scope: Send, read, list, delete. Does not notify or stream.
 * Invariants:
 * - Unread count is always recomputed by the repository, never tracked here.
 * - Non-participants and callers who deleted their side see NotFound; a sender calling markRead sees Forbidden.
 * - Only the recipient flips the read flag.
 * Side-effects: IO (via ports)
 * Links: core/messaging/rules.ts, ports/message.port.ts
 * @public
 */

import type { Message } from "@/core";
import {
  FieldValidationError,
  ForbiddenError,
  isValidEmailFormat,
  MESSAGE_BODY_MAX_LENGTH,
  MESSAGE_SUBJECT_MAX_LENGTH,
  isParticipant,
  NotFoundError,
  normalizeEmail,
  participation,
} from "@/core";
import type { MessageRepository, UserRepository } from "@/ports";

export interface MessagingDeps {
  users: UserRepository;
  messages: MessageRepository;
}

export interface MessageContent {
  subject: string;
  body: string;
}

export interface Inbox {
  messages: Message[];
  unreadCount: number;
}

function cleanContent(input: MessageContent): MessageContent {
  const subject = input.subject.trim();
  const body = input.body.trim();
  const errors: Record<string, string[]> = {};

  if (subject.length === 0 || subject.length > MESSAGE_SUBJECT_MAX_LENGTH) {
    errors.subject = [
      `Subject must be between 1 and ${MESSAGE_SUBJECT_MAX_LENGTH} characters.`,
    ];
  }
  if (body.length === 0 || body.length > MESSAGE_BODY_MAX_LENGTH) {
    errors.body = [
      `Message must be between 1 and ${MESSAGE_BODY_MAX_LENGTH} characters.`,
    ];
  }
  if (Object.keys(errors).length > 0) {
    throw new FieldValidationError(errors);
  }
  return { subject, body };
}

async function requireActiveRecipient(
  deps: MessagingDeps,
  recipientId: string
): Promise<void> {
  const recipient = await deps.users.findById(recipientId);
  if (!recipient || !recipient.isActive) {
    throw new NotFoundError("user", recipientId);
  }
}

export async function send(
  deps: MessagingDeps,
  senderId: string,
  input: MessageContent & { recipientId: string }
): Promise<Message> {
  const content = cleanContent(input);

  const sender = await deps.users.findById(senderId);
  if (!sender || !sender.isActive) {
    throw new NotFoundError("user", senderId);
  }
  await requireActiveRecipient(deps, input.recipientId);

  return deps.messages.create({
    senderId: sender.id,
    senderName: sender.username,
    senderEmail: sender.email,
    recipientId: input.recipientId,
    ...content,
  });
}

export async function sendAsGuest(
  deps: MessagingDeps,
  recipientId: string,
  input: MessageContent & { name: string; email: string }
): Promise<Message> {
  const content = cleanContent(input);
  const name = input.name.trim();
  const email = normalizeEmail(input.email);

  const errors: Record<string, string[]> = {};
  if (name.length === 0 || name.length > 200) {
    errors.name = ["Name must be between 1 and 200 characters."];
  }
  if (!isValidEmailFormat(email)) {
    errors.email = ["Enter a valid email address."];
  }
  if (Object.keys(errors).length > 0) {
    throw new FieldValidationError(errors);
  }

  await requireActiveRecipient(deps, recipientId);

  return deps.messages.create({
    senderId: null,
    senderName: name,
    senderEmail: email,
    recipientId,
    ...content,
  });
}

export async function unreadCount(
  deps: Pick<MessagingDeps, "messages">,
  userId: string
): Promise<number> {
  return Math.max(0, await deps.messages.countUnread(userId));
}

export async function markRead(
  deps: Pick<MessagingDeps, "messages">,
  messageId: string,
  readerId: string
): Promise<Message> {
  const message = await deps.messages.findById(messageId);
  if (!message) {
    throw new NotFoundError("message", messageId);
  }

  const side = participation(message, readerId);
  if (!side.asRecipient) {
    if (side.asSender) {
      throw new ForbiddenError("mark message read");
    }
    throw new NotFoundError("message", messageId);
  }

  if (!message.isRead) {
    await deps.messages.markRead(messageId);
  }
  return { ...message, isRead: true };
}

export async function openMessage(
  deps: Pick<MessagingDeps, "messages">,
  messageId: string,
  readerId: string
): Promise<Message> {
  const message = await deps.messages.findById(messageId);
  if (!message) {
    throw new NotFoundError("message", messageId);
  }

  const side = participation(message, readerId);
  if (!isParticipant(side)) {
    throw new NotFoundError("message", messageId);
  }

  if (side.asRecipient && !message.isRead) {
    await deps.messages.markRead(messageId);
    return { ...message, isRead: true };
  }
  return message;
}

export async function inbox(
  deps: Pick<MessagingDeps, "messages">,
  userId: string
): Promise<Inbox> {
  const [messages, count] = await Promise.all([
    deps.messages.listReceived(userId),
    unreadCount(deps, userId),
  ]);
  return { messages, unreadCount: count };
}

export async function sent(
  deps: Pick<MessagingDeps, "messages">,
  userId: string
): Promise<Message[]> {
  return deps.messages.listSent(userId);
}

export async function deleteMessage(
  deps: Pick<MessagingDeps, "messages">,
  messageId: string,
  userId: string
): Promise<"updated" | "purged"> {
  const message = await deps.messages.findById(messageId);
  if (!message) {
    throw new NotFoundError("message", messageId);
  }

  const side = participation(message, userId);
  if (!isParticipant(side)) {
    throw new NotFoundError("message", messageId);
  }

  return deps.messages.markDeleted(messageId, {
    sender: side.asSender,
    recipient: side.asRecipient,
  });
}
