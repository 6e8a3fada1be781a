// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@app/_facades/messaging/messages.server`
 * Purpose: App-layer wiring for direct messages: inbox, sent, unread count, send, guest send, open, mark read and delete.
 * Scope: Server-only facade. Maps Date to ISO strings and drops the per-side deletion flags from DTOs. Does not perform HTTP handling.
 * Invariants: Message bodies, subjects and guest addresses are never logged.
 * Side-effects: IO (via UserRepository, MessageRepository ports), metrics
 * Links: features/messaging/services/messaging, contracts/messages.v1.contract
 * @public
 */

import { getContainer } from "@/bootstrap/container";
import type {
  MessageDto,
  MessagesGuestSendInput,
  MessagesInboxOutput,
  MessagesSendInput,
} from "@/contracts/messages.v1.contract";
import type { Message } from "@/core";
import {
  deleteMessage,
  inbox,
  markRead,
  openMessage,
  send,
  sendAsGuest,
  sent,
  unreadCount,
} from "@/features/messaging/public";
import type { SessionUser } from "@/shared/auth";
import {
  EVENT_NAMES,
  logEvent,
  messagesSentTotal,
  type RequestContext,
} from "@/shared/observability";

export function toMessageDto(message: Message): MessageDto {
  return {
    id: message.id,
    senderId: message.senderId,
    senderName: message.senderName,
    senderEmail: message.senderEmail,
    recipientId: message.recipientId,
    subject: message.subject,
    body: message.body,
    isRead: message.isRead,
    createdAt: message.createdAt.toISOString(),
  };
}

export async function inboxFacade(params: {
  sessionUser: SessionUser;
}): Promise<MessagesInboxOutput> {
  const result = await inbox(getContainer(), params.sessionUser.id);
  return {
    messages: result.messages.map(toMessageDto),
    unreadCount: result.unreadCount,
  };
}

export async function sentFacade(params: {
  sessionUser: SessionUser;
}): Promise<MessageDto[]> {
  const messages = await sent(getContainer(), params.sessionUser.id);
  return messages.map(toMessageDto);
}

export async function unreadCountFacade(params: {
  sessionUser: SessionUser;
}): Promise<number> {
  return unreadCount(getContainer(), params.sessionUser.id);
}

export async function sendMessageFacade(
  params: { sessionUser: SessionUser; input: MessagesSendInput },
  ctx: RequestContext
): Promise<MessageDto> {
  const message = await send(
    getContainer(),
    params.sessionUser.id,
    params.input
  );

  messagesSentTotal.inc({ sender: "user" });
  logEvent(ctx.log, EVENT_NAMES.MESSAGES_SENT, {
    reqId: ctx.reqId,
    routeId: ctx.routeId,
    messageId: message.id,
    senderId: message.senderId,
    recipientId: message.recipientId,
  });
  return toMessageDto(message);
}

export async function sendGuestMessageFacade(
  input: MessagesGuestSendInput,
  ctx: RequestContext
): Promise<MessageDto> {
  const message = await sendAsGuest(getContainer(), input.recipientId, input);

  messagesSentTotal.inc({ sender: "guest" });
  logEvent(ctx.log, EVENT_NAMES.MESSAGES_SENT, {
    reqId: ctx.reqId,
    routeId: ctx.routeId,
    messageId: message.id,
    senderId: null,
    recipientId: message.recipientId,
  });
  return toMessageDto(message);
}

export async function openMessageFacade(params: {
  sessionUser: SessionUser;
  messageId: string;
}): Promise<MessageDto> {
  const message = await openMessage(
    getContainer(),
    params.messageId,
    params.sessionUser.id
  );
  return toMessageDto(message);
}

export async function markReadFacade(
  params: { sessionUser: SessionUser; messageId: string },
  ctx: RequestContext
): Promise<MessageDto> {
  const message = await markRead(
    getContainer(),
    params.messageId,
    params.sessionUser.id
  );

  logEvent(ctx.log, EVENT_NAMES.MESSAGES_READ, {
    reqId: ctx.reqId,
    routeId: ctx.routeId,
    messageId: message.id,
  });
  return toMessageDto(message);
}

export async function deleteMessageFacade(
  params: { sessionUser: SessionUser; messageId: string },
  ctx: RequestContext
): Promise<void> {
  const outcome = await deleteMessage(
    getContainer(),
    params.messageId,
    params.sessionUser.id
  );

  logEvent(ctx.log, EVENT_NAMES.MESSAGES_DELETED, {
    reqId: ctx.reqId,
    routeId: ctx.routeId,
    messageId: params.messageId,
    outcome,
  });
}
