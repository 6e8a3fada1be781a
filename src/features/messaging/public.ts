// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/messaging/public`
 * Purpose: Single entrypoint for the messaging feature.
 * Scope: Re-exports message operations.
 * Side-effects: none
 * Links: Used by src/app/_facades/messaging
 * @public
 */

export {
  deleteMessage,
  type Inbox,
  inbox,
  markRead,
  type MessageContent,
  type MessagingDeps,
  openMessage,
  send,
  sendAsGuest,
  sent,
  unreadCount,
} from "./services/messaging";
