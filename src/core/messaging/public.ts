// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/messaging/public`
 * Purpose: Public API for the messaging domain.
 * Scope: Barrel export. Does not expose internal implementation details.
 * Invariants: Only exports stable public interfaces and functions.
 * Side-effects: none (re-exports only)
 * Links: Imported via @/core
 * @public
 */

export type { Message, MessageParticipation, NewMessage } from "./model";
export {
  compareInbox,
  countUnread,
  isParticipant,
  isPurgeable,
  MESSAGE_BODY_MAX_LENGTH,
  MESSAGE_SUBJECT_MAX_LENGTH,
  participation,
} from "./rules";
