// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability/events`
 * Purpose: Event name registry for structured logging - prevents ad-hoc strings and schema drift.
 * Scope: Define valid event names as const registry. Does not define full payload schemas.
 * Invariants: All event names registered here; logEvent() enforces base fields (reqId always).
 * Side-effects: none
 * Links: Used by logEvent(); consumed by facades.
 * @public
 */

export const EVENT_NAMES = {
  // Auth
  AUTH_SIGNUP_SUCCESS: "auth.signup_success",
  AUTH_LOGIN_SUCCESS: "auth.login_success",
  AUTH_LOGIN_FAILED: "auth.login_failed",
  AUTH_TOKEN_REFRESHED: "auth.token_refreshed",
  AUTH_EMAIL_VERIFICATION_SENT: "auth.email_verification_sent",
  AUTH_EMAIL_VERIFIED: "auth.email_verified",
  AUTH_PASSWORD_RESET_REQUESTED: "auth.password_reset_requested",
  AUTH_PASSWORD_RESET: "auth.password_reset",
  AUTH_PASSWORD_CHANGED: "auth.password_changed",

  // Profiles
  PROFILES_UPDATED: "profiles.updated",
  PROFILES_IMAGE_UPDATED: "profiles.image_updated",
  PROFILES_DEACTIVATED: "profiles.deactivated",
  PROFILES_SKILL_CHANGED: "profiles.skill_changed",

  // Projects
  PROJECTS_CREATED: "projects.created",
  PROJECTS_UPDATED: "projects.updated",
  PROJECTS_DELETED: "projects.deleted",
  PROJECTS_TAG_CHANGED: "projects.tag_changed",
  PROJECTS_REVIEW_CREATED: "projects.review_created",
  PROJECTS_REVIEW_CHANGED: "projects.review_changed",

  // Messaging
  MESSAGES_SENT: "messages.sent",
  MESSAGES_READ: "messages.read",
  MESSAGES_DELETED: "messages.deleted",

  // Search
  SEARCH_EXECUTED: "search.executed",

  // Adapter Events
  ADAPTER_MAILER_SENT: "adapter.mailer.sent",
  ADAPTER_MAILER_SKIPPED: "adapter.mailer.skipped",
  ADAPTER_IMAGE_STORE_REMOVE_FAILED: "adapter.image_store.remove_failed",

  // Test Events
  TEST_EVENT: "TEST_EVENT",
} as const;

export type EventName = (typeof EVENT_NAMES)[keyof typeof EVENT_NAMES];

/**
 * Required base fields for all events.
 * reqId is ALWAYS required; routeId required for HTTP request events.
 */
export interface EventBase {
  reqId: string;
  routeId?: string;
}
