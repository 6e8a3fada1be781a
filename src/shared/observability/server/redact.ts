// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability/server/redact`
 * Purpose: Redaction paths for sensitive data in logs.
 * Scope: Define paths to redact from log output. Does not implement redaction logic.
 * Invariants: Only redact known secret-bearing keys (not generic "url").
 * Side-effects: none
 * Links: Imported by logger module.
 * @public
 */

export const REDACT_PATHS = [
  // Credentials
  "password",
  "currentPassword",
  "newPassword",
  "passwordHash",
  "*.password",
  "*.passwordHash",
  // Tokens
  "token",
  "rawToken",
  "accessToken",
  "refreshToken",
  "*.token",
  "*.accessToken",
  "*.refreshToken",
  "secret",
  "AUTH_SECRET",
  "SMTP_PASSWORD",
  // HTTP headers
  "req.headers.authorization",
  "req.headers.cookie",
  "res.headers.set-cookie",
  "headers.authorization",
  "headers.cookie",
];
