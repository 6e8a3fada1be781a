// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports/mailer.port`
 * Purpose: Outbound transactional mail.
 * Scope: Fire a single message. Does not template or queue.
 * Invariants: Failures surface as MailDeliveryPortError.
 * Side-effects: none (interface only)
 * Links: adapters/server/mail/smtp-mailer.adapter.ts, adapters/test/mail/fake-mailer.adapter.ts
 * @public
 */

export interface MailMessage {
  to: string;
  subject: string;
  text: string;
  html?: string;
}

export class MailDeliveryPortError extends Error {
  constructor(
    public readonly recipient: string,
    cause: unknown
  ) {
    super(`Mail delivery to ${recipient} failed`, { cause });
    this.name = "MailDeliveryPortError";
  }
}

export function isMailDeliveryPortError(
  error: unknown
): error is MailDeliveryPortError {
  return error instanceof Error && error.name === "MailDeliveryPortError";
}

export interface Mailer {
  send(message: MailMessage): Promise<void>;
}
