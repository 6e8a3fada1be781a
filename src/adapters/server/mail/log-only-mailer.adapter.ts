// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/mail/log-only-mailer`
 * Purpose: Mailer used when SMTP_HOST is unset; records the skip instead of delivering.
 * Scope: Local development without an SMTP relay.
 * Side-effects: IO (log line)
 * Links: ports/mailer.port.ts, bootstrap/container.ts
 * @public
 */

import type { MailMessage, Mailer } from "@/ports";
import { EVENT_NAMES, makeLogger } from "@/shared/observability";

const logger = makeLogger({ component: "LogOnlyMailer" });

export class LogOnlyMailer implements Mailer {
  async send(message: MailMessage): Promise<void> {
    logger.warn(
      {
        event: EVENT_NAMES.ADAPTER_MAILER_SKIPPED,
        reasonCode: "smtp_not_configured",
        subject: message.subject,
      },
      EVENT_NAMES.ADAPTER_MAILER_SKIPPED
    );
  }
}
