// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/mail/smtp-mailer`
 * Purpose: Mailer backed by a nodemailer SMTP transport.
 * Scope: Delivers a single message. Does not render templates or retry.
 * Invariants: Transport failures surface as MailDeliveryPortError; message bodies are never logged.
 * Side-effects: IO (SMTP)
 * Links: ports/mailer.port.ts
 * @public
 */

import nodemailer, { type Transporter } from "nodemailer";

import type { MailMessage, Mailer } from "@/ports";
import { MailDeliveryPortError } from "@/ports";
import { EVENT_NAMES, makeLogger } from "@/shared/observability";

const logger = makeLogger({ component: "SmtpMailer" });

export interface SmtpMailerConfig {
  host: string;
  port: number;
  secure: boolean;
  user?: string | undefined;
  password?: string | undefined;
  from: string;
}

export class SmtpMailer implements Mailer {
  private readonly transport: Transporter;

  constructor(
    private readonly config: SmtpMailerConfig,
    transport?: Transporter
  ) {
    this.transport =
      transport ??
      nodemailer.createTransport({
        host: config.host,
        port: config.port,
        secure: config.secure,
        ...(config.user
          ? { auth: { user: config.user, pass: config.password ?? "" } }
          : {}),
      });
  }

  async send(message: MailMessage): Promise<void> {
    try {
      await this.transport.sendMail({
        from: this.config.from,
        to: message.to,
        subject: message.subject,
        text: message.text,
        ...(message.html !== undefined && { html: message.html }),
      });
    } catch (error) {
      throw new MailDeliveryPortError(message.to, error);
    }

    logger.info(
      { event: EVENT_NAMES.ADAPTER_MAILER_SENT, subject: message.subject },
      EVENT_NAMES.ADAPTER_MAILER_SENT
    );
  }
}
