// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/messaging/components/MessageForm`
 * Purpose: Send a direct message from a developer profile.
 * Scope: Client component. Signed-in senders post to /messages; guests also give a name and reply address and post to /messages/guest.
 * Invariants: Values are kept after a failed attempt and cleared after a successful one.
 * Side-effects: IO (fetch)
 * Links: app/api/v1/messages, app/api/v1/messages/guest
 * @public
 */

"use client";

import { type FormEvent, type ReactElement, useState } from "react";

import { FormError, FormField, useApiForm } from "@/components";

const EMPTY = { name: "", email: "", subject: "", body: "" };

export function MessageForm({
  recipientId,
  signedIn,
}: {
  recipientId: string;
  signedIn: boolean;
}): ReactElement {
  const [values, setValues] = useState(EMPTY);
  const [sent, setSent] = useState(false);

  const { state, submit } = useApiForm({
    url: signedIn ? "/api/v1/messages" : "/api/v1/messages/guest",
    onSuccess: () => {
      setValues(EMPTY);
      setSent(true);
    },
  });

  const set = (key: keyof typeof EMPTY) => (value: string) => {
    setSent(false);
    setValues((prev) => ({ ...prev, [key]: value }));
  };

  function onSubmit(event: FormEvent<HTMLFormElement>): void {
    event.preventDefault();
    const content = { recipientId, subject: values.subject, body: values.body };
    void submit(
      signedIn ? content : { ...content, name: values.name, email: values.email }
    );
  }

  return (
    <form onSubmit={onSubmit} noValidate>
      <h2>Send a message</h2>
      {sent && <p role="status">Your message was sent.</p>}
      <FormError message={state.error} />
      {!signedIn && (
        <>
          <FormField
            name="name"
            label="Your name"
            value={values.name}
            onChange={set("name")}
            errors={state.fieldErrors.name}
            required
          />
          <FormField
            name="email"
            label="Your email"
            type="email"
            value={values.email}
            onChange={set("email")}
            errors={state.fieldErrors.email}
            required
          />
        </>
      )}
      <FormField
        name="subject"
        label="Subject"
        value={values.subject}
        onChange={set("subject")}
        errors={state.fieldErrors.subject}
        required
      />
      <FormField
        name="body"
        label="Message"
        multiline
        value={values.body}
        onChange={set("body")}
        errors={state.fieldErrors.body}
        required
      />
      <button type="submit" disabled={state.pending}>
        Send
      </button>
    </form>
  );
}
