// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/auth/components/PasswordResetForm`
 * Purpose: Forgotten-password request form, and the new-password form reached from a reset link.
 * Scope: Client component. With `uid` and `token` it sets a new password; without them it requests a link. Does not log the user in.
 * Invariants: The request form shows the same confirmation whether or not the address is known.
 * Side-effects: IO (fetch)
 * Links: app/api/v1/auth/password/forgot, app/api/v1/auth/password/reset
 * @public
 */

"use client";

import Link from "next/link";
import { type FormEvent, type ReactElement, useState } from "react";

import { FormError, FormField, useApiForm } from "@/components";

function RequestLinkForm(): ReactElement {
  const [email, setEmail] = useState("");
  const [requested, setRequested] = useState(false);
  const { state, submit } = useApiForm({
    url: "/api/v1/auth/password/forgot",
    onSuccess: () => setRequested(true),
  });

  function onSubmit(event: FormEvent<HTMLFormElement>): void {
    event.preventDefault();
    void submit({ email });
  }

  if (requested) {
    return <p>If that address belongs to an account, a reset link is on its way.</p>;
  }

  return (
    <form onSubmit={onSubmit} noValidate>
      <FormError message={state.error} />
      <FormField
        name="email"
        label="Email"
        type="email"
        value={email}
        onChange={setEmail}
        errors={state.fieldErrors.email}
        autoComplete="email"
        required
      />
      <button type="submit" disabled={state.pending}>
        Send reset link
      </button>
    </form>
  );
}

function NewPasswordForm({
  uid,
  token,
}: {
  uid: string;
  token: string;
}): ReactElement {
  const [newPassword, setNewPassword] = useState("");
  const [done, setDone] = useState(false);
  const { state, submit } = useApiForm({
    url: "/api/v1/auth/password/reset",
    onSuccess: () => setDone(true),
  });

  function onSubmit(event: FormEvent<HTMLFormElement>): void {
    event.preventDefault();
    void submit({ uid, token, newPassword });
  }

  if (done) {
    return (
      <p>
        Password updated. You can now <Link href="/login">log in</Link>.
      </p>
    );
  }

  return (
    <form onSubmit={onSubmit} noValidate>
      <FormError message={state.error} />
      <FormField
        name="newPassword"
        label="New password"
        type="password"
        value={newPassword}
        onChange={setNewPassword}
        errors={state.fieldErrors.newPassword}
        autoComplete="new-password"
        required
      />
      <button type="submit" disabled={state.pending}>
        Set password
      </button>
    </form>
  );
}

export function PasswordResetForm({
  uid,
  token,
}: {
  uid?: string | undefined;
  token?: string | undefined;
}): ReactElement {
  return uid && token ? (
    <NewPasswordForm uid={uid} token={token} />
  ) : (
    <RequestLinkForm />
  );
}
