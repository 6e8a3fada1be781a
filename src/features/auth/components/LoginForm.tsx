// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/auth/components/LoginForm`
 * Purpose: Username-or-email login form posting to the JSON API.
 * Scope: Client component. Keeps typed values after a failed attempt; navigates to `next` on success. Does not store tokens; the API sets the session cookie.
 * Invariants: Only same-origin relative paths are honoured for `next`.
 * Side-effects: IO (fetch, navigation)
 * Links: app/api/v1/auth/login
 * @public
 */

"use client";

import Link from "next/link";
import { useRouter } from "next/navigation";
import { type FormEvent, type ReactElement, useState } from "react";

import { FormError, FormField, useApiForm } from "@/components";

export function safeNextPath(next: string | null | undefined): string {
  if (!next || !next.startsWith("/") || next.startsWith("//")) return "/";
  return next;
}

export function LoginForm({ next }: { next?: string | undefined }): ReactElement {
  const router = useRouter();
  const [usernameOrEmail, setUsernameOrEmail] = useState("");
  const [password, setPassword] = useState("");

  const { state, submit } = useApiForm({
    url: "/api/v1/auth/login",
    onSuccess: () => {
      router.push(safeNextPath(next));
      router.refresh();
    },
  });

  function onSubmit(event: FormEvent<HTMLFormElement>): void {
    event.preventDefault();
    void submit({ usernameOrEmail, password });
  }

  return (
    <form onSubmit={onSubmit} noValidate>
      <FormError message={state.error} />
      <FormField
        name="usernameOrEmail"
        label="Username or email"
        value={usernameOrEmail}
        onChange={setUsernameOrEmail}
        errors={state.fieldErrors.usernameOrEmail}
        autoComplete="username"
        required
      />
      <FormField
        name="password"
        label="Password"
        type="password"
        value={password}
        onChange={setPassword}
        errors={state.fieldErrors.password}
        autoComplete="current-password"
        required
      />
      <button type="submit" disabled={state.pending}>
        Log in
      </button>
      <p>
        <Link href="/reset-password">Forgot password?</Link> ·{" "}
        <Link href="/register">Create an account</Link>
      </p>
    </form>
  );
}
