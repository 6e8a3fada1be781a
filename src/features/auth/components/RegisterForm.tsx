// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/auth/components/RegisterForm`
 * Purpose: Signup form posting to the JSON API and showing per-field errors.
 * Scope: Client component. Keeps submitted values after a failed attempt. Does not log the user in.
 * Invariants: Password confirmation is checked client-side only; the server applies the password policy.
 * Side-effects: IO (fetch)
 * Links: app/api/v1/auth/signup
 * @public
 */

"use client";

import Link from "next/link";
import { type FormEvent, type ReactElement, useState } from "react";

import { FormError, FormField, useApiForm } from "@/components";

export function RegisterForm(): ReactElement {
  const [values, setValues] = useState({
    username: "",
    email: "",
    firstName: "",
    lastName: "",
    password: "",
    confirmPassword: "",
  });
  const [mismatch, setMismatch] = useState(false);
  const [registered, setRegistered] = useState(false);

  const { state, submit } = useApiForm({
    url: "/api/v1/auth/signup",
    onSuccess: () => setRegistered(true),
  });

  const set = (key: keyof typeof values) => (value: string) =>
    setValues((prev) => ({ ...prev, [key]: value }));

  function onSubmit(event: FormEvent<HTMLFormElement>): void {
    event.preventDefault();
    if (values.password !== values.confirmPassword) {
      setMismatch(true);
      return;
    }
    setMismatch(false);
    const { confirmPassword: _confirm, ...body } = values;
    void submit(body);
  }

  if (registered) {
    return (
      <p>
        Account created. Check {values.email} for a verification link, then{" "}
        <Link href="/login">log in</Link>.
      </p>
    );
  }

  return (
    <form onSubmit={onSubmit} noValidate>
      <FormError message={state.error} />
      <FormField
        name="username"
        label="Username"
        value={values.username}
        onChange={set("username")}
        errors={state.fieldErrors.username}
        autoComplete="username"
        required
      />
      <FormField
        name="email"
        label="Email"
        type="email"
        value={values.email}
        onChange={set("email")}
        errors={state.fieldErrors.email}
        autoComplete="email"
        required
      />
      <FormField
        name="firstName"
        label="First name"
        value={values.firstName}
        onChange={set("firstName")}
        errors={state.fieldErrors.firstName}
      />
      <FormField
        name="lastName"
        label="Last name"
        value={values.lastName}
        onChange={set("lastName")}
        errors={state.fieldErrors.lastName}
      />
      <FormField
        name="password"
        label="Password"
        type="password"
        value={values.password}
        onChange={set("password")}
        errors={state.fieldErrors.password}
        autoComplete="new-password"
        required
      />
      <FormField
        name="confirmPassword"
        label="Confirm password"
        type="password"
        value={values.confirmPassword}
        onChange={set("confirmPassword")}
        errors={mismatch ? ["Passwords do not match."] : undefined}
        autoComplete="new-password"
        required
      />
      <button type="submit" disabled={state.pending}>
        Sign up
      </button>
    </form>
  );
}
