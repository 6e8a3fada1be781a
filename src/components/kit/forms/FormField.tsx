// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@components/kit/forms/FormField`
 * Purpose: Labelled input or textarea with its per-field error list.
 * Scope: Presentational. Does not validate or submit.
 * Invariants: Errors render in order under the control, linked with aria-describedby.
 * Side-effects: none
 * @public
 */

import type { ReactElement } from "react";

export interface FormFieldProps {
  name: string;
  label: string;
  value: string;
  onChange: (value: string) => void;
  errors?: readonly string[] | undefined;
  type?: "text" | "email" | "password" | "url";
  multiline?: boolean;
  required?: boolean;
  autoComplete?: string;
}

export function FormField({
  name,
  label,
  value,
  onChange,
  errors,
  type = "text",
  multiline = false,
  required = false,
  autoComplete,
}: FormFieldProps): ReactElement {
  const errorId = `${name}-errors`;
  const messages = errors ?? [];
  const hasErrors = messages.length > 0;
  const shared = {
    id: name,
    name,
    value,
    required,
    "aria-invalid": hasErrors,
    "aria-describedby": hasErrors ? errorId : undefined,
  };

  return (
    <div className="form-field">
      <label htmlFor={name}>{label}</label>
      {multiline ? (
        <textarea {...shared} onChange={(e) => onChange(e.target.value)} />
      ) : (
        <input
          {...shared}
          type={type}
          autoComplete={autoComplete}
          onChange={(e) => onChange(e.target.value)}
        />
      )}
      {hasErrors && (
        <ul id={errorId} className="form-field-errors">
          {messages.map((message) => (
            <li key={message}>{message}</li>
          ))}
        </ul>
      )}
    </div>
  );
}
