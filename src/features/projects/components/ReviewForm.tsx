// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/projects/components/ReviewForm`
 * Purpose: Up/down vote with an optional comment on a project page.
 * Scope: Client component. Refreshes the page on success so totals and the review list re-render from the server.
 * Invariants: The vote value is one of "up" | "down".
 * Side-effects: IO (fetch, router refresh)
 * Links: app/api/v1/projects/[projectId]/reviews
 * @public
 */

"use client";

import { useRouter } from "next/navigation";
import { type FormEvent, type ReactElement, useState } from "react";

import { FormError, FormField, useApiForm } from "@/components";

type Vote = "up" | "down";

export function ReviewForm({ projectId }: { projectId: string }): ReactElement {
  const router = useRouter();
  const [value, setValue] = useState<Vote>("up");
  const [body, setBody] = useState("");

  const { state, submit } = useApiForm({
    url: `/api/v1/projects/${projectId}/reviews`,
    onSuccess: () => {
      setBody("");
      router.refresh();
    },
  });

  function onSubmit(event: FormEvent<HTMLFormElement>): void {
    event.preventDefault();
    void submit({ value, body: body.trim() === "" ? null : body });
  }

  return (
    <form onSubmit={onSubmit} noValidate>
      <h2>Leave a review</h2>
      <FormError message={state.error} />
      <fieldset>
        <legend>Vote</legend>
        {(["up", "down"] as const).map((option) => (
          <label key={option}>
            <input
              type="radio"
              name="value"
              value={option}
              checked={value === option}
              onChange={() => setValue(option)}
            />
            {option === "up" ? "Up" : "Down"}
          </label>
        ))}
      </fieldset>
      <FormField
        name="body"
        label="Comment"
        multiline
        value={body}
        onChange={setBody}
        errors={state.fieldErrors.body}
      />
      <button type="submit" disabled={state.pending}>
        Submit review
      </button>
    </form>
  );
}
