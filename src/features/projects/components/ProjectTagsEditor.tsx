// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/projects/components/ProjectTagsEditor`
 * Purpose: Adds and removes tags on a project the session user owns.
 * Scope: Client component over the project tag endpoints; the server normalizes names and drops orphaned tags.
 * Invariants: The tag list re-renders from the server after every change.
 * Side-effects: IO (fetch, router refresh)
 * Links: app/api/v1/projects/[projectId]/tags
 * @public
 */

"use client";

import { useRouter } from "next/navigation";
import { type FormEvent, type ReactElement, useState } from "react";

import { FormError, FormField, useApiForm } from "@/components";
import type { TagDto } from "@/contracts/projects.v1.contract";

function RemoveTagButton({
  projectId,
  tag,
}: {
  projectId: string;
  tag: TagDto;
}): ReactElement {
  const router = useRouter();
  const { state, submit } = useApiForm({
    url: `/api/v1/projects/${projectId}/tags/${tag.id}`,
    method: "DELETE",
    onSuccess: () => router.refresh(),
  });
  return (
    <button
      type="button"
      disabled={state.pending}
      aria-label={`Remove tag ${tag.name}`}
      onClick={() => void submit({})}
    >
      ×
    </button>
  );
}

export function ProjectTagsEditor({
  projectId,
  tags,
}: {
  projectId: string;
  tags: TagDto[];
}): ReactElement {
  const router = useRouter();
  const [name, setName] = useState("");
  const { state, submit } = useApiForm({
    url: `/api/v1/projects/${projectId}/tags`,
    onSuccess: () => {
      setName("");
      router.refresh();
    },
  });

  function onSubmit(event: FormEvent<HTMLFormElement>): void {
    event.preventDefault();
    void submit({ name });
  }

  return (
    <section>
      <h2>Tags</h2>
      <ul className="tags">
        {tags.map((tag) => (
          <li key={tag.id}>
            {tag.name} <RemoveTagButton projectId={projectId} tag={tag} />
          </li>
        ))}
      </ul>
      <form onSubmit={onSubmit} noValidate>
        <FormError message={state.error} />
        <FormField
          name="tag-name"
          label="New tag"
          value={name}
          onChange={setName}
          errors={state.fieldErrors.name}
        />
        <button type="submit" disabled={state.pending}>
          Add tag
        </button>
      </form>
    </section>
  );
}
