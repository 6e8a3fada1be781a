// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/projects/components/ProjectForm`
 * Purpose: Create or edit a project's title, description and links.
 * Scope: Client component. Without a project it POSTs (with comma-separated tags) and navigates to the new project; with one it PATCHes in place.
 * Invariants: Tags are only sent on create; the edit page manages tags one at a time.
 * Side-effects: IO (fetch, navigation)
 * Links: app/api/v1/projects, contracts/projects.v1.contract
 * @public
 */

"use client";

import { useRouter } from "next/navigation";
import { type FormEvent, type ReactElement, useState } from "react";
import { z } from "zod";

import { FormError, FormField, useApiForm } from "@/components";
import type { ProjectDto } from "@/contracts/projects.v1.contract";

const SavedProjectSchema = z.object({ id: z.string() });

function blankToNull(value: string): string | null {
  return value.trim() === "" ? null : value;
}

function splitTagInput(input: string): string[] {
  return input
    .split(",")
    .map((tag) => tag.trim())
    .filter((tag) => tag.length > 0);
}

export function ProjectForm({ project }: { project?: ProjectDto }): ReactElement {
  const router = useRouter();
  const [values, setValues] = useState({
    title: project?.title ?? "",
    description: project?.description ?? "",
    demoLink: project?.demoLink ?? "",
    sourceCode: project?.sourceCode ?? "",
    tags: "",
  });

  const { state, submit } = useApiForm({
    url: project ? `/api/v1/projects/${project.id}` : "/api/v1/projects",
    method: project ? "PATCH" : "POST",
    onSuccess: (data) => {
      const saved = SavedProjectSchema.safeParse(data);
      router.push(saved.success ? `/projects/${saved.data.id}` : "/projects");
      router.refresh();
    },
  });

  const set = (key: keyof typeof values) => (value: string) =>
    setValues((prev) => ({ ...prev, [key]: value }));

  function onSubmit(event: FormEvent<HTMLFormElement>): void {
    event.preventDefault();
    const fields = {
      title: values.title,
      description: blankToNull(values.description),
      demoLink: blankToNull(values.demoLink),
      sourceCode: blankToNull(values.sourceCode),
    };
    void submit(project ? fields : { ...fields, tags: splitTagInput(values.tags) });
  }

  return (
    <form onSubmit={onSubmit} noValidate>
      <FormError message={state.error} />
      <FormField
        name="title"
        label="Title"
        value={values.title}
        onChange={set("title")}
        errors={state.fieldErrors.title}
        required
      />
      <FormField
        name="description"
        label="Description"
        multiline
        value={values.description}
        onChange={set("description")}
        errors={state.fieldErrors.description}
      />
      <FormField
        name="demoLink"
        label="Live demo"
        type="url"
        value={values.demoLink}
        onChange={set("demoLink")}
        errors={state.fieldErrors.demoLink}
      />
      <FormField
        name="sourceCode"
        label="Source code"
        type="url"
        value={values.sourceCode}
        onChange={set("sourceCode")}
        errors={state.fieldErrors.sourceCode}
      />
      {!project && (
        <FormField
          name="tags"
          label="Tags (comma separated)"
          value={values.tags}
          onChange={set("tags")}
          errors={state.fieldErrors.tags}
        />
      )}
      <button type="submit" disabled={state.pending}>
        {project ? "Save project" : "Create project"}
      </button>
    </form>
  );
}
