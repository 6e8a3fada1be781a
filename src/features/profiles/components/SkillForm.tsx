// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/profiles/components/SkillForm`
 * Purpose: Adds a skill, or edits and removes an existing one, on the account page.
 * Scope: Client component. POSTs when no skill is given, otherwise PATCH/DELETE on that skill.
 * Invariants: A successful add clears the inputs; the list re-renders from the server.
 * Side-effects: IO (fetch, router refresh)
 * Links: app/api/v1/me/skills, contracts/skills.v1.contract
 * @public
 */

"use client";

import { useRouter } from "next/navigation";
import { type FormEvent, type ReactElement, useState } from "react";

import { FormError, FormField, useApiForm } from "@/components";
import type { SkillDto } from "@/contracts/profiles.read.v1.contract";

export function SkillForm({ skill }: { skill?: SkillDto }): ReactElement {
  const router = useRouter();
  const [name, setName] = useState(skill?.name ?? "");
  const [description, setDescription] = useState(skill?.description ?? "");
  const fieldPrefix = skill ? `skill-${skill.id}` : "skill-new";

  const save = useApiForm({
    url: skill ? `/api/v1/me/skills/${skill.id}` : "/api/v1/me/skills",
    method: skill ? "PATCH" : "POST",
    onSuccess: () => {
      if (!skill) {
        setName("");
        setDescription("");
      }
      router.refresh();
    },
  });
  const remove = useApiForm({
    url: skill ? `/api/v1/me/skills/${skill.id}` : "/api/v1/me/skills",
    method: "DELETE",
    onSuccess: () => router.refresh(),
  });

  function onSubmit(event: FormEvent<HTMLFormElement>): void {
    event.preventDefault();
    void save.submit({
      name,
      description: description.trim() === "" ? null : description,
    });
  }

  return (
    <form onSubmit={onSubmit} noValidate className="skill-form">
      <FormError message={save.state.error ?? remove.state.error} />
      <FormField
        name={`${fieldPrefix}-name`}
        label="Skill"
        value={name}
        onChange={setName}
        errors={save.state.fieldErrors.name}
        required
      />
      <FormField
        name={`${fieldPrefix}-description`}
        label="Description"
        multiline
        value={description}
        onChange={setDescription}
        errors={save.state.fieldErrors.description}
      />
      <button type="submit" disabled={save.state.pending}>
        {skill ? "Save skill" : "Add skill"}
      </button>
      {skill && (
        <button
          type="button"
          disabled={remove.state.pending}
          onClick={() => void remove.submit({})}
        >
          Remove
        </button>
      )}
    </form>
  );
}
