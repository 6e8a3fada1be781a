// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@contracts/skills.v1.contract`
 * Purpose: Contracts for managing the caller's skills.
 * Scope: Wire shapes for /api/v1/me/skills and /api/v1/me/skills/{skillId}. Does not contain business logic.
 * Invariants: Skills list in position order, then creation order.
 * Side-effects: none
 * Links: /api/v1/me/skills routes, features/profiles/services/skills
 * @internal
 */

import { z } from "zod";

import { OptionalTextInput } from "./common.v1.contract";
import { SkillSchema } from "./profiles.read.v1.contract";

export const skillsListOperation = {
  id: "skills.list.v1",
  summary: "List the caller's skills",
  description: "Returns all skills of the session user in display order.",
  input: z.object({}),
  output: z.object({ skills: z.array(SkillSchema) }),
} as const;

export const skillsCreateOperation = {
  id: "skills.create.v1",
  summary: "Add a skill",
  description: "Appends a skill after the caller's current last position.",
  input: z.object({
    name: z.string(),
    description: OptionalTextInput,
  }),
  output: SkillSchema,
} as const;

export const skillsUpdateOperation = {
  id: "skills.update.v1",
  summary: "Edit a skill",
  description: "Partial update of name, description or position.",
  input: z
    .object({
      name: z.string().optional(),
      description: OptionalTextInput,
      position: z.number().int().min(0).optional(),
    })
    .strict(),
  output: SkillSchema,
} as const;

export const skillsDeleteOperation = {
  id: "skills.delete.v1",
  summary: "Remove a skill",
  description: "Deletes one of the caller's skills.",
  input: z.object({}),
  output: z.object({}), // 204 No Content
} as const;

export type SkillsCreateInput = z.infer<typeof skillsCreateOperation.input>;
export type SkillsUpdateInput = z.infer<typeof skillsUpdateOperation.input>;
