// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@contracts/projects.tags.v1.contract`
 * Purpose: Contracts for listing, adding and removing project tags.
 * Scope: Wire shapes for /api/v1/projects/{projectId}/tags[/{tagId}]. Does not contain business logic.
 * Invariants: Adding a tag the project already has answers 409.
 * Side-effects: none
 * Links: /api/v1/projects/[projectId]/tags routes, features/projects/services/projects
 * @internal
 */

import { z } from "zod";

import { TagSchema } from "./projects.v1.contract";

export const tagsListOperation = {
  id: "projects.tags.list.v1",
  summary: "List a project's tags",
  description: "Tags in name order.",
  input: z.object({}),
  output: z.object({ tags: z.array(TagSchema) }),
} as const;

export const tagsAddOperation = {
  id: "projects.tags.add.v1",
  summary: "Tag a project",
  description:
    "Normalizes the name, creates the tag if it is new, and links it to the project.",
  input: z.object({ name: z.string() }),
  output: TagSchema,
} as const;

export const tagsRemoveOperation = {
  id: "projects.tags.remove.v1",
  summary: "Untag a project",
  description: "Unlinks the tag; a tag no project uses any more is removed.",
  input: z.object({}),
  output: z.object({}), // 204 No Content
} as const;

export type TagsAddInput = z.infer<typeof tagsAddOperation.input>;
