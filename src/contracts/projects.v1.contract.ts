// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@contracts/projects.v1.contract`
 * Purpose: Contracts for project search, read, create, edit, image upload and delete.
 * Scope: Wire shapes for /api/v1/projects and /api/v1/projects/{projectId}. Does not contain business logic.
 * Invariants:
 *   - voteRatio is an integer percentage (0-100), 0 when there are no votes
 *   - Search with no q and no tag lists every project, newest first
 *   - Only the owner may edit, upload or delete
 * Side-effects: none
 * Links: /api/v1/projects routes, features/projects, features/search
 * @internal
 */

import { z } from "zod";

import {
  IdSchema,
  OptionalTextInput,
  PageQuerySchema,
  pageOf,
} from "./common.v1.contract";

export const TagSchema = z.object({
  id: IdSchema,
  name: z.string(),
});

export const ProjectSchema = z.object({
  id: IdSchema,
  ownerId: IdSchema,
  owner: z.object({
    id: IdSchema,
    username: z.string(),
    profileImage: z.string(),
  }),
  title: z.string(),
  description: z.string().nullable(),
  featuredImage: z.string(),
  demoLink: z.string().nullable(),
  sourceCode: z.string().nullable(),
  voteTotal: z.number().int().min(0),
  voteRatio: z.number().int().min(0).max(100),
  tags: z.array(TagSchema),
  createdAt: z.string().datetime(),
});

export const projectsSearchOperation = {
  id: "projects.search.v1",
  summary: "Search projects",
  description:
    "Free-text search over title, description and tag names, narrowed by repeated tag filters.",
  input: PageQuerySchema.extend({
    q: z.string().optional(),
    tag: z.array(z.string()).optional(),
  }),
  output: pageOf(ProjectSchema),
} as const;

export const projectsGetOperation = {
  id: "projects.get.v1",
  summary: "Read a project",
  description: "Returns the project with owner and tags.",
  input: z.object({ projectId: IdSchema }),
  output: ProjectSchema,
} as const;

export const projectsCreateOperation = {
  id: "projects.create.v1",
  summary: "Create a project",
  description:
    "Creates a project owned by the caller. Tag names are normalized and created on demand.",
  input: z.object({
    title: z.string(),
    description: OptionalTextInput,
    demoLink: OptionalTextInput,
    sourceCode: OptionalTextInput,
    tags: z.array(z.string()).optional(),
  }),
  output: ProjectSchema,
} as const;

export const projectsUpdateOperation = {
  id: "projects.update.v1",
  summary: "Edit a project",
  description: "Partial update of title, description and links.",
  input: z
    .object({
      title: z.string().optional(),
      description: OptionalTextInput,
      demoLink: OptionalTextInput,
      sourceCode: OptionalTextInput,
    })
    .strict(),
  output: ProjectSchema,
} as const;

export const projectsImageOperation = {
  id: "projects.image.v1",
  summary: "Replace a project's featured image",
  description: "Multipart upload with a single `image` field.",
  input: z.object({}),
  output: ProjectSchema,
} as const;

export const projectsDeleteOperation = {
  id: "projects.delete.v1",
  summary: "Delete a project",
  description: "Removes the project, its reviews and orphaned tags.",
  input: z.object({}),
  output: z.object({}), // 204 No Content
} as const;

export type TagDto = z.infer<typeof TagSchema>;
export type ProjectDto = z.infer<typeof ProjectSchema>;
export type ProjectsSearchInput = z.infer<typeof projectsSearchOperation.input>;
export type ProjectsSearchOutput = z.infer<
  typeof projectsSearchOperation.output
>;
export type ProjectsCreateInput = z.infer<typeof projectsCreateOperation.input>;
export type ProjectsUpdateInput = z.infer<typeof projectsUpdateOperation.input>;
