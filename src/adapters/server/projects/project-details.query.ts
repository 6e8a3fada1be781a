// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/projects/project-details.query`
 * Purpose: Hydrates project rows with owner summary and tags.
 * Scope: Two batched reads (owners, tags) for any number of projects. Preserves input order.
 * Side-effects: IO (database reads)
 * Links: drizzle-project.adapter.ts, search/drizzle-search.adapter.ts
 * @internal
 */

import { asc, eq, inArray } from "drizzle-orm";

import type { Database } from "@/adapters/server/db/client";
import type { ProjectDetail, ProjectOwner, Tag } from "@/core";
import {
  DEFAULT_PROFILE_IMAGE,
  profiles,
  projects,
  projectTags,
  tags,
  users,
} from "@/shared/db";

export type ProjectRow = typeof projects.$inferSelect;

export async function hydrateProjectDetails(
  db: Database,
  rows: readonly ProjectRow[]
): Promise<ProjectDetail[]> {
  if (rows.length === 0) return [];

  const ownerIds = [...new Set(rows.map((r) => r.ownerId))];
  const projectIds = rows.map((r) => r.id);

  const [ownerRows, tagRows] = await Promise.all([
    db
      .select({
        id: users.id,
        username: users.username,
        profileImage: profiles.profileImage,
      })
      .from(users)
      .leftJoin(profiles, eq(profiles.userId, users.id))
      .where(inArray(users.id, ownerIds)),
    db
      .select({
        projectId: projectTags.projectId,
        id: tags.id,
        name: tags.name,
      })
      .from(projectTags)
      .innerJoin(tags, eq(tags.id, projectTags.tagId))
      .where(inArray(projectTags.projectId, projectIds))
      .orderBy(asc(tags.name)),
  ]);

  const owners = new Map<string, ProjectOwner>(
    ownerRows.map((o) => [
      o.id,
      {
        id: o.id,
        username: o.username,
        profileImage: o.profileImage ?? DEFAULT_PROFILE_IMAGE,
      },
    ])
  );

  const tagsByProject = new Map<string, Tag[]>();
  for (const t of tagRows) {
    const list = tagsByProject.get(t.projectId) ?? [];
    list.push({ id: t.id, name: t.name });
    tagsByProject.set(t.projectId, list);
  }

  return rows.map((row) => ({
    ...mapProjectRow(row),
    owner: owners.get(row.ownerId) ?? {
      id: row.ownerId,
      username: "",
      profileImage: DEFAULT_PROFILE_IMAGE,
    },
    tags: tagsByProject.get(row.id) ?? [],
  }));
}

export function mapProjectRow(row: ProjectRow): Omit<ProjectDetail, "owner" | "tags"> {
  return {
    id: row.id,
    ownerId: row.ownerId,
    title: row.title,
    description: row.description,
    featuredImage: row.featuredImage,
    demoLink: row.demoLink,
    sourceCode: row.sourceCode,
    voteTotal: row.voteTotal,
    voteRatio: row.voteRatio,
    createdAt: row.createdAt,
  };
}
