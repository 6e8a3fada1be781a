// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/search/search-filters`
 * Purpose: Pure builders for the WHERE clauses behind project and developer search.
 * Scope: SQL expression construction only; no IO. Expects criteria already normalized by core/search.
 * Invariants:
 * - Blank criteria yield undefined so the caller runs the unfiltered listing.
 * - Free text is LIKE-escaped; tag/skill filters are exact names combined with AND.
 * Side-effects: none
 * Links: drizzle-search.adapter.ts, core/search/rules.ts
 * @internal
 */

import { and, eq, ilike, or, type SQL, sql } from "drizzle-orm";

import type { DeveloperSearchCriteria, ProjectSearchCriteria } from "@/core";
import { escapeLikePattern } from "@/core";
import {
  profiles,
  projects,
  projectTags,
  skills,
  tags,
  users,
} from "@/shared/db";

function containsPattern(q: string): string {
  return `%${escapeLikePattern(q)}%`;
}

export function buildProjectSearchFilter(
  criteria: ProjectSearchCriteria
): SQL | undefined {
  const conditions: SQL[] = [];

  if (criteria.q) {
    const pattern = containsPattern(criteria.q);
    const textMatch = or(
      ilike(projects.title, pattern),
      ilike(projects.description, pattern),
      sql`exists (select 1 from ${projectTags} inner join ${tags} on ${tags.id} = ${projectTags.tagId} where ${projectTags.projectId} = ${projects.id} and ${tags.name} ilike ${pattern})`
    );
    if (textMatch) conditions.push(textMatch);
  }

  for (const tag of criteria.tags) {
    conditions.push(
      sql`exists (select 1 from ${projectTags} inner join ${tags} on ${tags.id} = ${projectTags.tagId} where ${projectTags.projectId} = ${projects.id} and ${tags.name} = ${tag})`
    );
  }

  return conditions.length > 0 ? and(...conditions) : undefined;
}

export function buildDeveloperSearchFilter(
  criteria: DeveloperSearchCriteria
): SQL | undefined {
  const conditions: SQL[] = [eq(users.isActive, true)];

  if (criteria.q) {
    const pattern = containsPattern(criteria.q);
    const textMatch = or(
      ilike(users.username, pattern),
      ilike(profiles.firstName, pattern),
      ilike(profiles.lastName, pattern),
      ilike(profiles.shortIntro, pattern),
      sql`exists (select 1 from ${skills} where ${skills.ownerId} = ${users.id} and ${skills.name} ilike ${pattern})`
    );
    if (textMatch) conditions.push(textMatch);
  }

  for (const skill of criteria.skills) {
    conditions.push(
      sql`exists (select 1 from ${skills} where ${skills.ownerId} = ${users.id} and lower(${skills.name}) = ${skill})`
    );
  }

  return and(...conditions);
}
