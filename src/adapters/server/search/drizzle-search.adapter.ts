// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/search/drizzle-search`
 * Purpose: Drizzle implementation of SearchRepository.
 * Scope: Paged project and developer search. Criteria normalization and page math live in core/search.
 * Invariants: Both listings order by created_at DESC, id DESC; total counts the same filter as the page.
 * Side-effects: IO (database reads)
 * Links: ports/search.port.ts, search-filters.ts
 * @public
 */

import { asc, count, desc, eq, inArray } from "drizzle-orm";

import type { Database } from "@/adapters/server/db/client";
import { hydrateProjectDetails } from "@/adapters/server/projects/project-details.query";
import type { DeveloperSummary, PageRequest, ProjectDetail } from "@/core";
import { pageOffset } from "@/core";
import type {
  DeveloperSearchCriteria,
  ProjectSearchCriteria,
  SearchRepository,
  SearchSlice,
} from "@/ports";
import { profiles, projects, skills, users } from "@/shared/db";

import {
  buildDeveloperSearchFilter,
  buildProjectSearchFilter,
} from "./search-filters";

export class DrizzleSearchRepository implements SearchRepository {
  constructor(private readonly db: Database) {}

  async searchProjects(
    criteria: ProjectSearchCriteria,
    page: PageRequest
  ): Promise<SearchSlice<ProjectDetail>> {
    const filter = buildProjectSearchFilter(criteria);

    const [totalRow] = await this.db
      .select({ value: count() })
      .from(projects)
      .where(filter);

    const rows = await this.db
      .select()
      .from(projects)
      .where(filter)
      .orderBy(desc(projects.createdAt), desc(projects.id))
      .limit(page.size)
      .offset(pageOffset(page));

    return {
      items: await hydrateProjectDetails(this.db, rows),
      total: totalRow?.value ?? 0,
    };
  }

  async searchDevelopers(
    criteria: DeveloperSearchCriteria,
    page: PageRequest
  ): Promise<SearchSlice<DeveloperSummary>> {
    const filter = buildDeveloperSearchFilter(criteria);

    const [totalRow] = await this.db
      .select({ value: count() })
      .from(users)
      .innerJoin(profiles, eq(profiles.userId, users.id))
      .where(filter);

    const rows = await this.db
      .select({
        userId: users.id,
        username: users.username,
        createdAt: users.createdAt,
        firstName: profiles.firstName,
        lastName: profiles.lastName,
        location: profiles.location,
        shortIntro: profiles.shortIntro,
        profileImage: profiles.profileImage,
      })
      .from(users)
      .innerJoin(profiles, eq(profiles.userId, users.id))
      .where(filter)
      .orderBy(desc(users.createdAt), desc(users.id))
      .limit(page.size)
      .offset(pageOffset(page));

    const skillRows =
      rows.length === 0
        ? []
        : await this.db
            .select({
              id: skills.id,
              ownerId: skills.ownerId,
              name: skills.name,
              description: skills.description,
            })
            .from(skills)
            .where(
              inArray(
                skills.ownerId,
                rows.map((r) => r.userId)
              )
            )
            .orderBy(asc(skills.position), asc(skills.createdAt));

    const skillsByOwner = new Map<string, DeveloperSummary["skills"]>();
    for (const s of skillRows) {
      const list = skillsByOwner.get(s.ownerId) ?? [];
      list.push({ id: s.id, name: s.name, description: s.description });
      skillsByOwner.set(s.ownerId, list);
    }

    return {
      items: rows.map((r) => ({ ...r, skills: skillsByOwner.get(r.userId) ?? [] })),
      total: totalRow?.value ?? 0,
    };
  }
}
