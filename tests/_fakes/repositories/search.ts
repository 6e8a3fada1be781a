// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/_fakes/repositories/search`
 * Purpose: In-memory SearchRepository matching the SQL filters: case-insensitive substring text match, every tag or skill filter required.
 * Scope: Newest first with id tiebreak; developers limited to active users.
 * Side-effects: none
 * Links: adapters/server/search/search-filters.ts
 * @public
 */

import type {
  DeveloperSearchCriteria,
  DeveloperSummary,
  PageRequest,
  ProjectDetail,
  ProjectSearchCriteria,
} from "@/core";
import { pageOffset } from "@/core";
import type { SearchRepository, SearchSlice } from "@/ports";

import type { InMemoryProjectRepository } from "./projects";
import type { InMemorySkillRepository } from "./profiles";
import { type InMemoryStore, newestFirst } from "./store";

function matchesText(q: string | null, fields: (string | null)[]): boolean {
  if (q === null) return true;
  const needle = q.toLowerCase();
  return fields.some((f) => f !== null && f.toLowerCase().includes(needle));
}

function slice<T>(all: T[], page: PageRequest): SearchSlice<T> {
  const offset = pageOffset(page);
  return { items: all.slice(offset, offset + page.size), total: all.length };
}

export class InMemorySearchRepository implements SearchRepository {
  constructor(
    private readonly store: InMemoryStore,
    private readonly projects: InMemoryProjectRepository,
    private readonly skills: InMemorySkillRepository
  ) {}

  async searchProjects(
    criteria: ProjectSearchCriteria,
    page: PageRequest
  ): Promise<SearchSlice<ProjectDetail>> {
    const rows = [...this.store.projects.values()].sort(newestFirst);
    const details: ProjectDetail[] = [];
    for (const row of rows) {
      const detail = await this.projects.findDetail(row.id);
      if (detail) details.push(detail);
    }

    const matches = details.filter((project) => {
      const tagNames = project.tags.map((t) => t.name);
      const textOk = matchesText(criteria.q, [
        project.title,
        project.description,
        ...tagNames,
      ]);
      return textOk && criteria.tags.every((tag) => tagNames.includes(tag));
    });
    return slice(matches, page);
  }

  async searchDevelopers(
    criteria: DeveloperSearchCriteria,
    page: PageRequest
  ): Promise<SearchSlice<DeveloperSummary>> {
    const users = [...this.store.users.values()]
      .filter((u) => u.isActive)
      .sort(newestFirst);

    const matches: DeveloperSummary[] = [];
    for (const user of users) {
      const profile = this.store.profiles.get(user.id);
      if (!profile) continue;
      const skills = await this.skills.listByOwner(user.id);
      const skillNames = skills.map((s) => s.name.toLowerCase());

      const textOk = matchesText(criteria.q, [
        user.username,
        profile.firstName,
        profile.lastName,
        profile.shortIntro,
        ...skills.map((s) => s.name),
      ]);
      if (!textOk || !criteria.skills.every((s) => skillNames.includes(s))) {
        continue;
      }

      matches.push({
        userId: user.id,
        username: user.username,
        firstName: profile.firstName,
        lastName: profile.lastName,
        location: profile.location,
        shortIntro: profile.shortIntro,
        profileImage: profile.profileImage,
        skills: skills.map(({ id, name, description }) => ({ id, name, description })),
        createdAt: user.createdAt,
      });
    }
    return slice(matches, page);
  }
}
