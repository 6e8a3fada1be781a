// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports/search.port`
 * Purpose: Query port for filtered, paginated project and developer listings.
 * Scope: Executes normalized criteria. Does not normalize input (core/search does).
 * Invariants: Order is (createdAt desc, id desc); null q and empty filters mean unfiltered.
 * Side-effects: none (interface only)
 * Links: adapters/server/search/drizzle-search.adapter.ts
 * @public
 */

import type {
  DeveloperSearchCriteria,
  DeveloperSummary,
  PageRequest,
  ProjectDetail,
  ProjectSearchCriteria,
} from "@/core";

export type {
  DeveloperSearchCriteria,
  DeveloperSummary,
  ProjectSearchCriteria,
} from "@/core";

export interface SearchSlice<T> {
  items: T[];
  total: number;
}

export interface SearchRepository {
  searchProjects(
    criteria: ProjectSearchCriteria,
    page: PageRequest
  ): Promise<SearchSlice<ProjectDetail>>;

  searchDevelopers(
    criteria: DeveloperSearchCriteria,
    page: PageRequest
  ): Promise<SearchSlice<DeveloperSummary>>;
}
