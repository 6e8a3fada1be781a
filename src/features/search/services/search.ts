// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/search/services/search`
 * Purpose: Paged free-text + filter search over projects and developers.
 * Scope: Normalizes criteria and paging, delegates matching to SearchRepository, shapes the Page result.
 * Invariants:
 * - Blank q and no filters produce the unfiltered listing in the same order.
 * - A page past the end returns empty items with the true total.
 * Side-effects: IO (via ports)
 * Links: core/search/rules.ts, ports/search.port.ts
 * @public
 */

import type { DeveloperSummary, Page, ProjectDetail } from "@/core";
import {
  normalizeDeveloperCriteria,
  normalizePageRequest,
  normalizeProjectCriteria,
  toPage,
} from "@/core";
import type { SearchRepository } from "@/ports";

export interface SearchDeps {
  search: SearchRepository;
}

interface PagingInput {
  page?: number | undefined;
  size?: number | undefined;
}

export interface ProjectSearchInput extends PagingInput {
  q?: string | null | undefined;
  tags?: readonly string[] | undefined;
}

export interface DeveloperSearchInput extends PagingInput {
  q?: string | null | undefined;
  skills?: readonly string[] | undefined;
}

export async function searchProjects(
  deps: SearchDeps,
  input: ProjectSearchInput
): Promise<Page<ProjectDetail>> {
  const criteria = normalizeProjectCriteria(input);
  const page = normalizePageRequest(input);
  const { items, total } = await deps.search.searchProjects(criteria, page);
  return toPage(items, total, page);
}

export async function searchDevelopers(
  deps: SearchDeps,
  input: DeveloperSearchInput
): Promise<Page<DeveloperSummary>> {
  const criteria = normalizeDeveloperCriteria(input);
  const page = normalizePageRequest(input);
  const { items, total } = await deps.search.searchDevelopers(criteria, page);
  return toPage(items, total, page);
}
