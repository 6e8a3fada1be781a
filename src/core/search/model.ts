// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/search/model`
 * Purpose: Search criteria and paginated result shapes.
 * Scope: Pure types. Does not build queries.
 * Invariants: q is null (never blank) after normalization; filter lists are deduplicated.
 * Side-effects: none
 * Links: ports/search.port.ts
 * @public
 */

export interface PageRequest {
  /** 1-based */
  page: number;
  size: number;
}

export interface Page<T> {
  items: T[];
  page: number;
  size: number;
  total: number;
  pages: number;
}

export interface ProjectSearchCriteria {
  q: string | null;
  /** Normalized tag names; every one must be present on a match */
  tags: string[];
}

export interface DeveloperSearchCriteria {
  q: string | null;
  /** Lower-cased skill names; every one must be present on a match */
  skills: string[];
}

export type PageRangeItem = number | "…";
