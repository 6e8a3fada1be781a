// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/search/public`
 * Purpose: Public API for the search domain.
 * Scope: Barrel export. Does not expose internal implementation details.
 * Invariants: Only exports stable public interfaces and functions.
 * Side-effects: none (re-exports only)
 * Links: Imported via @/core
 * @public
 */

export type {
  DeveloperSearchCriteria,
  Page,
  PageRangeItem,
  PageRequest,
  ProjectSearchCriteria,
} from "./model";
export {
  buildPageRange,
  DEFAULT_PAGE_SIZE,
  escapeLikePattern,
  MAX_PAGE_SIZE,
  MAX_QUERY_LENGTH,
  normalizeDeveloperCriteria,
  normalizePageRequest,
  normalizeProjectCriteria,
  normalizeQuery,
  PAGE_GAP,
  pageCount,
  pageOffset,
  toPage,
} from "./rules";
