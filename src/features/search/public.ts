// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/search/public`
 * Purpose: Single entrypoint for the search feature.
 * Side-effects: none
 * @public
 */

export {
  type DeveloperSearchInput,
  type ProjectSearchInput,
  type SearchDeps,
  searchDevelopers,
  searchProjects,
} from "./services/search";
