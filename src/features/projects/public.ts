// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/projects/public`
 * Purpose: Single entrypoint for the projects feature.
 * Scope: Re-exports project, tag and review operations.
 * Side-effects: none
 * Links: Used by src/app/_facades/projects
 * @public
 */

export {
  addTag,
  createProject,
  deleteProject,
  getProject,
  listTags,
  type ProjectDeps,
  removeTag,
  updateProject,
  updateProjectImage,
} from "./services/projects";
export {
  deleteReview,
  getMyReview,
  listReviews,
  type ReviewDeps,
  submitReview,
  updateReview,
} from "./services/reviews";
