// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/projects/public`
 * Purpose: Public API for the projects domain.
 * Scope: Barrel export. Does not expose internal implementation details.
 * Invariants: Only exports stable public interfaces and functions.
 * Side-effects: none (re-exports only)
 * Links: Imported via @/core
 * @public
 */

export {
  AlreadyVotedError,
  DuplicateTagError,
  isAlreadyVotedError,
  isDuplicateTagError,
} from "./errors";
export type {
  NewProjectInput,
  Project,
  ProjectDetail,
  ProjectOwner,
  ProjectPatch,
  Review,
  ReviewWithAuthor,
  Tag,
  VoteAggregate,
  VoteValue,
} from "./model";
export {
  assertCanReview,
  assertProjectOwner,
  computeVoteAggregate,
  normalizeTagName,
  normalizeTagNames,
  PROJECT_TITLE_MAX_LENGTH,
  TAG_NAME_MAX_LENGTH,
} from "./rules";
