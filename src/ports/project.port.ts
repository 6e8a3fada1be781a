// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports/project.port`
 * Purpose: Persistence port for projects, their tags and reviews.
 * Scope: Project CRUD, tag linking, review writes with aggregate recompute. Does not enforce ownership (features do).
 * Invariants:
 * - Tags are deduplicated by normalized name; orphan tags are pruned on unlink/delete.
 * - Every review write recomputes vote_total/vote_ratio in the same transaction.
 * - At most one review per (project, owner).
 * Side-effects: none (interface only)
 * Links: adapters/server/projects/drizzle-project.adapter.ts, adapters/server/projects/drizzle-review.adapter.ts
 * @public
 */

import type {
  Page,
  PageRequest,
  Project,
  ProjectDetail,
  ProjectPatch,
  Review,
  ReviewWithAuthor,
  Tag,
  VoteValue,
} from "@/core";

export type {
  Project,
  ProjectDetail,
  ProjectPatch,
  Review,
  ReviewWithAuthor,
  Tag,
} from "@/core";

export interface CreateProjectParams {
  ownerId: string;
  title: string;
  description: string | null;
  demoLink: string | null;
  sourceCode: string | null;
  /** Normalized, deduplicated */
  tagNames: string[];
}

export interface AddTagResult {
  tag: Tag;
  /** false when the project already carried the tag */
  linked: boolean;
}

export interface ProjectRepository {
  findById(projectId: string): Promise<Project | null>;

  findDetail(projectId: string): Promise<ProjectDetail | null>;

  /** Newest first. */
  listByOwner(ownerId: string): Promise<ProjectDetail[]>;

  /** Creates the project and links its tags in one transaction. */
  create(params: CreateProjectParams): Promise<ProjectDetail>;

  update(projectId: string, patch: ProjectPatch): Promise<Project>;

  /**
   * @returns the previous featured image path
   */
  setFeaturedImage(projectId: string, imagePath: string): Promise<string>;

  /** Removes the project, its reviews and tag links; prunes orphan tags. */
  delete(projectId: string): Promise<void>;

  listTags(projectId: string): Promise<Tag[]>;

  /** Find-or-create the tag by name, then link it. */
  addTag(projectId: string, tagName: string): Promise<AddTagResult>;

  /**
   * Unlink and prune the tag if no project references it any more.
   * @returns false when the link did not exist
   */
  removeTag(projectId: string, tagId: string): Promise<boolean>;
}

export interface CreateReviewParams {
  projectId: string;
  ownerId: string;
  value: VoteValue;
  body: string | null;
}

export interface ReviewPatch {
  value?: VoteValue;
  body?: string | null;
}

export interface ReviewRepository {
  findById(reviewId: string): Promise<Review | null>;

  findByProjectAndOwner(
    projectId: string,
    ownerId: string
  ): Promise<Review | null>;

  /**
   * @returns null when (project, owner) already has a review
   */
  create(params: CreateReviewParams): Promise<Review | null>;

  update(reviewId: string, patch: ReviewPatch): Promise<Review>;

  delete(reviewId: string): Promise<void>;

  /** Newest first. */
  listByProject(
    projectId: string,
    page: PageRequest
  ): Promise<Page<ReviewWithAuthor>>;
}
