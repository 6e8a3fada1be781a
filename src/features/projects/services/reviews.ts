// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/projects/services/reviews`
 * Purpose: Voting and reviews on projects.
 * Scope: Submit, read back, edit, delete and list reviews. The repository keeps the vote aggregate in step.
 * Invariants:
 * - One review per (project, voter); a second submit raises AlreadyVotedError.
 * - Owners cannot review their own project.
 * - Edit/delete only reach the caller's own review; anything else reads as not found.
 * Side-effects: IO (via ports)
 * Links: core/projects/rules.ts, ports/project.port.ts
 * @public
 */

import type {
  Page,
  PageRequest,
  Review,
  ReviewWithAuthor,
  VoteValue,
} from "@/core";
import {
  AlreadyVotedError,
  assertCanReview,
  NotFoundError,
  normalizePageRequest,
} from "@/core";
import type { ProjectRepository, ReviewPatch, ReviewRepository } from "@/ports";

export interface ReviewDeps {
  projects: ProjectRepository;
  reviews: ReviewRepository;
}

function cleanBody(body: string | null | undefined): string | null {
  const trimmed = body?.trim();
  return trimmed ? trimmed : null;
}

async function loadOwnReview(
  deps: ReviewDeps,
  voterId: string,
  reviewId: string
): Promise<Review> {
  const review = await deps.reviews.findById(reviewId);
  if (!review || review.ownerId !== voterId) {
    throw new NotFoundError("review", reviewId);
  }
  return review;
}

export async function submitReview(
  deps: ReviewDeps,
  voterId: string,
  projectId: string,
  input: { value: VoteValue; body?: string | null | undefined }
): Promise<Review> {
  const project = await deps.projects.findById(projectId);
  if (!project) {
    throw new NotFoundError("project", projectId);
  }
  assertCanReview(project, voterId);

  if (await deps.reviews.findByProjectAndOwner(projectId, voterId)) {
    throw new AlreadyVotedError(projectId, voterId);
  }

  const review = await deps.reviews.create({
    projectId,
    ownerId: voterId,
    value: input.value,
    body: cleanBody(input.body),
  });
  // Unique index caught a concurrent vote
  if (!review) {
    throw new AlreadyVotedError(projectId, voterId);
  }
  return review;
}

/**
 * The caller's own review of a project, so a voter who got AlreadyVoted can find it.
 */
export async function getMyReview(
  deps: ReviewDeps,
  voterId: string,
  projectId: string
): Promise<Review> {
  const project = await deps.projects.findById(projectId);
  if (!project) {
    throw new NotFoundError("project", projectId);
  }
  const review = await deps.reviews.findByProjectAndOwner(projectId, voterId);
  if (!review) {
    throw new NotFoundError("review", projectId);
  }
  return review;
}

export async function updateReview(
  deps: ReviewDeps,
  voterId: string,
  reviewId: string,
  patch: ReviewPatch
): Promise<Review> {
  await loadOwnReview(deps, voterId, reviewId);

  const cleaned: ReviewPatch = {};
  if (patch.value !== undefined) cleaned.value = patch.value;
  if (patch.body !== undefined) cleaned.body = cleanBody(patch.body);
  return deps.reviews.update(reviewId, cleaned);
}

export async function deleteReview(
  deps: ReviewDeps,
  voterId: string,
  reviewId: string
): Promise<void> {
  await loadOwnReview(deps, voterId, reviewId);
  await deps.reviews.delete(reviewId);
}

export async function listReviews(
  deps: ReviewDeps,
  projectId: string,
  page: { page?: number | undefined; size?: number | undefined }
): Promise<Page<ReviewWithAuthor>> {
  const project = await deps.projects.findById(projectId);
  if (!project) {
    throw new NotFoundError("project", projectId);
  }
  const request: PageRequest = normalizePageRequest(page);
  return deps.reviews.listByProject(projectId, request);
}
