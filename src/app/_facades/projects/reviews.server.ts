// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@app/_facades/projects/reviews.server`
 * Purpose: App-layer wiring for project reviews and the vote aggregate.
 * Scope: Server-only facade. Maps Date to ISO strings; does not perform HTTP handling or persistence.
 * Invariants: The voter is always the session user.
 * Side-effects: IO (via ProjectRepository, ReviewRepository ports)
 * Links: features/projects/services/reviews, contracts/projects.reviews.v1.contract
 * @public
 */

import { getContainer } from "@/bootstrap/container";
import type {
  ReviewDto,
  ReviewsCreateInput,
  ReviewsListOutput,
  ReviewsUpdateInput,
} from "@/contracts/projects.reviews.v1.contract";
import type { Review } from "@/core";
import {
  deleteReview,
  getMyReview,
  listReviews,
  submitReview,
  updateReview,
} from "@/features/projects/public";
import type { SessionUser } from "@/shared/auth";
import {
  EVENT_NAMES,
  logEvent,
  type RequestContext,
} from "@/shared/observability";

function toReviewDto(review: Review): ReviewDto {
  return {
    id: review.id,
    projectId: review.projectId,
    ownerId: review.ownerId,
    value: review.value,
    body: review.body,
    createdAt: review.createdAt.toISOString(),
  };
}

export async function listReviewsFacade(params: {
  projectId: string;
  page?: number | undefined;
  size?: number | undefined;
}): Promise<ReviewsListOutput> {
  const page = await listReviews(getContainer(), params.projectId, params);
  return {
    ...page,
    items: page.items.map((review) => ({
      ...toReviewDto(review),
      author: {
        username: review.author.username,
        profileImage: review.author.profileImage,
      },
    })),
  };
}

export async function getMyReviewFacade(params: {
  sessionUser: SessionUser;
  projectId: string;
}): Promise<ReviewDto> {
  const review = await getMyReview(
    getContainer(),
    params.sessionUser.id,
    params.projectId
  );
  return toReviewDto(review);
}

export async function submitReviewFacade(
  params: {
    sessionUser: SessionUser;
    projectId: string;
    input: ReviewsCreateInput;
  },
  ctx: RequestContext
): Promise<ReviewDto> {
  const review = await submitReview(
    getContainer(),
    params.sessionUser.id,
    params.projectId,
    params.input
  );

  logEvent(ctx.log, EVENT_NAMES.PROJECTS_REVIEW_CREATED, {
    reqId: ctx.reqId,
    routeId: ctx.routeId,
    projectId: review.projectId,
    reviewId: review.id,
    value: review.value,
  });
  return toReviewDto(review);
}

export async function updateReviewFacade(
  params: {
    sessionUser: SessionUser;
    reviewId: string;
    patch: ReviewsUpdateInput;
  },
  ctx: RequestContext
): Promise<ReviewDto> {
  const review = await updateReview(
    getContainer(),
    params.sessionUser.id,
    params.reviewId,
    params.patch
  );

  logEvent(ctx.log, EVENT_NAMES.PROJECTS_REVIEW_CHANGED, {
    reqId: ctx.reqId,
    routeId: ctx.routeId,
    projectId: review.projectId,
    reviewId: review.id,
    change: "updated",
  });
  return toReviewDto(review);
}

export async function deleteReviewFacade(
  params: { sessionUser: SessionUser; reviewId: string },
  ctx: RequestContext
): Promise<void> {
  await deleteReview(getContainer(), params.sessionUser.id, params.reviewId);

  logEvent(ctx.log, EVENT_NAMES.PROJECTS_REVIEW_CHANGED, {
    reqId: ctx.reqId,
    routeId: ctx.routeId,
    reviewId: params.reviewId,
    change: "removed",
  });
}
