// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@contracts/projects.reviews.v1.contract`
 * Purpose: Contracts for project reviews (votes with an optional comment).
 * Scope: Wire shapes for /api/v1/projects/{projectId}/reviews[/mine] and /api/v1/reviews/{reviewId}. Does not contain business logic.
 * Invariants:
 *   - One review per user and project; a second submit answers 409
 *   - Owners cannot review their own project (403)
 *   - Every write refreshes the project's voteTotal and voteRatio
 * Side-effects: none
 * Links: /api/v1/projects/[projectId]/reviews route, features/projects/services/reviews
 * @internal
 */

import { z } from "zod";

import {
  IdSchema,
  OptionalTextInput,
  PageQuerySchema,
  pageOf,
} from "./common.v1.contract";

export const VoteValueSchema = z.enum(["up", "down"]);

export const ReviewSchema = z.object({
  id: IdSchema,
  projectId: IdSchema,
  ownerId: IdSchema,
  value: VoteValueSchema,
  body: z.string().nullable(),
  createdAt: z.string().datetime(),
});

export const ReviewWithAuthorSchema = ReviewSchema.extend({
  author: z.object({
    username: z.string(),
    profileImage: z.string(),
  }),
});

export const reviewsListOperation = {
  id: "projects.reviews.list.v1",
  summary: "List a project's reviews",
  description: "Newest first, with each reviewer's username and image.",
  input: PageQuerySchema,
  output: pageOf(ReviewWithAuthorSchema),
} as const;

export const reviewsCreateOperation = {
  id: "projects.reviews.create.v1",
  summary: "Review a project",
  description: "Casts the caller's vote with an optional comment.",
  input: z.object({
    value: VoteValueSchema,
    body: OptionalTextInput,
  }),
  output: ReviewSchema,
} as const;

export const reviewsMineOperation = {
  id: "projects.reviews.mine.v1",
  summary: "Read the caller's review of a project",
  description: "404 when the caller has not reviewed the project.",
  input: z.object({}),
  output: ReviewSchema,
} as const;

export const reviewsUpdateOperation = {
  id: "reviews.update.v1",
  summary: "Edit the caller's review",
  description: "Changes the vote and/or the comment.",
  input: z
    .object({
      value: VoteValueSchema.optional(),
      body: OptionalTextInput,
    })
    .strict(),
  output: ReviewSchema,
} as const;

export const reviewsDeleteOperation = {
  id: "reviews.delete.v1",
  summary: "Withdraw the caller's review",
  description: "Deletes the review and recomputes the project's aggregate.",
  input: z.object({}),
  output: z.object({}), // 204 No Content
} as const;

export type ReviewDto = z.infer<typeof ReviewSchema>;
export type ReviewWithAuthorDto = z.infer<typeof ReviewWithAuthorSchema>;
export type ReviewsListOutput = z.infer<typeof reviewsListOperation.output>;
export type ReviewsCreateInput = z.infer<typeof reviewsCreateOperation.input>;
export type ReviewsUpdateInput = z.infer<typeof reviewsUpdateOperation.input>;
