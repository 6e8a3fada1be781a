// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/projects/drizzle-review`
 * Purpose: Drizzle implementation of ReviewRepository.
 * Scope: Review writes with vote aggregate maintenance; paged listing with author summary.
 * Invariants:
 * - Every review write recomputes projects.vote_total / vote_ratio in the same transaction.
 * - UNIQUE(project_id, owner_id) turns a second vote into a null create result.
 * Side-effects: IO (database operations)
 * Links: ports/project.port.ts, core/projects/rules.ts
 * @public
 */

import { and, count, desc, eq } from "drizzle-orm";
import { v4 as uuidv4 } from "uuid";

import type { Database, Transaction } from "@/adapters/server/db/client";
import type { Page, PageRequest } from "@/core";
import { computeVoteAggregate, pageOffset, toPage } from "@/core";
import type {
  CreateReviewParams,
  Review,
  ReviewPatch,
  ReviewRepository,
  ReviewWithAuthor,
} from "@/ports";
import {
  DEFAULT_PROFILE_IMAGE,
  profiles,
  projects,
  reviews,
  users,
} from "@/shared/db";

type ReviewRow = typeof reviews.$inferSelect;

export class DrizzleReviewRepository implements ReviewRepository {
  constructor(private readonly db: Database) {}

  async findById(reviewId: string): Promise<Review | null> {
    const row = await this.db.query.reviews.findFirst({
      where: eq(reviews.id, reviewId),
    });
    return row ? this.mapRow(row) : null;
  }

  async findByProjectAndOwner(
    projectId: string,
    ownerId: string
  ): Promise<Review | null> {
    const row = await this.db.query.reviews.findFirst({
      where: and(eq(reviews.projectId, projectId), eq(reviews.ownerId, ownerId)),
    });
    return row ? this.mapRow(row) : null;
  }

  async create(params: CreateReviewParams): Promise<Review | null> {
    return await this.db.transaction(async (tx) => {
      const [row] = await tx
        .insert(reviews)
        .values({
          id: uuidv4(),
          projectId: params.projectId,
          ownerId: params.ownerId,
          value: params.value,
          body: params.body,
        })
        .onConflictDoNothing({ target: [reviews.projectId, reviews.ownerId] })
        .returning();

      if (!row) return null;

      await this.recomputeAggregateInTx(tx, row.projectId);
      return this.mapRow(row);
    });
  }

  async update(reviewId: string, patch: ReviewPatch): Promise<Review> {
    return await this.db.transaction(async (tx) => {
      const set: Partial<typeof reviews.$inferInsert> = {};
      if (patch.value !== undefined) set.value = patch.value;
      if (patch.body !== undefined) set.body = patch.body;

      const [row] =
        Object.keys(set).length === 0
          ? await tx.select().from(reviews).where(eq(reviews.id, reviewId))
          : await tx
              .update(reviews)
              .set(set)
              .where(eq(reviews.id, reviewId))
              .returning();

      if (!row) {
        throw new Error(`Review ${reviewId} not found`);
      }

      await this.recomputeAggregateInTx(tx, row.projectId);
      return this.mapRow(row);
    });
  }

  async delete(reviewId: string): Promise<void> {
    await this.db.transaction(async (tx) => {
      const [row] = await tx
        .delete(reviews)
        .where(eq(reviews.id, reviewId))
        .returning({ projectId: reviews.projectId });

      if (row) {
        await this.recomputeAggregateInTx(tx, row.projectId);
      }
    });
  }

  async listByProject(
    projectId: string,
    page: PageRequest
  ): Promise<Page<ReviewWithAuthor>> {
    const [totalRow] = await this.db
      .select({ value: count() })
      .from(reviews)
      .where(eq(reviews.projectId, projectId));

    const rows = await this.db
      .select({
        review: reviews,
        username: users.username,
        profileImage: profiles.profileImage,
      })
      .from(reviews)
      .innerJoin(users, eq(users.id, reviews.ownerId))
      .leftJoin(profiles, eq(profiles.userId, reviews.ownerId))
      .where(eq(reviews.projectId, projectId))
      .orderBy(desc(reviews.createdAt), desc(reviews.id))
      .limit(page.size)
      .offset(pageOffset(page));

    const items = rows.map((r) => ({
      ...this.mapRow(r.review),
      author: {
        username: r.username,
        profileImage: r.profileImage ?? DEFAULT_PROFILE_IMAGE,
      },
    }));

    return toPage(items, totalRow?.value ?? 0, page);
  }

  private async recomputeAggregateInTx(
    tx: Transaction,
    projectId: string
  ): Promise<void> {
    const votes = await tx
      .select({ value: reviews.value })
      .from(reviews)
      .where(eq(reviews.projectId, projectId));

    const aggregate = computeVoteAggregate(votes.map((v) => v.value));
    await tx.update(projects).set(aggregate).where(eq(projects.id, projectId));
  }

  private mapRow(row: ReviewRow): Review {
    return {
      id: row.id,
      projectId: row.projectId,
      ownerId: row.ownerId,
      value: row.value,
      body: row.body,
      createdAt: row.createdAt,
    };
  }
}
