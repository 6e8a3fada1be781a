// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/projects/rules`
 * Purpose: Pure project rules: vote aggregate, tag normalization, review eligibility.
 * Scope: Computation and assertions only. Does not touch storage.
 * Invariants:
 * - voteRatio = round(up / total * 100), 0 for no votes.
 * - Tag names are trimmed, lower-cased and 1..50 chars.
 * - Owners never review their own project.
 * Side-effects: none
 * Links: features/projects/services
 * @public
 */

import { FieldValidationError, ForbiddenError } from "../common/errors";
import type { Project, VoteAggregate, VoteValue } from "./model";

export const TAG_NAME_MAX_LENGTH = 50;
export const PROJECT_TITLE_MAX_LENGTH = 200;

export function computeVoteAggregate(
  votes: readonly VoteValue[]
): VoteAggregate {
  const voteTotal = votes.length;
  if (voteTotal === 0) {
    return { voteTotal: 0, voteRatio: 0 };
  }
  const up = votes.filter((v) => v === "up").length;
  return { voteTotal, voteRatio: Math.round((up / voteTotal) * 100) };
}

/**
 * Canonical tag name. Throws FieldValidationError on empty or oversize names.
 */
export function normalizeTagName(raw: string): string {
  const name = raw.trim().replace(/\s+/g, " ").toLowerCase();
  if (name.length === 0 || name.length > TAG_NAME_MAX_LENGTH) {
    throw new FieldValidationError({
      name: [`Tag name must be between 1 and ${TAG_NAME_MAX_LENGTH} characters.`],
    });
  }
  return name;
}

/** Normalizes and deduplicates, keeping first-seen order. */
export function normalizeTagNames(raw: readonly string[]): string[] {
  return [...new Set(raw.map(normalizeTagName))];
}

export function assertCanReview(
  project: Pick<Project, "id" | "ownerId">,
  voterId: string
): void {
  if (project.ownerId === voterId) {
    throw new ForbiddenError("review own project");
  }
}

export function assertProjectOwner(
  project: Pick<Project, "id" | "ownerId">,
  userId: string,
  action: string
): void {
  if (project.ownerId !== userId) {
    throw new ForbiddenError(action);
  }
}
