// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/projects/model`
 * Purpose: Project showcase entities: projects, tags, reviews and the vote aggregate.
 * Scope: Pure types. Does not contain persistence.
 * Invariants: One review per (project, voter); vote aggregate derived from reviews only.
 * Side-effects: none
 * Links: ports/project.port.ts, ports/review.port.ts
 * @public
 */

export type VoteValue = "up" | "down";

export interface VoteAggregate {
  voteTotal: number;
  /** Integer percentage of up votes, 0 when there are no votes */
  voteRatio: number;
}

export interface Tag {
  id: string;
  name: string;
}

export interface ProjectOwner {
  id: string;
  username: string;
  profileImage: string;
}

export interface Project extends VoteAggregate {
  id: string;
  ownerId: string;
  title: string;
  description: string | null;
  featuredImage: string;
  demoLink: string | null;
  sourceCode: string | null;
  createdAt: Date;
}

export interface ProjectDetail extends Project {
  owner: ProjectOwner;
  tags: Tag[];
}

export interface NewProjectInput {
  title: string;
  description?: string | null | undefined;
  demoLink?: string | null | undefined;
  sourceCode?: string | null | undefined;
  tags?: readonly string[] | undefined;
}

export interface ProjectPatch {
  title?: string;
  description?: string | null;
  demoLink?: string | null;
  sourceCode?: string | null;
}

export interface Review {
  id: string;
  projectId: string;
  ownerId: string;
  value: VoteValue;
  body: string | null;
  createdAt: Date;
}

export interface ReviewWithAuthor extends Review {
  author: { username: string; profileImage: string };
}
