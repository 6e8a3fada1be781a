// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@app/_facades/search/search.server`
 * Purpose: App-layer wiring for project and developer search.
 * Scope: Server-only facade. Maps the wire query (`tag`, `skill` repeated) to search input and results to paged DTOs. Does not perform HTTP handling.
 * Invariants: Logs query length, filter count and total, never the query text.
 * Side-effects: IO (via SearchRepository port)
 * Links: features/search/services/search, contracts/projects.v1.contract, contracts/profiles.read.v1.contract
 * @public
 */

import { getContainer } from "@/bootstrap/container";
import type {
  ProfilesSearchInput,
  ProfilesSearchOutput,
} from "@/contracts/profiles.read.v1.contract";
import type {
  ProjectsSearchInput,
  ProjectsSearchOutput,
} from "@/contracts/projects.v1.contract";
import type { DeveloperSummary } from "@/core";
import { searchDevelopers, searchProjects } from "@/features/search/public";
import {
  EVENT_NAMES,
  logEvent,
  type RequestContext,
} from "@/shared/observability";

import { toProjectDto } from "../projects/projects.server";

function toDeveloperDto(
  dev: DeveloperSummary
): ProfilesSearchOutput["items"][number] {
  return {
    userId: dev.userId,
    username: dev.username,
    firstName: dev.firstName,
    lastName: dev.lastName,
    location: dev.location,
    shortIntro: dev.shortIntro,
    profileImage: dev.profileImage,
    skills: dev.skills.map((s) => ({
      id: s.id,
      name: s.name,
      description: s.description,
    })),
    createdAt: dev.createdAt.toISOString(),
  };
}

export async function searchProjectsFacade(
  query: ProjectsSearchInput,
  ctx: RequestContext
): Promise<ProjectsSearchOutput> {
  const page = await searchProjects(getContainer(), {
    q: query.q,
    tags: query.tag,
    page: query.page,
    size: query.size,
  });

  logEvent(ctx.log, EVENT_NAMES.SEARCH_EXECUTED, {
    reqId: ctx.reqId,
    routeId: ctx.routeId,
    target: "projects",
    queryLength: query.q?.length ?? 0,
    filterCount: query.tag?.length ?? 0,
    total: page.total,
  });
  return { ...page, items: page.items.map(toProjectDto) };
}

export async function searchDevelopersFacade(
  query: ProfilesSearchInput,
  ctx: RequestContext
): Promise<ProfilesSearchOutput> {
  const page = await searchDevelopers(getContainer(), {
    q: query.q,
    skills: query.skill,
    page: query.page,
    size: query.size,
  });

  logEvent(ctx.log, EVENT_NAMES.SEARCH_EXECUTED, {
    reqId: ctx.reqId,
    routeId: ctx.routeId,
    target: "developers",
    queryLength: query.q?.length ?? 0,
    filterCount: query.skill?.length ?? 0,
    total: page.total,
  });
  return { ...page, items: page.items.map(toDeveloperDto) };
}
