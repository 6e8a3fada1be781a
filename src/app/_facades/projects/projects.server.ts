// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@app/_facades/projects/projects.server`
 * Purpose: App-layer wiring for projects and their tags. Resolves dependencies, delegates to project services, and maps domain types to contract DTOs.
 * Scope: Server-only facade. Maps Date to ISO strings; does not perform HTTP handling or persistence.
 * Invariants: Ownership is checked by the service, never here; return types use z.infer.
 * Side-effects: IO (via ProjectRepository, ImageProcessor, ImageStore ports), metrics
 * Links: features/projects/services/projects, contracts/projects.v1.contract
 * @public
 */

import { getContainer } from "@/bootstrap/container";
import type {
  ProjectDto,
  ProjectsCreateInput,
  ProjectsUpdateInput,
  TagDto,
} from "@/contracts/projects.v1.contract";
import type { ImageUpload, ProjectDetail } from "@/core";
import {
  addTag,
  createProject,
  deleteProject,
  getProject,
  listTags,
  removeTag,
  updateProject,
  updateProjectImage,
} from "@/features/projects/public";
import type { SessionUser } from "@/shared/auth";
import {
  EVENT_NAMES,
  logEvent,
  type RequestContext,
} from "@/shared/observability";

import { trackImageUpload } from "../uploads/trackImageUpload.server";

export function toProjectDto(project: ProjectDetail): ProjectDto {
  return {
    id: project.id,
    ownerId: project.ownerId,
    owner: {
      id: project.owner.id,
      username: project.owner.username,
      profileImage: project.owner.profileImage,
    },
    title: project.title,
    description: project.description,
    featuredImage: project.featuredImage,
    demoLink: project.demoLink,
    sourceCode: project.sourceCode,
    voteTotal: project.voteTotal,
    voteRatio: project.voteRatio,
    tags: project.tags.map((t) => ({ id: t.id, name: t.name })),
    createdAt: project.createdAt.toISOString(),
  };
}

export async function getProjectFacade(projectId: string): Promise<ProjectDto> {
  return toProjectDto(await getProject(getContainer(), projectId));
}

export async function createProjectFacade(
  params: { sessionUser: SessionUser; input: ProjectsCreateInput },
  ctx: RequestContext
): Promise<ProjectDto> {
  const project = await createProject(
    getContainer(),
    params.sessionUser.id,
    params.input
  );

  logEvent(ctx.log, EVENT_NAMES.PROJECTS_CREATED, {
    reqId: ctx.reqId,
    routeId: ctx.routeId,
    projectId: project.id,
    ownerId: project.ownerId,
    tagCount: project.tags.length,
  });
  return toProjectDto(project);
}

export async function updateProjectFacade(
  params: {
    sessionUser: SessionUser;
    projectId: string;
    patch: ProjectsUpdateInput;
  },
  ctx: RequestContext
): Promise<ProjectDto> {
  const project = await updateProject(
    getContainer(),
    params.sessionUser.id,
    params.projectId,
    params.patch
  );

  logEvent(ctx.log, EVENT_NAMES.PROJECTS_UPDATED, {
    reqId: ctx.reqId,
    routeId: ctx.routeId,
    projectId: project.id,
    fields: Object.keys(params.patch),
  });
  return toProjectDto(project);
}

export async function deleteProjectFacade(
  params: { sessionUser: SessionUser; projectId: string },
  ctx: RequestContext
): Promise<void> {
  await deleteProject(getContainer(), params.sessionUser.id, params.projectId);

  logEvent(ctx.log, EVENT_NAMES.PROJECTS_DELETED, {
    reqId: ctx.reqId,
    routeId: ctx.routeId,
    projectId: params.projectId,
  });
}

export async function updateProjectImageFacade(
  params: { sessionUser: SessionUser; projectId: string; upload: ImageUpload },
  ctx: RequestContext
): Promise<ProjectDto> {
  const container = getContainer();

  const project = await trackImageUpload("project", () =>
    updateProjectImage(
      { ...container, maxUploadBytes: container.config.maxUploadBytes },
      params.sessionUser.id,
      params.projectId,
      params.upload
    )
  );

  logEvent(ctx.log, EVENT_NAMES.PROJECTS_UPDATED, {
    reqId: ctx.reqId,
    routeId: ctx.routeId,
    projectId: project.id,
    fields: ["featuredImage"],
  });
  return toProjectDto(project);
}

export async function listTagsFacade(projectId: string): Promise<TagDto[]> {
  const tags = await listTags(getContainer(), projectId);
  return tags.map((t) => ({ id: t.id, name: t.name }));
}

export async function addTagFacade(
  params: { sessionUser: SessionUser; projectId: string; name: string },
  ctx: RequestContext
): Promise<TagDto> {
  const tag = await addTag(
    getContainer(),
    params.sessionUser.id,
    params.projectId,
    params.name
  );

  logEvent(ctx.log, EVENT_NAMES.PROJECTS_TAG_CHANGED, {
    reqId: ctx.reqId,
    routeId: ctx.routeId,
    projectId: params.projectId,
    tagId: tag.id,
    change: "added",
  });
  return { id: tag.id, name: tag.name };
}

export async function removeTagFacade(
  params: { sessionUser: SessionUser; projectId: string; tagId: string },
  ctx: RequestContext
): Promise<void> {
  await removeTag(
    getContainer(),
    params.sessionUser.id,
    params.projectId,
    params.tagId
  );

  logEvent(ctx.log, EVENT_NAMES.PROJECTS_TAG_CHANGED, {
    reqId: ctx.reqId,
    routeId: ctx.routeId,
    projectId: params.projectId,
    tagId: params.tagId,
    change: "removed",
  });
}
