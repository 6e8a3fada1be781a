// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/projects/services/projects`
 * Purpose: Project lifecycle and tagging for the owner.
 * Scope: Create/read/update/delete, featured image, tag add/remove/list. Ownership enforced here.
 * Invariants:
 * - Tag names are normalized (trim, collapse spaces, lower-case, 1-50 chars) before storage.
 * - Only the owner mutates a project; NotFound precedes Forbidden.
 * Side-effects: IO (via ports)
 * Links: ports/project.port.ts, core/projects/rules.ts
 * @public
 */

import type {
  ImageUpload,
  NewProjectInput,
  Project,
  ProjectDetail,
  ProjectPatch,
  Tag,
} from "@/core";
import {
  assertProjectOwner,
  DuplicateTagError,
  FieldValidationError,
  NotFoundError,
  normalizeTagName,
  normalizeTagNames,
  PROJECT_TITLE_MAX_LENGTH,
} from "@/core";
import {
  type ImagePipelineDeps,
  replaceImage,
} from "@/features/uploads/public";
import type { ProjectRepository } from "@/ports";

export interface ProjectDeps {
  projects: ProjectRepository;
}

function cleanTitle(raw: string): string {
  const title = raw.trim();
  if (title.length === 0 || title.length > PROJECT_TITLE_MAX_LENGTH) {
    throw new FieldValidationError({
      title: [`Title must be between 1 and ${PROJECT_TITLE_MAX_LENGTH} characters.`],
    });
  }
  return title;
}

function blankToNull(value: string | null | undefined): string | null {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}

async function loadOwned(
  deps: ProjectDeps,
  ownerId: string,
  projectId: string,
  action: string
): Promise<Project> {
  const project = await deps.projects.findById(projectId);
  if (!project) {
    throw new NotFoundError("project", projectId);
  }
  assertProjectOwner(project, ownerId, action);
  return project;
}

export async function createProject(
  deps: ProjectDeps,
  ownerId: string,
  input: NewProjectInput
): Promise<ProjectDetail> {
  return deps.projects.create({
    ownerId,
    title: cleanTitle(input.title),
    description: blankToNull(input.description),
    demoLink: blankToNull(input.demoLink),
    sourceCode: blankToNull(input.sourceCode),
    tagNames: normalizeTagNames(input.tags ?? []),
  });
}

export async function getProject(
  deps: ProjectDeps,
  projectId: string
): Promise<ProjectDetail> {
  const project = await deps.projects.findDetail(projectId);
  if (!project) {
    throw new NotFoundError("project", projectId);
  }
  return project;
}

export async function updateProject(
  deps: ProjectDeps,
  ownerId: string,
  projectId: string,
  patch: ProjectPatch
): Promise<ProjectDetail> {
  await loadOwned(deps, ownerId, projectId, "update project");

  const cleaned: ProjectPatch = {};
  if (patch.title !== undefined) cleaned.title = cleanTitle(patch.title);
  if (patch.description !== undefined) cleaned.description = blankToNull(patch.description);
  if (patch.demoLink !== undefined) cleaned.demoLink = blankToNull(patch.demoLink);
  if (patch.sourceCode !== undefined) cleaned.sourceCode = blankToNull(patch.sourceCode);

  await deps.projects.update(projectId, cleaned);
  return getProject(deps, projectId);
}

export async function deleteProject(
  deps: ProjectDeps,
  ownerId: string,
  projectId: string
): Promise<void> {
  await loadOwned(deps, ownerId, projectId, "delete project");
  await deps.projects.delete(projectId);
}

export async function updateProjectImage(
  deps: ProjectDeps & ImagePipelineDeps,
  ownerId: string,
  projectId: string,
  upload: ImageUpload
): Promise<ProjectDetail> {
  await loadOwned(deps, ownerId, projectId, "update project image");
  await replaceImage(deps, upload, (storedPath) =>
    deps.projects.setFeaturedImage(projectId, storedPath)
  );
  return getProject(deps, projectId);
}

export async function listTags(
  deps: ProjectDeps,
  projectId: string
): Promise<Tag[]> {
  const project = await deps.projects.findById(projectId);
  if (!project) {
    throw new NotFoundError("project", projectId);
  }
  return deps.projects.listTags(projectId);
}

export async function addTag(
  deps: ProjectDeps,
  ownerId: string,
  projectId: string,
  rawName: string
): Promise<Tag> {
  await loadOwned(deps, ownerId, projectId, "tag project");
  const name = normalizeTagName(rawName);

  const { tag, linked } = await deps.projects.addTag(projectId, name);
  if (!linked) {
    throw new DuplicateTagError(projectId, name);
  }
  return tag;
}

export async function removeTag(
  deps: ProjectDeps,
  ownerId: string,
  projectId: string,
  tagId: string
): Promise<void> {
  await loadOwned(deps, ownerId, projectId, "untag project");
  const removed = await deps.projects.removeTag(projectId, tagId);
  if (!removed) {
    throw new NotFoundError("tag", tagId);
  }
}
