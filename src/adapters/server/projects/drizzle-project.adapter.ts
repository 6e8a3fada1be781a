// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/projects/drizzle-project`
 * Purpose: Drizzle implementation of ProjectRepository, including tag links.
 * Scope: Project CRUD, featured image swap, tag find-or-create and pruning. Does not check ownership.
 * Invariants:
 * - Tags are shared by name; a tag row is deleted once no project links to it.
 * - Project creation and its tag links commit together.
 * Side-effects: IO (database operations)
 * Links: ports/project.port.ts
 * @public
 */

import { and, desc, eq, inArray, notExists, sql } from "drizzle-orm";
import { v4 as uuidv4 } from "uuid";

import type { Database, Transaction } from "@/adapters/server/db/client";
import type {
  AddTagResult,
  CreateProjectParams,
  Project,
  ProjectDetail,
  ProjectPatch,
  ProjectRepository,
  Tag,
} from "@/ports";
import { projects, projectTags, tags } from "@/shared/db";

import {
  hydrateProjectDetails,
  mapProjectRow,
} from "./project-details.query";

export class DrizzleProjectRepository implements ProjectRepository {
  constructor(private readonly db: Database) {}

  async findById(projectId: string): Promise<Project | null> {
    const row = await this.db.query.projects.findFirst({
      where: eq(projects.id, projectId),
    });
    return row ? mapProjectRow(row) : null;
  }

  async findDetail(projectId: string): Promise<ProjectDetail | null> {
    const row = await this.db.query.projects.findFirst({
      where: eq(projects.id, projectId),
    });
    if (!row) return null;
    const [detail] = await hydrateProjectDetails(this.db, [row]);
    return detail ?? null;
  }

  async listByOwner(ownerId: string): Promise<ProjectDetail[]> {
    const rows = await this.db
      .select()
      .from(projects)
      .where(eq(projects.ownerId, ownerId))
      .orderBy(desc(projects.createdAt), desc(projects.id));
    return hydrateProjectDetails(this.db, rows);
  }

  async create(params: CreateProjectParams): Promise<ProjectDetail> {
    const projectId = await this.db.transaction(async (tx) => {
      const [row] = await tx
        .insert(projects)
        .values({
          id: uuidv4(),
          ownerId: params.ownerId,
          title: params.title,
          description: params.description,
          demoLink: params.demoLink,
          sourceCode: params.sourceCode,
        })
        .returning({ id: projects.id });

      if (!row) {
        throw new Error("Failed to create project");
      }

      for (const name of params.tagNames) {
        const tag = await this.findOrCreateTagInTx(tx, name);
        await tx
          .insert(projectTags)
          .values({ projectId: row.id, tagId: tag.id })
          .onConflictDoNothing();
      }
      return row.id;
    });

    const detail = await this.findDetail(projectId);
    if (!detail) {
      throw new Error(`Project ${projectId} not readable after create`);
    }
    return detail;
  }

  async update(projectId: string, patch: ProjectPatch): Promise<Project> {
    const set: Partial<typeof projects.$inferInsert> = {};
    if (patch.title !== undefined) set.title = patch.title;
    if (patch.description !== undefined) set.description = patch.description;
    if (patch.demoLink !== undefined) set.demoLink = patch.demoLink;
    if (patch.sourceCode !== undefined) set.sourceCode = patch.sourceCode;

    if (Object.keys(set).length === 0) {
      const current = await this.findById(projectId);
      if (!current) {
        throw new Error(`Project ${projectId} not found`);
      }
      return current;
    }

    const [row] = await this.db
      .update(projects)
      .set(set)
      .where(eq(projects.id, projectId))
      .returning();

    if (!row) {
      throw new Error(`Project ${projectId} not found`);
    }
    return mapProjectRow(row);
  }

  async setFeaturedImage(projectId: string, imagePath: string): Promise<string> {
    return await this.db.transaction(async (tx) => {
      const [current] = await tx
        .select({ featuredImage: projects.featuredImage })
        .from(projects)
        .where(eq(projects.id, projectId))
        .for("update");

      if (!current) {
        throw new Error(`Project ${projectId} not found`);
      }

      await tx
        .update(projects)
        .set({ featuredImage: imagePath })
        .where(eq(projects.id, projectId));

      return current.featuredImage;
    });
  }

  async delete(projectId: string): Promise<void> {
    await this.db.transaction(async (tx) => {
      const linked = await tx
        .select({ tagId: projectTags.tagId })
        .from(projectTags)
        .where(eq(projectTags.projectId, projectId));

      // reviews and project_tags cascade
      await tx.delete(projects).where(eq(projects.id, projectId));

      await this.pruneOrphanTagsInTx(
        tx,
        linked.map((l) => l.tagId)
      );
    });
  }

  async listTags(projectId: string): Promise<Tag[]> {
    const rows = await this.db
      .select({ id: tags.id, name: tags.name })
      .from(projectTags)
      .innerJoin(tags, eq(tags.id, projectTags.tagId))
      .where(eq(projectTags.projectId, projectId))
      .orderBy(tags.name);
    return rows;
  }

  async addTag(projectId: string, tagName: string): Promise<AddTagResult> {
    return await this.db.transaction(async (tx) => {
      const tag = await this.findOrCreateTagInTx(tx, tagName);
      const inserted = await tx
        .insert(projectTags)
        .values({ projectId, tagId: tag.id })
        .onConflictDoNothing()
        .returning({ tagId: projectTags.tagId });

      return { tag, linked: inserted.length > 0 };
    });
  }

  async removeTag(projectId: string, tagId: string): Promise<boolean> {
    return await this.db.transaction(async (tx) => {
      const removed = await tx
        .delete(projectTags)
        .where(
          and(eq(projectTags.projectId, projectId), eq(projectTags.tagId, tagId))
        )
        .returning({ tagId: projectTags.tagId });

      if (removed.length === 0) return false;

      await this.pruneOrphanTagsInTx(tx, [tagId]);
      return true;
    });
  }

  private async findOrCreateTagInTx(tx: Transaction, name: string): Promise<Tag> {
    await tx
      .insert(tags)
      .values({ id: uuidv4(), name })
      .onConflictDoNothing({ target: tags.name });

    const [tag] = await tx
      .select({ id: tags.id, name: tags.name })
      .from(tags)
      .where(eq(tags.name, name));

    if (!tag) {
      throw new Error(`Tag "${name}" missing after upsert`);
    }
    return tag;
  }

  private async pruneOrphanTagsInTx(
    tx: Transaction,
    tagIds: readonly string[]
  ): Promise<void> {
    if (tagIds.length === 0) return;
    await tx
      .delete(tags)
      .where(
        and(
          inArray(tags.id, [...tagIds]),
          notExists(
            tx
              .select({ one: sql`1` })
              .from(projectTags)
              .where(eq(projectTags.tagId, tags.id))
          )
        )
      );
  }
}
