// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/projects/services/projects`
 * Purpose: Unit tests for project CRUD, featured images and tag management.
 * Scope: Service rules over InMemoryProjectRepository.
 * Invariants: Only the owner mutates a project; tag names are normalized; orphan tags are pruned.
 * Side-effects: none
 * Links: src/features/projects/services/projects.ts
 * @public
 */

import {
  createInMemoryDeps,
  DEFAULT_PROJECT_IMAGE,
  type InMemoryDeps,
  seedUser,
} from "@tests/_fakes";
import { beforeEach, describe, expect, it } from "vitest";

import type { User } from "@/core";
import {
  DuplicateTagError,
  FieldValidationError,
  ForbiddenError,
  InvalidImageError,
  NotFoundError,
} from "@/core";
import {
  addTag,
  createProject,
  deleteProject,
  getProject,
  listTags,
  removeTag,
  submitReview,
  updateProject,
  updateProjectImage,
} from "@/features/projects/public";

describe("features/projects/services/projects", () => {
  let deps: InMemoryDeps;
  let ada: User;
  let grace: User;

  beforeEach(async () => {
    deps = createInMemoryDeps();
    ada = await seedUser(deps, "ada");
    grace = await seedUser(deps, "grace");
  });

  describe("createProject", () => {
    it("normalizes the input and links deduplicated tags", async () => {
      const project = await createProject(deps, ada.id, {
        title: "  Analytical Engine ",
        description: "   ",
        sourceCode: "https://github.com/ada/engine",
        tags: ["React", " react ", "Node"],
      });

      expect(project).toMatchObject({
        ownerId: ada.id,
        title: "Analytical Engine",
        description: null,
        demoLink: null,
        sourceCode: "https://github.com/ada/engine",
        featuredImage: DEFAULT_PROJECT_IMAGE,
        voteTotal: 0,
        voteRatio: 0,
        owner: { id: ada.id, username: "ada" },
      });
      expect(project.tags.map((t) => t.name)).toEqual(["node", "react"]);
    });

    it("requires a title", async () => {
      await expect(
        createProject(deps, ada.id, { title: " " })
      ).rejects.toMatchObject({
        fieldErrors: { title: ["Title must be between 1 and 200 characters."] },
      });
    });
  });

  describe("updateProject", () => {
    it("lets the owner edit and clear fields", async () => {
      const project = await createProject(deps, ada.id, {
        title: "Engine",
        demoLink: "https://engine.dev",
      });

      const updated = await updateProject(deps, ada.id, project.id, {
        title: "Difference Engine",
        demoLink: "",
      });

      expect(updated.title).toBe("Difference Engine");
      expect(updated.demoLink).toBeNull();
    });

    it("forbids everyone else", async () => {
      const project = await createProject(deps, ada.id, { title: "Engine" });

      await expect(
        updateProject(deps, grace.id, project.id, { title: "Mine now" })
      ).rejects.toBeInstanceOf(ForbiddenError);
      await expect(deleteProject(deps, grace.id, project.id)).rejects.toBeInstanceOf(
        ForbiddenError
      );
    });
  });

  describe("deleteProject", () => {
    it("removes the project with its reviews and orphaned tags", async () => {
      const project = await createProject(deps, ada.id, {
        title: "Engine",
        tags: ["rust"],
      });
      await submitReview(deps, grace.id, project.id, { value: "up" });

      await deleteProject(deps, ada.id, project.id);

      await expect(getProject(deps, project.id)).rejects.toBeInstanceOf(NotFoundError);
      expect(deps.store.reviews.size).toBe(0);
      expect(deps.store.tags.size).toBe(0);
    });
  });

  describe("updateProjectImage", () => {
    it("replaces the featured image", async () => {
      const project = await createProject(deps, ada.id, { title: "Engine" });

      const updated = await updateProjectImage(deps, ada.id, project.id, {
        filename: "shot.jpg",
        mimeType: "image/jpeg",
        bytes: new Uint8Array([9, 9]),
      });

      expect(updated.featuredImage).toBe("/uploads/test/image-1.jpg");
      expect(deps.imageStore.removed).toEqual([]);
    });

    it("leaves the project untouched when the upload is rejected", async () => {
      const project = await createProject(deps, ada.id, { title: "Engine" });

      await expect(
        updateProjectImage(deps, ada.id, project.id, {
          filename: "notes.txt",
          mimeType: "text/plain",
          bytes: new Uint8Array([1]),
        })
      ).rejects.toBeInstanceOf(InvalidImageError);
      expect((await getProject(deps, project.id)).featuredImage).toBe(
        DEFAULT_PROJECT_IMAGE
      );
      expect(deps.imageStore.files.size).toBe(0);
    });
  });

  describe("tags", () => {
    it("adds a normalized tag once", async () => {
      const project = await createProject(deps, ada.id, { title: "Engine" });

      const tag = await addTag(deps, ada.id, project.id, "  GraphQL ");
      expect(tag.name).toBe("graphql");

      await expect(
        addTag(deps, ada.id, project.id, "graphql")
      ).rejects.toBeInstanceOf(DuplicateTagError);
      expect(await listTags(deps, project.id)).toEqual([tag]);
    });

    it("reuses an existing tag across projects", async () => {
      const first = await createProject(deps, ada.id, { title: "One", tags: ["go"] });
      const second = await createProject(deps, ada.id, { title: "Two" });

      const tag = await addTag(deps, ada.id, second.id, "Go");
      expect(tag.id).toBe(first.tags[0]?.id);
    });

    it("rejects blank tag names", async () => {
      const project = await createProject(deps, ada.id, { title: "Engine" });
      await expect(addTag(deps, ada.id, project.id, "  ")).rejects.toBeInstanceOf(
        FieldValidationError
      );
    });

    it("removes a link and prunes the orphaned tag", async () => {
      const project = await createProject(deps, ada.id, {
        title: "Engine",
        tags: ["rust"],
      });
      const [rust] = project.tags;
      if (!rust) throw new Error("tag missing");

      await removeTag(deps, ada.id, project.id, rust.id);

      expect(await listTags(deps, project.id)).toEqual([]);
      expect(deps.store.tags.has(rust.id)).toBe(false);
      await expect(
        removeTag(deps, ada.id, project.id, rust.id)
      ).rejects.toBeInstanceOf(NotFoundError);
    });

    it("only lets the owner tag", async () => {
      const project = await createProject(deps, ada.id, { title: "Engine" });
      await expect(
        addTag(deps, grace.id, project.id, "spam")
      ).rejects.toBeInstanceOf(ForbiddenError);
    });
  });
});
