// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/profiles/services/profiles`
 * Purpose: Unit tests for reading, editing and deactivating developer profiles.
 * Scope: Service rules over in-memory repositories and the fake image pipeline.
 * Side-effects: none
 * Links: src/features/profiles/services/profiles.ts
 * @public
 */

import {
  createInMemoryDeps,
  DEFAULT_PROFILE_IMAGE,
  type InMemoryDeps,
  seedUser,
} from "@tests/_fakes";
import { beforeEach, describe, expect, it } from "vitest";

import type { User } from "@/core";
import { FieldValidationError, NotFoundError } from "@/core";
import {
  addSkill,
  deactivateAccount,
  getProfile,
  updateProfile,
  updateProfileImage,
} from "@/features/profiles/public";
import { createProject } from "@/features/projects/public";

const avatar = () => ({
  filename: "me.png",
  mimeType: "image/png",
  bytes: new Uint8Array([1, 2, 3]),
});

describe("features/profiles/services/profiles", () => {
  let deps: InMemoryDeps;
  let ada: User;

  beforeEach(async () => {
    deps = createInMemoryDeps();
    ada = await seedUser(deps, "ada", { firstName: "Ada", lastName: "Lovelace" });
  });

  describe("getProfile", () => {
    it("returns the profile with its skills and projects", async () => {
      await addSkill(deps, ada.id, { name: "TypeScript" });
      await addSkill(deps, ada.id, { name: "Postgres", description: "Schema design" });
      await createProject(deps, ada.id, { title: "Engine" });

      const view = await getProfile(deps, ada.id);

      expect(view.profile).toMatchObject({
        userId: ada.id,
        username: "ada",
        firstName: "Ada",
        lastName: "Lovelace",
        profileImage: DEFAULT_PROFILE_IMAGE,
        isVerified: false,
      });
      expect(view.skills.map((s) => s.name)).toEqual(["TypeScript", "Postgres"]);
      expect(view.projects.map((p) => p.title)).toEqual(["Engine"]);
    });

    it("hides unknown and deactivated users", async () => {
      await expect(
        getProfile(deps, "00000000-0000-4000-8000-00000000ffff")
      ).rejects.toBeInstanceOf(NotFoundError);

      await deactivateAccount(deps, ada.id);
      await expect(getProfile(deps, ada.id)).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe("updateProfile", () => {
    it("merges fields and links; blank values clear them", async () => {
      await updateProfile(deps, ada.id, {
        location: "London",
        links: { github: "https://github.com/ada" },
      });
      deps.clock.advanceSeconds(30);

      const profile = await updateProfile(deps, ada.id, {
        firstName: "   ",
        links: { website: "https://ada.dev" },
      });

      expect(profile.firstName).toBeNull();
      expect(profile.lastName).toBe("Lovelace");
      expect(profile.location).toBe("London");
      expect(profile.links).toEqual({
        github: "https://github.com/ada",
        x: null,
        linkedin: null,
        youtube: null,
        website: "https://ada.dev",
      });
      expect(profile.updatedAt.toISOString()).toBe("2025-03-01T12:00:30.000Z");
    });

    it("rejects non-http links and over-long text", async () => {
      const attempt = updateProfile(deps, ada.id, {
        shortIntro: "x".repeat(201),
        links: { github: "javascript:alert(1)" },
      });

      await expect(attempt).rejects.toBeInstanceOf(FieldValidationError);
      await expect(attempt).rejects.toMatchObject({
        fieldErrors: {
          shortIntro: ["Must be at most 200 characters."],
          github: ["Enter a valid URL."],
        },
      });
    });
  });

  describe("updateProfileImage", () => {
    it("stores the new image and keeps the shared default", async () => {
      const profile = await updateProfileImage(deps, ada.id, avatar());

      expect(profile.profileImage).toBe("/uploads/test/image-1.jpg");
      expect(deps.imageStore.removed).toEqual([]);
    });

    it("removes the image it replaces", async () => {
      await updateProfileImage(deps, ada.id, avatar());
      const profile = await updateProfileImage(deps, ada.id, avatar());

      expect(profile.profileImage).toBe("/uploads/test/image-2.jpg");
      expect(deps.imageStore.removed).toEqual(["/uploads/test/image-1.jpg"]);
    });
  });

  describe("deactivateAccount", () => {
    it("soft-deletes once", async () => {
      await deactivateAccount(deps, ada.id);

      expect((await deps.users.findById(ada.id))?.isActive).toBe(false);
      await expect(deactivateAccount(deps, ada.id)).rejects.toBeInstanceOf(
        NotFoundError
      );
    });
  });
});
