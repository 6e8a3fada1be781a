// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/profiles/services/profiles`
 * Purpose: Public developer profiles: read with skills and projects, partial edit, image swap, deactivation.
 * Scope: Orchestrates profile, skill, project and user ports. Does not authenticate; callers pass the acting user id.
 * Invariants:
 * - Omitted patch fields are left alone; null clears.
 * - Inactive users read as not found.
 * Side-effects: IO (via ports)
 * Links: ports/profile.port.ts, features/uploads
 * @public
 */

import type {
  ImageUpload,
  Profile,
  ProfilePatch,
  ProjectDetail,
  Skill,
} from "@/core";
import {
  FieldValidationError,
  isHttpUrl,
  NotFoundError,
  PROFILE_LINK_FIELDS,
  PROFILE_TEXT_MAX_LENGTH,
} from "@/core";
import {
  type ImagePipelineDeps,
  replaceImage,
} from "@/features/uploads/public";
import type {
  Clock,
  ProfileRepository,
  ProjectRepository,
  SkillRepository,
  UserRepository,
} from "@/ports";

export interface ProfileView {
  profile: Profile;
  skills: Skill[];
  projects: ProjectDetail[];
}

export interface ProfileReadDeps {
  profiles: ProfileRepository;
  skills: SkillRepository;
  projects: ProjectRepository;
}

export async function getProfile(
  deps: ProfileReadDeps,
  userId: string
): Promise<ProfileView> {
  const profile = await deps.profiles.findByUserId(userId);
  if (!profile) {
    throw new NotFoundError("profile", userId);
  }

  const [skills, projects] = await Promise.all([
    deps.skills.listByOwner(userId),
    deps.projects.listByOwner(userId),
  ]);
  return { profile, skills, projects };
}

function profilePatchViolations(patch: ProfilePatch): Record<string, string[]> {
  const errors: Record<string, string[]> = {};
  const textFields = ["firstName", "lastName", "location", "shortIntro"] as const;

  for (const field of textFields) {
    const value = patch[field];
    if (typeof value === "string" && value.length > PROFILE_TEXT_MAX_LENGTH) {
      errors[field] = [
        `Must be at most ${PROFILE_TEXT_MAX_LENGTH} characters.`,
      ];
    }
  }

  for (const field of PROFILE_LINK_FIELDS) {
    const value = patch.links?.[field];
    if (typeof value === "string" && !isHttpUrl(value)) {
      errors[field] = ["Enter a valid URL."];
    }
  }
  return errors;
}

/** Blank strings clear the field. */
function normalizePatch(patch: ProfilePatch): ProfilePatch {
  const blankToNull = (v: string | null | undefined) =>
    typeof v === "string" && v.trim() === "" ? null : v;

  const normalized: ProfilePatch = {};
  if (patch.firstName !== undefined) normalized.firstName = blankToNull(patch.firstName) ?? null;
  if (patch.lastName !== undefined) normalized.lastName = blankToNull(patch.lastName) ?? null;
  if (patch.location !== undefined) normalized.location = blankToNull(patch.location) ?? null;
  if (patch.shortIntro !== undefined) normalized.shortIntro = blankToNull(patch.shortIntro) ?? null;
  if (patch.bio !== undefined) normalized.bio = blankToNull(patch.bio) ?? null;
  if (patch.links) {
    const links: NonNullable<ProfilePatch["links"]> = {};
    for (const field of PROFILE_LINK_FIELDS) {
      const value = patch.links[field];
      if (value !== undefined) links[field] = blankToNull(value) ?? null;
    }
    normalized.links = links;
  }
  return normalized;
}

export async function updateProfile(
  deps: { profiles: ProfileRepository; clock: Clock },
  userId: string,
  patch: ProfilePatch
): Promise<Profile> {
  const normalized = normalizePatch(patch);
  const errors = profilePatchViolations(normalized);
  if (Object.keys(errors).length > 0) {
    throw new FieldValidationError(errors);
  }

  const existing = await deps.profiles.findByUserId(userId);
  if (!existing) {
    throw new NotFoundError("profile", userId);
  }

  return deps.profiles.update(userId, normalized, new Date(deps.clock.now()));
}

export async function updateProfileImage(
  deps: ImagePipelineDeps & { profiles: ProfileRepository; clock: Clock },
  userId: string,
  upload: ImageUpload
): Promise<Profile> {
  const existing = await deps.profiles.findByUserId(userId);
  if (!existing) {
    throw new NotFoundError("profile", userId);
  }

  await replaceImage(deps, upload, (storedPath) =>
    deps.profiles.setImage(userId, storedPath, new Date(deps.clock.now()))
  );

  const updated = await deps.profiles.findByUserId(userId);
  if (!updated) {
    throw new NotFoundError("profile", userId);
  }
  return updated;
}

export async function deactivateAccount(
  deps: { users: UserRepository },
  userId: string
): Promise<void> {
  const user = await deps.users.findById(userId);
  if (!user || !user.isActive) {
    throw new NotFoundError("user", userId);
  }
  await deps.users.deactivate(userId);
}
