// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@app/_facades/profiles/profiles.server`
 * Purpose: App-layer wiring for developer profiles: public read, own read/edit, image upload and deactivation.
 * Scope: Server-only facade. Maps Date to ISO strings; does not perform HTTP handling or persistence.
 * Invariants: The caller's identity always comes from the session, never from input.
 * Side-effects: IO (via ProfileRepository, SkillRepository, ProjectRepository, UserRepository, image ports), metrics
 * Links: features/profiles/services/profiles, contracts/profiles.*.v1.contract
 * @public
 */

import { getContainer } from "@/bootstrap/container";
import type { ProfilesUpdateInput } from "@/contracts/profiles.me.v1.contract";
import type {
  ProfileDto,
  ProfilesGetOutput,
  SkillDto,
} from "@/contracts/profiles.read.v1.contract";
import type { ImageUpload, Profile, Skill } from "@/core";
import {
  deactivateAccount,
  getProfile,
  updateProfile,
  updateProfileImage,
} from "@/features/profiles/public";
import type { SessionUser } from "@/shared/auth";
import {
  EVENT_NAMES,
  logEvent,
  type RequestContext,
} from "@/shared/observability";

import { toProjectDto } from "../projects/projects.server";
import { trackImageUpload } from "../uploads/trackImageUpload.server";

export function toProfileDto(profile: Profile): ProfileDto {
  return {
    userId: profile.userId,
    username: profile.username,
    isVerified: profile.isVerified,
    firstName: profile.firstName,
    lastName: profile.lastName,
    location: profile.location,
    shortIntro: profile.shortIntro,
    bio: profile.bio,
    profileImage: profile.profileImage,
    links: { ...profile.links },
    createdAt: profile.createdAt.toISOString(),
    updatedAt: profile.updatedAt.toISOString(),
  };
}

export function toSkillDto(skill: Skill): SkillDto {
  return {
    id: skill.id,
    name: skill.name,
    description: skill.description,
    position: skill.position,
  };
}

export async function getProfileFacade(
  userId: string
): Promise<ProfilesGetOutput> {
  const view = await getProfile(getContainer(), userId);
  return {
    profile: toProfileDto(view.profile),
    skills: view.skills.map(toSkillDto),
    projects: view.projects.map(toProjectDto),
  };
}

export async function getOwnProfileFacade(params: {
  sessionUser: SessionUser;
}): Promise<ProfileDto> {
  const view = await getProfile(getContainer(), params.sessionUser.id);
  return toProfileDto(view.profile);
}

export async function updateProfileFacade(
  params: { sessionUser: SessionUser; patch: ProfilesUpdateInput },
  ctx: RequestContext
): Promise<ProfileDto> {
  const profile = await updateProfile(
    getContainer(),
    params.sessionUser.id,
    params.patch
  );

  logEvent(ctx.log, EVENT_NAMES.PROFILES_UPDATED, {
    reqId: ctx.reqId,
    routeId: ctx.routeId,
    userId: params.sessionUser.id,
    fields: Object.keys(params.patch),
  });
  return toProfileDto(profile);
}

export async function updateProfileImageFacade(
  params: { sessionUser: SessionUser; upload: ImageUpload },
  ctx: RequestContext
): Promise<ProfileDto> {
  const container = getContainer();

  const profile = await trackImageUpload("profile", () =>
    updateProfileImage(
      { ...container, maxUploadBytes: container.config.maxUploadBytes },
      params.sessionUser.id,
      params.upload
    )
  );

  logEvent(ctx.log, EVENT_NAMES.PROFILES_IMAGE_UPDATED, {
    reqId: ctx.reqId,
    routeId: ctx.routeId,
    userId: params.sessionUser.id,
    profileImage: profile.profileImage,
  });
  return toProfileDto(profile);
}

export async function deactivateAccountFacade(
  params: { sessionUser: SessionUser },
  ctx: RequestContext
): Promise<void> {
  await deactivateAccount(getContainer(), params.sessionUser.id);

  logEvent(ctx.log, EVENT_NAMES.PROFILES_DEACTIVATED, {
    reqId: ctx.reqId,
    routeId: ctx.routeId,
    userId: params.sessionUser.id,
  });
}
