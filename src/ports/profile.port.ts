// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports/profile.port`
 * Purpose: Persistence port for developer profiles and their skills.
 * Scope: Profile reads/updates and skill CRUD. Does not validate input or handle images.
 * Invariants: Inactive users have no visible profile; skills returned in (position, createdAt) order.
 * Side-effects: none (interface only)
 * Links: adapters/server/profiles/drizzle-profile.adapter.ts
 * @public
 */

import type { Profile, ProfilePatch, Skill, SkillPatch } from "@/core";

export type { Profile, ProfilePatch, Skill, SkillPatch } from "@/core";

export interface ProfileRepository {
  /** Active users only. */
  findByUserId(userId: string): Promise<Profile | null>;

  update(userId: string, patch: ProfilePatch, now: Date): Promise<Profile>;

  /**
   * Replace the profile image.
   * @returns the previous image path
   */
  setImage(userId: string, imagePath: string, now: Date): Promise<string>;
}

export interface CreateSkillParams {
  ownerId: string;
  name: string;
  description: string | null;
  position: number;
}

export interface SkillRepository {
  listByOwner(ownerId: string): Promise<Skill[]>;

  findById(skillId: string): Promise<Skill | null>;

  create(params: CreateSkillParams): Promise<Skill>;

  update(skillId: string, patch: SkillPatch): Promise<Skill>;

  delete(skillId: string): Promise<void>;
}
