// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/profiles/model`
 * Purpose: Developer profile and skill entities.
 * Scope: Pure types. Does not contain persistence.
 * Invariants: Profile is 1:1 with User and shares its id; skills are ordered by position.
 * Side-effects: none
 * Links: ports/profile.port.ts, ports/skill.port.ts
 * @public
 */

export const PROFILE_LINK_FIELDS = [
  "github",
  "x",
  "linkedin",
  "youtube",
  "website",
] as const;

export type ProfileLinkField = (typeof PROFILE_LINK_FIELDS)[number];

export type ProfileLinks = Record<ProfileLinkField, string | null>;

export interface Profile {
  userId: string;
  username: string;
  isVerified: boolean;
  firstName: string | null;
  lastName: string | null;
  location: string | null;
  shortIntro: string | null;
  bio: string | null;
  profileImage: string;
  links: ProfileLinks;
  createdAt: Date;
  updatedAt: Date;
}

/**
 * Partial update: an omitted key leaves the field unchanged, null clears it.
 */
export interface ProfilePatch {
  firstName?: string | null;
  lastName?: string | null;
  location?: string | null;
  shortIntro?: string | null;
  bio?: string | null;
  links?: Partial<ProfileLinks>;
}

export interface Skill {
  id: string;
  ownerId: string;
  name: string;
  /** Skills with a description render as detailed cards, others as plain tags. */
  description: string | null;
  position: number;
  createdAt: Date;
}

export interface SkillPatch {
  name?: string;
  description?: string | null;
  position?: number;
}

/** Row in developer search results. */
export interface DeveloperSummary {
  userId: string;
  username: string;
  firstName: string | null;
  lastName: string | null;
  location: string | null;
  shortIntro: string | null;
  profileImage: string;
  skills: Pick<Skill, "id" | "name" | "description">[];
  createdAt: Date;
}
