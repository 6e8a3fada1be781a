// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@contracts/profiles.read.v1.contract`
 * Purpose: Contracts for reading a developer profile and searching developers.
 * Scope: Wire shapes for GET /api/v1/profiles and GET /api/v1/profiles/{userId}. Does not contain business logic.
 * Invariants:
 *   - Deactivated accounts never appear (404 on read, absent from search)
 *   - Search results are newest profile first
 * Side-effects: none
 * Links: /api/v1/profiles routes, features/profiles, features/search
 * @internal
 */

import { z } from "zod";

import { IdSchema, PageQuerySchema, pageOf } from "./common.v1.contract";
import { ProjectSchema } from "./projects.v1.contract";

export const ProfileLinksSchema = z.object({
  github: z.string().nullable(),
  x: z.string().nullable(),
  linkedin: z.string().nullable(),
  youtube: z.string().nullable(),
  website: z.string().nullable(),
});

export const ProfileSchema = z.object({
  userId: IdSchema,
  username: z.string(),
  isVerified: z.boolean(),
  firstName: z.string().nullable(),
  lastName: z.string().nullable(),
  location: z.string().nullable(),
  shortIntro: z.string().nullable(),
  bio: z.string().nullable(),
  profileImage: z.string(),
  links: ProfileLinksSchema,
  createdAt: z.string().datetime(),
  updatedAt: z.string().datetime(),
});

export const SkillSchema = z.object({
  id: IdSchema,
  name: z.string(),
  description: z.string().nullable(),
  position: z.number().int(),
});

export const DeveloperSummarySchema = z.object({
  userId: IdSchema,
  username: z.string(),
  firstName: z.string().nullable(),
  lastName: z.string().nullable(),
  location: z.string().nullable(),
  shortIntro: z.string().nullable(),
  profileImage: z.string(),
  skills: z.array(SkillSchema.omit({ position: true })),
  createdAt: z.string().datetime(),
});

export const profilesGetOperation = {
  id: "profiles.get.v1",
  summary: "Read a developer profile",
  description:
    "Returns the profile with its skills (ordered) and the owner's projects.",
  input: z.object({ userId: IdSchema }),
  output: z.object({
    profile: ProfileSchema,
    skills: z.array(SkillSchema),
    projects: z.array(ProjectSchema),
  }),
} as const;

export const profilesSearchOperation = {
  id: "profiles.search.v1",
  summary: "Search developers",
  description:
    "Free-text search over name, intro and skills, narrowed by repeated skill filters. Every skill filter must match.",
  input: PageQuerySchema.extend({
    q: z.string().optional(),
    skill: z.array(z.string()).optional(),
  }),
  output: pageOf(DeveloperSummarySchema),
} as const;

export type ProfileDto = z.infer<typeof ProfileSchema>;
export type SkillDto = z.infer<typeof SkillSchema>;
export type DeveloperSummaryDto = z.infer<typeof DeveloperSummarySchema>;
export type ProfilesGetOutput = z.infer<typeof profilesGetOperation.output>;
export type ProfilesSearchInput = z.infer<typeof profilesSearchOperation.input>;
export type ProfilesSearchOutput = z.infer<
  typeof profilesSearchOperation.output
>;
