// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@contracts/profiles.me.v1.contract`
 * Purpose: Contracts for the caller's own profile: read, edit, image upload and deactivation.
 * Scope: Wire shapes for /api/v1/me/profile and /api/v1/me/profile/image. Does not contain business logic.
 * Invariants:
 *   - Omitted keys leave fields unchanged; null or blank clears them
 *   - Unknown keys are rejected
 *   - Image upload is multipart with a single `image` field
 * Side-effects: none
 * Links: /api/v1/me/profile routes, features/profiles/services/profiles
 * @internal
 */

import { z } from "zod";

import { OptionalTextInput } from "./common.v1.contract";
import { ProfileSchema } from "./profiles.read.v1.contract";

export const profilesMeReadOperation = {
  id: "profiles.me.read.v1",
  summary: "Read the caller's profile",
  description: "Same shape as the public profile read, for the session user.",
  input: z.object({}),
  output: ProfileSchema,
} as const;

export const profilesUpdateOperation = {
  id: "profiles.update.v1",
  summary: "Edit the caller's profile",
  description: "Partial update of names, location, intro, bio and links.",
  input: z
    .object({
      firstName: OptionalTextInput,
      lastName: OptionalTextInput,
      location: OptionalTextInput,
      shortIntro: OptionalTextInput,
      bio: OptionalTextInput,
      links: z
        .object({
          github: OptionalTextInput,
          x: OptionalTextInput,
          linkedin: OptionalTextInput,
          youtube: OptionalTextInput,
          website: OptionalTextInput,
        })
        .strict()
        .optional(),
    })
    .strict(),
  output: ProfileSchema,
} as const;

export const profilesImageOperation = {
  id: "profiles.image.v1",
  summary: "Replace the caller's profile image",
  description:
    "Accepts PNG, JPEG or GIF, re-encodes to JPEG and removes the previous upload.",
  input: z.object({}), // multipart/form-data, field "image"
  output: ProfileSchema,
} as const;

export const profilesDeactivateOperation = {
  id: "profiles.deactivate.v1",
  summary: "Deactivate the caller's account",
  description:
    "Soft-deletes the account: it can no longer log in and is hidden from profiles and search.",
  input: z.object({}),
  output: z.object({}), // 204 No Content
} as const;

export type ProfilesUpdateInput = z.infer<typeof profilesUpdateOperation.input>;
