// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/profiles/public`
 * Purpose: Single entrypoint for the profiles feature.
 * Scope: Re-exports profile and skill operations.
 * Side-effects: none
 * Links: Used by src/app/_facades/profiles
 * @public
 */

export {
  deactivateAccount,
  getProfile,
  type ProfileReadDeps,
  type ProfileView,
  updateProfile,
  updateProfileImage,
} from "./services/profiles";
export {
  addSkill,
  deleteSkill,
  listSkills,
  type SkillDeps,
  updateSkill,
} from "./services/skills";
