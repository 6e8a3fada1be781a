// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/profiles/public`
 * Purpose: Public API for the profiles domain.
 * Scope: Barrel export. Does not expose internal implementation details.
 * Invariants: Only exports stable public interfaces and functions.
 * Side-effects: none (re-exports only)
 * Links: Imported via @/core
 * @public
 */

export type {
  DeveloperSummary,
  Profile,
  ProfileLinkField,
  ProfileLinks,
  ProfilePatch,
  Skill,
  SkillPatch,
} from "./model";
export { PROFILE_LINK_FIELDS } from "./model";
export {
  DEFAULT_IMAGES,
  isHttpUrl,
  isRemovableImage,
  nextSkillPosition,
  PROFILE_TEXT_MAX_LENGTH,
  SKILL_NAME_MAX_LENGTH,
  sortSkills,
} from "./rules";
