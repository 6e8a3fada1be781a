// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/profiles/rules`
 * Purpose: Pure profile rules: skill ordering and image replacement.
 * Scope: Computation only. Does not touch storage.
 * Invariants: Default images are never deleted from storage.
 * Side-effects: none
 * Links: features/profiles/services
 * @public
 */

import type { Skill } from "./model";

export const DEFAULT_IMAGES: ReadonlySet<string> = new Set([
  "/images/default.jpg",
  "/images/default-project.jpg",
]);

export const SKILL_NAME_MAX_LENGTH = 200;

/** Position for a skill appended after the existing ones. */
export function nextSkillPosition(existing: readonly Pick<Skill, "position">[]): number {
  return existing.reduce((max, s) => Math.max(max, s.position), -1) + 1;
}

export function sortSkills<T extends Pick<Skill, "position" | "createdAt">>(
  skills: readonly T[]
): T[] {
  return [...skills].sort(
    (a, b) =>
      a.position - b.position || a.createdAt.getTime() - b.createdAt.getTime()
  );
}

/** Whether a previously stored image should be removed after replacement. */
export function isRemovableImage(path: string | null | undefined): path is string {
  return !!path && !DEFAULT_IMAGES.has(path);
}

export const PROFILE_TEXT_MAX_LENGTH = 200;

export function isHttpUrl(value: string): boolean {
  let url: URL;
  try {
    url = new URL(value);
  } catch {
    return false;
  }
  return url.protocol === "http:" || url.protocol === "https:";
}
