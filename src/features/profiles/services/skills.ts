// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/profiles/services/skills`
 * Purpose: Skill list management for the acting user.
 * Scope: Add (appended), edit, delete, list. Ownership enforced here.
 * Invariants: NotFound is checked before ownership.
 * Side-effects: IO (via ports)
 * Links: ports/profile.port.ts
 * @public
 */

import type { Skill, SkillPatch } from "@/core";
import {
  FieldValidationError,
  ForbiddenError,
  NotFoundError,
  nextSkillPosition,
  SKILL_NAME_MAX_LENGTH,
} from "@/core";
import type { SkillRepository } from "@/ports";

export interface SkillDeps {
  skills: SkillRepository;
}

function cleanName(raw: string): string {
  const name = raw.trim();
  if (name.length === 0 || name.length > SKILL_NAME_MAX_LENGTH) {
    throw new FieldValidationError({
      name: [`Skill name must be between 1 and ${SKILL_NAME_MAX_LENGTH} characters.`],
    });
  }
  return name;
}

function cleanDescription(raw: string | null | undefined): string | null {
  const trimmed = raw?.trim();
  return trimmed ? trimmed : null;
}

async function findOwnedSkill(
  deps: SkillDeps,
  userId: string,
  skillId: string,
  action: string
): Promise<Skill> {
  const skill = await deps.skills.findById(skillId);
  if (!skill) {
    throw new NotFoundError("skill", skillId);
  }
  if (skill.ownerId !== userId) {
    throw new ForbiddenError(action);
  }
  return skill;
}

export async function listSkills(deps: SkillDeps, userId: string): Promise<Skill[]> {
  return deps.skills.listByOwner(userId);
}

export async function addSkill(
  deps: SkillDeps,
  userId: string,
  input: { name: string; description?: string | null | undefined }
): Promise<Skill> {
  const name = cleanName(input.name);
  const existing = await deps.skills.listByOwner(userId);

  return deps.skills.create({
    ownerId: userId,
    name,
    description: cleanDescription(input.description),
    position: nextSkillPosition(existing),
  });
}

export async function updateSkill(
  deps: SkillDeps,
  userId: string,
  skillId: string,
  patch: SkillPatch
): Promise<Skill> {
  await findOwnedSkill(deps, userId, skillId, "update skill");

  const cleaned: SkillPatch = {};
  if (patch.name !== undefined) cleaned.name = cleanName(patch.name);
  if (patch.description !== undefined) {
    cleaned.description = cleanDescription(patch.description);
  }
  if (patch.position !== undefined) cleaned.position = patch.position;

  return deps.skills.update(skillId, cleaned);
}

export async function deleteSkill(
  deps: SkillDeps,
  userId: string,
  skillId: string
): Promise<void> {
  await findOwnedSkill(deps, userId, skillId, "delete skill");
  await deps.skills.delete(skillId);
}
