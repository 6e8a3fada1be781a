// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@app/_facades/profiles/skills.server`
 * Purpose: App-layer wiring for the caller's skills.
 * Scope: Server-only facade. Does not perform HTTP handling or persistence.
 * Invariants: Skills are always scoped to the session user.
 * Side-effects: IO (via SkillRepository port)
 * Links: features/profiles/services/skills, contracts/skills.v1.contract
 * @public
 */

import { getContainer } from "@/bootstrap/container";
import type { SkillDto } from "@/contracts/profiles.read.v1.contract";
import type {
  SkillsCreateInput,
  SkillsUpdateInput,
} from "@/contracts/skills.v1.contract";
import {
  addSkill,
  deleteSkill,
  listSkills,
  updateSkill,
} from "@/features/profiles/public";
import type { SessionUser } from "@/shared/auth";
import {
  EVENT_NAMES,
  logEvent,
  type RequestContext,
} from "@/shared/observability";

import { toSkillDto } from "./profiles.server";

function logSkillChange(
  ctx: RequestContext,
  userId: string,
  skillId: string,
  change: "added" | "updated" | "removed"
): void {
  logEvent(ctx.log, EVENT_NAMES.PROFILES_SKILL_CHANGED, {
    reqId: ctx.reqId,
    routeId: ctx.routeId,
    userId,
    skillId,
    change,
  });
}

export async function listSkillsFacade(params: {
  sessionUser: SessionUser;
}): Promise<SkillDto[]> {
  const skills = await listSkills(getContainer(), params.sessionUser.id);
  return skills.map(toSkillDto);
}

export async function addSkillFacade(
  params: { sessionUser: SessionUser; input: SkillsCreateInput },
  ctx: RequestContext
): Promise<SkillDto> {
  const skill = await addSkill(
    getContainer(),
    params.sessionUser.id,
    params.input
  );
  logSkillChange(ctx, params.sessionUser.id, skill.id, "added");
  return toSkillDto(skill);
}

export async function updateSkillFacade(
  params: {
    sessionUser: SessionUser;
    skillId: string;
    patch: SkillsUpdateInput;
  },
  ctx: RequestContext
): Promise<SkillDto> {
  const skill = await updateSkill(
    getContainer(),
    params.sessionUser.id,
    params.skillId,
    params.patch
  );
  logSkillChange(ctx, params.sessionUser.id, skill.id, "updated");
  return toSkillDto(skill);
}

export async function deleteSkillFacade(
  params: { sessionUser: SessionUser; skillId: string },
  ctx: RequestContext
): Promise<void> {
  await deleteSkill(getContainer(), params.sessionUser.id, params.skillId);
  logSkillChange(ctx, params.sessionUser.id, params.skillId, "removed");
}
