// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/profiles/drizzle-skill`
 * Purpose: Drizzle implementation of SkillRepository.
 * Scope: Skill CRUD. Ownership checks live in the feature layer.
 * Invariants: listByOwner orders by (position, created_at).
 * Side-effects: IO (database operations)
 * Links: ports/profile.port.ts
 * @public
 */

import { asc, eq } from "drizzle-orm";
import { v4 as uuidv4 } from "uuid";

import type { Database } from "@/adapters/server/db/client";
import type {
  CreateSkillParams,
  Skill,
  SkillPatch,
  SkillRepository,
} from "@/ports";
import { skills } from "@/shared/db";

type SkillRow = typeof skills.$inferSelect;

export class DrizzleSkillRepository implements SkillRepository {
  constructor(private readonly db: Database) {}

  async listByOwner(ownerId: string): Promise<Skill[]> {
    const rows = await this.db
      .select()
      .from(skills)
      .where(eq(skills.ownerId, ownerId))
      .orderBy(asc(skills.position), asc(skills.createdAt));
    return rows.map((row) => this.mapRow(row));
  }

  async findById(skillId: string): Promise<Skill | null> {
    const row = await this.db.query.skills.findFirst({
      where: eq(skills.id, skillId),
    });
    return row ? this.mapRow(row) : null;
  }

  async create(params: CreateSkillParams): Promise<Skill> {
    const [row] = await this.db
      .insert(skills)
      .values({
        id: uuidv4(),
        ownerId: params.ownerId,
        name: params.name,
        description: params.description,
        position: params.position,
      })
      .returning();

    if (!row) {
      throw new Error("Failed to create skill");
    }
    return this.mapRow(row);
  }

  async update(skillId: string, patch: SkillPatch): Promise<Skill> {
    const set: Partial<typeof skills.$inferInsert> = {};
    if (patch.name !== undefined) set.name = patch.name;
    if (patch.description !== undefined) set.description = patch.description;
    if (patch.position !== undefined) set.position = patch.position;

    if (Object.keys(set).length === 0) {
      const current = await this.findById(skillId);
      if (!current) {
        throw new Error(`Skill ${skillId} not found`);
      }
      return current;
    }

    const [row] = await this.db
      .update(skills)
      .set(set)
      .where(eq(skills.id, skillId))
      .returning();

    if (!row) {
      throw new Error(`Skill ${skillId} not found`);
    }
    return this.mapRow(row);
  }

  async delete(skillId: string): Promise<void> {
    await this.db.delete(skills).where(eq(skills.id, skillId));
  }

  private mapRow(row: SkillRow): Skill {
    return {
      id: row.id,
      ownerId: row.ownerId,
      name: row.name,
      description: row.description,
      position: row.position,
      createdAt: row.createdAt,
    };
  }
}
