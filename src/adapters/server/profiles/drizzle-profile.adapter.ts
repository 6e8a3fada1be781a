// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/profiles/drizzle-profile`
 * Purpose: Drizzle implementation of ProfileRepository.
 * Scope: Reads profiles joined with their user row and applies partial updates. Does not validate field content.
 * Invariants: Inactive users have no readable profile; setImage returns the replaced path from the same transaction.
 * Side-effects: IO (database operations)
 * Links: ports/profile.port.ts
 * @public
 */

import { and, eq } from "drizzle-orm";

import type { Database } from "@/adapters/server/db/client";
import type { Profile, ProfilePatch, ProfileRepository } from "@/ports";
import { profiles, users } from "@/shared/db";

type ProfileRow = typeof profiles.$inferSelect;
type ProfileUpdate = Partial<typeof profiles.$inferInsert>;

interface JoinedRow {
  profile: ProfileRow;
  username: string;
  isVerified: boolean;
  createdAt: Date;
}

export class DrizzleProfileRepository implements ProfileRepository {
  constructor(private readonly db: Database) {}

  async findByUserId(userId: string): Promise<Profile | null> {
    const [row] = await this.db
      .select({
        profile: profiles,
        username: users.username,
        isVerified: users.isVerified,
        createdAt: users.createdAt,
      })
      .from(profiles)
      .innerJoin(users, eq(users.id, profiles.userId))
      .where(and(eq(profiles.userId, userId), eq(users.isActive, true)))
      .limit(1);

    return row ? this.mapRow(row) : null;
  }

  async update(userId: string, patch: ProfilePatch, now: Date): Promise<Profile> {
    const set: ProfileUpdate = { updatedAt: now };
    if (patch.firstName !== undefined) set.firstName = patch.firstName;
    if (patch.lastName !== undefined) set.lastName = patch.lastName;
    if (patch.location !== undefined) set.location = patch.location;
    if (patch.shortIntro !== undefined) set.shortIntro = patch.shortIntro;
    if (patch.bio !== undefined) set.bio = patch.bio;
    if (patch.links) {
      const { github, x, linkedin, youtube, website } = patch.links;
      if (github !== undefined) set.github = github;
      if (x !== undefined) set.x = x;
      if (linkedin !== undefined) set.linkedin = linkedin;
      if (youtube !== undefined) set.youtube = youtube;
      if (website !== undefined) set.website = website;
    }

    await this.db.update(profiles).set(set).where(eq(profiles.userId, userId));

    const updated = await this.findByUserId(userId);
    if (!updated) {
      throw new Error(`Profile ${userId} disappeared during update`);
    }
    return updated;
  }

  async setImage(userId: string, imagePath: string, now: Date): Promise<string> {
    return await this.db.transaction(async (tx) => {
      const [current] = await tx
        .select({ profileImage: profiles.profileImage })
        .from(profiles)
        .where(eq(profiles.userId, userId))
        .for("update");

      if (!current) {
        throw new Error(`Profile ${userId} not found`);
      }

      await tx
        .update(profiles)
        .set({ profileImage: imagePath, updatedAt: now })
        .where(eq(profiles.userId, userId));

      return current.profileImage;
    });
  }

  private mapRow({ profile, username, isVerified, createdAt }: JoinedRow): Profile {
    return {
      userId: profile.userId,
      username,
      isVerified,
      firstName: profile.firstName,
      lastName: profile.lastName,
      location: profile.location,
      shortIntro: profile.shortIntro,
      bio: profile.bio,
      profileImage: profile.profileImage,
      links: {
        github: profile.github,
        x: profile.x,
        linkedin: profile.linkedin,
        youtube: profile.youtube,
        website: profile.website,
      },
      createdAt,
      updatedAt: profile.updatedAt,
    };
  }
}
