// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/auth/services/credentials`
 * Purpose: Unit tests for sign-up, authentication and password change against in-memory repositories.
 * Scope: Service orchestration only. Does NOT test bcrypt or SMTP.
 * Invariants: Sign-up reports every field problem at once; failed mail does not block account creation.
 * Side-effects: none
 * Links: src/features/auth/services/credentials.ts
 * @public
 */

import {
  createInMemoryDeps,
  type InMemoryDeps,
  SEEDED_PASSWORD,
  seedUser,
} from "@tests/_fakes";
import { beforeEach, describe, expect, it } from "vitest";

import {
  FieldValidationError,
  InvalidCredentialsError,
  NotFoundError,
  passwordPolicyViolations,
} from "@/core";
import {
  authenticate,
  changePassword,
  signUp,
  VERIFICATION_SUBJECT,
} from "@/features/auth/public";

describe("features/auth/services/credentials", () => {
  let deps: InMemoryDeps;

  beforeEach(() => {
    deps = createInMemoryDeps();
  });

  describe("signUp", () => {
    it("creates an unverified user with a profile and mails a verification link", async () => {
      const result = await signUp(deps, {
        username: " ada ",
        email: "Ada@Example.com",
        password: SEEDED_PASSWORD,
        firstName: "Ada",
      });

      expect(result.verificationSent).toBe(true);
      expect(result.user).toEqual({
        id: result.user.id,
        username: "ada",
        email: "ada@example.com",
        isVerified: false,
      });

      const profile = await deps.profiles.findByUserId(result.user.id);
      expect(profile?.firstName).toBe("Ada");
      expect(profile?.lastName).toBeNull();

      const mail = deps.mailer.lastTo("ada@example.com");
      expect(mail?.subject).toBe(VERIFICATION_SUBJECT);
      expect(mail?.text).toContain(
        `http://localhost:3000/verify-email?uid=${result.user.id}&token=`
      );
    });

    it("stores only the hashed password", async () => {
      const { user } = await signUp(deps, {
        username: "ada",
        email: "ada@example.com",
        password: SEEDED_PASSWORD,
      });
      expect((await deps.users.findById(user.id))?.passwordHash).toBe(
        `hashed:${SEEDED_PASSWORD}`
      );
    });

    it("collects every field problem before failing", async () => {
      await seedUser(deps, "ada");

      const attempt = signUp(deps, {
        username: "ADA",
        email: "ada@example.com",
        password: "weak",
      });

      await expect(attempt).rejects.toBeInstanceOf(FieldValidationError);
      await expect(attempt).rejects.toMatchObject({
        fieldErrors: {
          username: ["Username used before!"],
          email: ["Email used before!"],
          password: passwordPolicyViolations("weak"),
        },
      });
      expect(deps.store.users.size).toBe(1);
    });

    it("rejects names and addresses longer than their columns", async () => {
      const attempt = signUp(deps, {
        username: "ada",
        email: `${"a".repeat(240)}@example.com`,
        password: SEEDED_PASSWORD,
        firstName: "A".repeat(201),
        lastName: ` ${"L".repeat(200)} `,
      });

      await expect(attempt).rejects.toBeInstanceOf(FieldValidationError);
      await expect(attempt).rejects.toMatchObject({
        fieldErrors: {
          email: ["Enter a valid email address."],
          firstName: ["Must be at most 200 characters."],
        },
      });
      await expect(attempt).rejects.not.toHaveProperty("fieldErrors.lastName");
      expect(deps.store.users.size).toBe(0);
    });

    it("keeps the account when the verification mail fails", async () => {
      deps.mailer.failNext();

      const result = await signUp(deps, {
        username: "grace",
        email: "grace@example.com",
        password: SEEDED_PASSWORD,
      });

      expect(result.verificationSent).toBe(false);
      expect(await deps.users.findById(result.user.id)).not.toBeNull();
      expect(deps.mailer.sent).toHaveLength(0);
    });
  });

  describe("authenticate", () => {
    it("accepts username (any case) or email", async () => {
      const user = await seedUser(deps, "ada");

      const byName = await authenticate(deps, {
        usernameOrEmail: "ADA",
        password: SEEDED_PASSWORD,
      });
      const byEmail = await authenticate(deps, {
        usernameOrEmail: "ada@example.com",
        password: SEEDED_PASSWORD,
      });

      expect(byName.id).toBe(user.id);
      expect(byEmail.id).toBe(user.id);
    });

    it("rejects unknown users, wrong passwords and deactivated accounts alike", async () => {
      const user = await seedUser(deps, "ada");

      await expect(
        authenticate(deps, { usernameOrEmail: "nobody", password: SEEDED_PASSWORD })
      ).rejects.toBeInstanceOf(InvalidCredentialsError);
      await expect(
        authenticate(deps, { usernameOrEmail: "ada", password: "Wr0ng!Pass" })
      ).rejects.toBeInstanceOf(InvalidCredentialsError);

      await deps.users.deactivate(user.id);
      await expect(
        authenticate(deps, { usernameOrEmail: "ada", password: SEEDED_PASSWORD })
      ).rejects.toBeInstanceOf(InvalidCredentialsError);
    });
  });

  describe("changePassword", () => {
    it("requires the current password", async () => {
      const user = await seedUser(deps, "ada");

      await expect(
        changePassword(deps, {
          userId: user.id,
          currentPassword: "Wr0ng!Pass",
          newPassword: "N3w!Password",
        })
      ).rejects.toBeInstanceOf(InvalidCredentialsError);
    });

    it("applies the password policy to the new password", async () => {
      const user = await seedUser(deps, "ada");

      await expect(
        changePassword(deps, {
          userId: user.id,
          currentPassword: SEEDED_PASSWORD,
          newPassword: "short",
        })
      ).rejects.toMatchObject({
        fieldErrors: { newPassword: passwordPolicyViolations("short") },
      });
    });

    it("stores the new hash", async () => {
      const user = await seedUser(deps, "ada");

      await changePassword(deps, {
        userId: user.id,
        currentPassword: SEEDED_PASSWORD,
        newPassword: "N3w!Password",
      });

      expect((await deps.users.findById(user.id))?.passwordHash).toBe(
        "hashed:N3w!Password"
      );
    });

    it("reports unknown users as not found", async () => {
      await expect(
        changePassword(deps, {
          userId: "00000000-0000-4000-8000-00000000ffff",
          currentPassword: SEEDED_PASSWORD,
          newPassword: "N3w!Password",
        })
      ).rejects.toBeInstanceOf(NotFoundError);
    });
  });
});
