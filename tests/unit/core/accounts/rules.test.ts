// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/accounts/rules`
 * Purpose: Unit tests for password policy, username format and one-time token redemption order.
 * Scope: Pure business logic testing. Does NOT test hashing or storage.
 * Invariants: Every policy violation is reported; token checks run invalid -> used -> expired.
 * Side-effects: none
 * Links: core/accounts/rules
 * @public
 */

import { describe, expect, it } from "vitest";

import type { OneTimeToken } from "@/core";
import {
  assertTokenRedeemable,
  InvalidTokenError,
  isValidEmailFormat,
  normalizeEmail,
  passwordPolicyViolations,
  TokenAlreadyUsedError,
  TokenExpiredError,
  usernameFormatViolations,
} from "@/core";

describe("core/accounts/rules", () => {
  describe("passwordPolicyViolations", () => {
    it("accepts a password meeting every rule", () => {
      expect(passwordPolicyViolations("Str0ng!Pass")).toEqual([]);
    });

    it("lists every violated rule in policy order", () => {
      expect(passwordPolicyViolations("abc")).toEqual([
        "Password must be at least 8 characters.",
        "Password must contain at least one uppercase letter.",
        "Password must contain at least one digit.",
        "Password must contain at least one symbol.",
      ]);
    });

    it("rejects whitespace", () => {
      expect(passwordPolicyViolations("has space1A!")).toEqual([
        "Password must not contain spaces.",
      ]);
    });

    it("rejects passwords over 50 characters", () => {
      expect(passwordPolicyViolations(`A1!${"a".repeat(50)}`)).toEqual([
        "Password must not exceed 50 characters.",
      ]);
    });

    it("does not count a space as a symbol", () => {
      expect(passwordPolicyViolations("Abcdefg1 ")).toEqual([
        "Password must not contain spaces.",
        "Password must contain at least one symbol.",
      ]);
    });
  });

  describe("usernameFormatViolations", () => {
    it("accepts letters, digits, dots, dashes and underscores", () => {
      expect(usernameFormatViolations("ada_lovelace.dev-1")).toEqual([]);
    });

    it("reports length for too-short names", () => {
      expect(usernameFormatViolations("ab")).toEqual([
        "Username must be between 3 and 50 characters.",
      ]);
    });

    it("reports disallowed characters", () => {
      expect(usernameFormatViolations("bad name")).toEqual([
        "Username may only contain letters, digits, dots, dashes and underscores.",
      ]);
    });

    it("reports only length for an empty name", () => {
      expect(usernameFormatViolations("")).toHaveLength(1);
    });
  });

  describe("email helpers", () => {
    it("normalizes case and surrounding whitespace", () => {
      expect(normalizeEmail("  Ada@Example.COM ")).toBe("ada@example.com");
    });

    it("validates the basic address shape", () => {
      expect(isValidEmailFormat("ada@example.com")).toBe(true);
      expect(isValidEmailFormat("ada@example")).toBe(false);
      expect(isValidEmailFormat("ada example@x.io")).toBe(false);
    });

    it("caps the address at 200 characters", () => {
      const local = "a".repeat(188);
      expect(isValidEmailFormat(`${local}@example.com`)).toBe(true);
      expect(isValidEmailFormat(`${local}a@example.com`)).toBe(false);
    });
  });

  describe("assertTokenRedeemable", () => {
    const now = new Date("2025-03-01T12:00:00.000Z");
    const token: OneTimeToken = {
      id: "t1",
      userId: "u1",
      purpose: "email_verification",
      tokenHash: "hash",
      expiresAt: new Date("2025-03-01T13:00:00.000Z"),
      consumedAt: null,
      createdAt: new Date("2025-03-01T11:00:00.000Z"),
    };
    const expected = { userId: "u1", purpose: "email_verification" as const };

    it("passes for a live, unused, matching token", () => {
      expect(() => assertTokenRedeemable(token, expected, now)).not.toThrow();
    });

    it("treats a missing token as invalid", () => {
      expect(() => assertTokenRedeemable(null, expected, now)).toThrow(
        InvalidTokenError
      );
    });

    it("treats another user's token as invalid", () => {
      expect(() =>
        assertTokenRedeemable(token, { ...expected, userId: "u2" }, now)
      ).toThrow(InvalidTokenError);
    });

    it("treats a token minted for another purpose as invalid", () => {
      expect(() =>
        assertTokenRedeemable(
          token,
          { ...expected, purpose: "password_reset" },
          now
        )
      ).toThrow(InvalidTokenError);
    });

    it("reports reuse before expiry", () => {
      const usedAndExpired: OneTimeToken = {
        ...token,
        consumedAt: new Date("2025-03-01T11:30:00.000Z"),
        expiresAt: new Date("2025-03-01T11:45:00.000Z"),
      };
      expect(() => assertTokenRedeemable(usedAndExpired, expected, now)).toThrow(
        TokenAlreadyUsedError
      );
    });

    it("expires exactly at expiresAt", () => {
      expect(() =>
        assertTokenRedeemable({ ...token, expiresAt: now }, expected, now)
      ).toThrow(TokenExpiredError);
    });
  });
});
