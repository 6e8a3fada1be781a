// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/auth/jwt-token-service`
 * Purpose: Verifies issuing and verifying encrypted access/refresh tokens.
 * Scope: Real next-auth/jwt encryption. Does NOT touch cookies or routes.
 * Invariants: Tampered, expired, missing and wrong-kind tokens all raise UnauthorizedError.
 * Side-effects: none
 * Notes: Expiry uses fake Date only; crypto runs for real.
 * Links: src/adapters/server/auth/jwt-token-service.adapter.ts
 * @public
 */

import { afterEach, describe, expect, it, vi } from "vitest";

import { JwtTokenService } from "@/adapters/server";
import { UnauthorizedError } from "@/core";

const identity = { id: "00000000-0000-4000-a000-000000000001", username: "ada" };

function makeService(secret = "test-secret") {
  return new JwtTokenService({
    secret,
    accessTtlSeconds: 60,
    refreshTtlSeconds: 3600,
  });
}

describe("JwtTokenService", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("round-trips the session identity for each kind", async () => {
    const service = makeService();

    const access = await service.issue(identity, "access");
    const refresh = await service.issue(identity, "refresh");

    await expect(service.verify(access.token, "access")).resolves.toEqual(identity);
    await expect(service.verify(refresh.token, "refresh")).resolves.toEqual(identity);
  });

  it("reports expiry from the configured TTL", async () => {
    const service = new JwtTokenService({
      secret: "test-secret",
      accessTtlSeconds: 60,
      refreshTtlSeconds: 3600,
      now: () => Date.parse("2025-03-01T12:00:00.000Z"),
    });

    const access = await service.issue(identity, "access");
    const refresh = await service.issue(identity, "refresh");

    expect(access.expiresAt.toISOString()).toBe("2025-03-01T12:01:00.000Z");
    expect(refresh.expiresAt.toISOString()).toBe("2025-03-01T13:00:00.000Z");
  });

  it("rejects a missing token", async () => {
    await expect(makeService().verify(undefined, "access")).rejects.toMatchObject({
      reason: "missing",
    });
    await expect(makeService().verify("", "access")).rejects.toBeInstanceOf(
      UnauthorizedError
    );
  });

  it("rejects a tampered token", async () => {
    const service = makeService();
    const { token } = await service.issue(identity, "access");
    const parts = token.split(".");
    const ciphertext = parts[3] ?? "";
    parts[3] = `${ciphertext.startsWith("A") ? "B" : "A"}${ciphertext.slice(1)}`;

    await expect(service.verify(parts.join("."), "access")).rejects.toMatchObject({
      reason: "invalid",
    });
  });

  it("rejects a token signed with another secret", async () => {
    const { token } = await makeService("test-secret-one").issue(identity, "access");

    await expect(
      makeService("test-secret-two").verify(token, "access")
    ).rejects.toBeInstanceOf(UnauthorizedError);
  });

  it("never accepts one kind as the other", async () => {
    const service = makeService();
    const access = await service.issue(identity, "access");
    const refresh = await service.issue(identity, "refresh");

    await expect(service.verify(access.token, "refresh")).rejects.toBeInstanceOf(
      UnauthorizedError
    );
    await expect(service.verify(refresh.token, "access")).rejects.toBeInstanceOf(
      UnauthorizedError
    );
  });

  it("rejects an expired token", async () => {
    vi.useFakeTimers({ toFake: ["Date"] });
    vi.setSystemTime(new Date("2025-03-01T12:00:00.000Z"));
    const service = makeService();
    const { token } = await service.issue(identity, "access");

    // 60s TTL plus the 15s clock tolerance
    vi.setSystemTime(new Date("2025-03-01T12:01:16.000Z"));

    await expect(service.verify(token, "access")).rejects.toMatchObject({
      reason: "expired",
    });
  });
});
