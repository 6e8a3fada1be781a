// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/contract/app/auth.login`
 * Purpose: Contract tests for POST /api/v1/auth/login.
 * Scope: Input validation, error mapping, token body and session cookie. Does NOT test credential checks (feature tests cover those).
 * Invariants: Failed logins answer 401 "Invalid credentials" and set no cookie; success sets the HttpOnly session cookie.
 * Side-effects: none (facade, container and limiter mocked)
 * Links: src/app/api/v1/auth/login/route.ts, contracts/auth.session.v1.contract
 * @public
 */

import { TEST_USER_ID_1 } from "@tests/_fakes/ids";
import { NextRequest } from "next/server";
import { beforeEach, describe, expect, it, vi } from "vitest";

vi.mock("@/bootstrap/container", () => ({
  getContainer: vi.fn(() => ({
    log: {
      child: vi.fn().mockReturnThis(),
      info: vi.fn(),
      debug: vi.fn(),
      error: vi.fn(),
      warn: vi.fn(),
    },
    clock: { now: () => new Date("2025-03-01T12:00:00.000Z") },
    config: {
      unhandledErrorPolicy: "rethrow",
      rateLimitBypass: { enabled: false, headerName: "x-stack-test", headerValue: "1" },
      secureCookies: false,
    },
  })),
}));

// Always allow; limiter behaviour has its own unit tests
vi.mock("@/bootstrap/http/rateLimiter", () => ({
  authApiLimiter: {
    consume: vi.fn(() => true),
    retryAfterSeconds: vi.fn(() => 0),
  },
  extractClientIp: vi.fn(() => "test-ip"),
  TokenBucketRateLimiter: vi.fn(),
}));

vi.mock("@/app/_facades/auth/session.server", () => ({
  loginFacade: vi.fn(),
}));

import { loginFacade } from "@/app/_facades/auth/session.server";
import { POST } from "@/app/api/v1/auth/login/route";
import { authLoginOperation } from "@/contracts/auth.session.v1.contract";
import { InvalidCredentialsError } from "@/core";

const URL = "http://localhost:3000/api/v1/auth/login";

function loginRequest(body: string): NextRequest {
  return new NextRequest(URL, {
    method: "POST",
    headers: { "content-type": "application/json" },
    body,
  });
}

describe("POST /api/v1/auth/login", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it("returns the token pair and sets the session cookie", async () => {
    const dto = {
      accessToken: "access-token",
      refreshToken: "refresh-token",
      tokenType: "bearer" as const,
      expiresAt: "2025-03-01T17:00:00.000Z",
      userId: TEST_USER_ID_1,
    };
    vi.mocked(loginFacade).mockResolvedValue({
      dto,
      expiresAt: new Date(dto.expiresAt),
    });

    const response = await POST(
      loginRequest(JSON.stringify({ usernameOrEmail: "ada", password: "pw" }))
    );

    expect(response.status).toBe(200);
    expect(authLoginOperation.output.parse(await response.json())).toEqual(dto);
    expect(response.cookies.get("ds_session")?.value).toBe("access-token");
    expect(response.headers.get("set-cookie")).toContain("HttpOnly");
    expect(loginFacade).toHaveBeenCalledWith(
      { usernameOrEmail: "ada", password: "pw" },
      expect.objectContaining({ routeId: "auth.login" })
    );
  });

  it("answers 401 without a cookie for bad credentials", async () => {
    vi.mocked(loginFacade).mockRejectedValue(new InvalidCredentialsError());

    const response = await POST(
      loginRequest(JSON.stringify({ usernameOrEmail: "ada", password: "nope" }))
    );

    expect(response.status).toBe(401);
    expect(await response.json()).toEqual({ error: "Invalid credentials" });
    expect(response.headers.get("set-cookie")).toBeNull();
  });

  it("reports empty fields per field", async () => {
    const response = await POST(
      loginRequest(JSON.stringify({ usernameOrEmail: "  ", password: "pw" }))
    );

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({
      error: "Invalid input",
      fieldErrors: { usernameOrEmail: ["Enter your username or email."] },
    });
    expect(loginFacade).not.toHaveBeenCalled();
  });

  it("rejects a body that is not JSON", async () => {
    const response = await POST(loginRequest("not json"));

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({ error: "Invalid JSON body" });
  });
});
