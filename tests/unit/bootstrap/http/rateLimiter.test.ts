// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/unit/bootstrap/http/rateLimiter`
 * Purpose: Unit tests for the per-IP token bucket and client IP extraction.
 * Scope: Capacity, refill, Retry-After computation, sweeping, header precedence. Does NOT test the shared authApiLimiter instance.
 * Invariants: Time only moves through the injected clock.
 * Side-effects: none
 * Links: src/bootstrap/http/rateLimiter.ts
 * @public
 */

import { NextRequest } from "next/server";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import {
  extractClientIp,
  TokenBucketRateLimiter,
} from "@/bootstrap/http/rateLimiter";

describe("TokenBucketRateLimiter", () => {
  let nowMs: number;
  let limiter: TokenBucketRateLimiter;

  beforeEach(() => {
    nowMs = 0;
    // capacity 3, one token every two seconds
    limiter = new TokenBucketRateLimiter({
      maxTokens: 2,
      refillRate: 0.5,
      burstSize: 1,
      now: () => nowMs,
    });
  });

  afterEach(() => {
    limiter.destroy();
  });

  it("lets a new client spend maxTokens plus burst, then blocks", () => {
    expect(limiter.consume("10.0.0.1")).toBe(true);
    expect(limiter.consume("10.0.0.1")).toBe(true);
    expect(limiter.consume("10.0.0.1")).toBe(true);
    expect(limiter.consume("10.0.0.1")).toBe(false);
  });

  it("keeps buckets separate per key", () => {
    for (let i = 0; i < 3; i++) limiter.consume("10.0.0.1");

    expect(limiter.consume("10.0.0.1")).toBe(false);
    expect(limiter.consume("10.0.0.2")).toBe(true);
  });

  it("refills at refillRate tokens per second", () => {
    for (let i = 0; i < 3; i++) limiter.consume("10.0.0.1");

    nowMs += 1000;
    expect(limiter.consume("10.0.0.1")).toBe(false);

    nowMs += 1000;
    expect(limiter.consume("10.0.0.1")).toBe(true);
    expect(limiter.consume("10.0.0.1")).toBe(false);
  });

  it("never refills past capacity", () => {
    limiter.consume("10.0.0.1");
    nowMs += 3_600_000;
    limiter.consume("10.0.0.1");

    expect(limiter.getTokens("10.0.0.1")).toBe(2);
  });

  it("reports full capacity for an unseen key", () => {
    expect(limiter.getTokens("10.0.0.9")).toBe(3);
    expect(limiter.size).toBe(0);
  });

  it("computes seconds until the next token", () => {
    expect(limiter.retryAfterSeconds("10.0.0.1")).toBe(0);

    for (let i = 0; i < 3; i++) limiter.consume("10.0.0.1");
    expect(limiter.retryAfterSeconds("10.0.0.1")).toBe(2);

    nowMs += 1000;
    expect(limiter.retryAfterSeconds("10.0.0.1")).toBe(1);
  });

  it("falls back to the sweep interval when nothing refills", () => {
    const frozen = new TokenBucketRateLimiter({
      maxTokens: 1,
      refillRate: 0,
      burstSize: 0,
      now: () => nowMs,
    });
    frozen.consume("10.0.0.1");

    expect(frozen.retryAfterSeconds("10.0.0.1")).toBe(60);
    frozen.destroy();
  });

  it("sweeps idle buckets once they would be full again", () => {
    limiter.consume("10.0.0.1");
    nowMs = 59_000;
    limiter.consume("10.0.0.2");
    expect(limiter.size).toBe(2);

    nowMs = 61_000;
    limiter.sweep();

    expect(limiter.size).toBe(1);
    expect(limiter.getTokens("10.0.0.2")).toBe(2);
  });
});

describe("extractClientIp", () => {
  const url = "http://localhost:3000/api/v1/auth/login";

  it("prefers X-Real-IP over X-Forwarded-For", () => {
    const request = new NextRequest(url, {
      headers: { "x-real-ip": " 203.0.113.7 ", "x-forwarded-for": "198.51.100.1" },
    });

    expect(extractClientIp(request)).toBe("203.0.113.7");
  });

  it("takes the first X-Forwarded-For hop", () => {
    const request = new NextRequest(url, {
      headers: { "x-forwarded-for": "198.51.100.1, 10.0.0.1" },
    });

    expect(extractClientIp(request)).toBe("198.51.100.1");
  });

  it("groups unidentified clients under one key", () => {
    expect(extractClientIp(new NextRequest(url))).toBe("unknown");
  });
});
