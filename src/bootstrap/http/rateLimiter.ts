// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@bootstrap/http/rateLimiter`
 * Purpose: In-memory per-IP rate limiter for unauthenticated write endpoints.
 * Scope: Token bucket; client IP from X-Real-IP, then the first X-Forwarded-For hop. Does NOT persist state across instances or restarts.
 * Invariants: New clients start with maxTokens + burstSize; idle buckets that have refilled are swept every 60s; the sweep timer never keeps the process alive.
 * Side-effects: global (in-memory bucket store with periodic cleanup)
 * Notes: Per-instance only; each replica limits independently.
 * Links: wrapRateLimitedRoute.ts
 * @public
 */

import type { NextRequest } from "next/server";

interface Bucket {
  tokens: number;
  /** ms epoch of the last refill */
  lastSeen: number;
}

export interface RateLimiterConfig {
  /** Steady-state bucket size */
  maxTokens: number;
  /** Tokens added per second */
  refillRate: number;
  /** Extra tokens a new client starts with on top of maxTokens */
  burstSize: number;
  now?: () => number;
}

const SWEEP_INTERVAL_MS = 60_000;

/**
 * Per-key token bucket. A key is usually the client IP.
 */
export class TokenBucketRateLimiter {
  private readonly buckets = new Map<string, Bucket>();
  private readonly now: () => number;
  private sweepTimer: ReturnType<typeof setInterval> | null;

  constructor(private readonly config: RateLimiterConfig) {
    this.now = config.now ?? Date.now;
    this.sweepTimer = setInterval(() => this.sweep(), SWEEP_INTERVAL_MS);
    this.sweepTimer.unref();
  }

  private get capacity(): number {
    return this.config.maxTokens + this.config.burstSize;
  }

  private refill(key: string): Bucket {
    const now = this.now();
    const bucket = this.buckets.get(key) ?? { tokens: this.capacity, lastSeen: now };

    const elapsedSeconds = (now - bucket.lastSeen) / 1000;
    bucket.tokens = Math.min(
      bucket.tokens + elapsedSeconds * this.config.refillRate,
      this.capacity
    );
    bucket.lastSeen = now;
    this.buckets.set(key, bucket);
    return bucket;
  }

  /** Takes one token; false when the bucket is empty. */
  consume(key: string): boolean {
    const bucket = this.refill(key);
    if (bucket.tokens < 1) return false;
    bucket.tokens -= 1;
    return true;
  }

  /** Whole seconds until `key` may consume again; 0 when it already may. */
  retryAfterSeconds(key: string): number {
    const bucket = this.refill(key);
    if (bucket.tokens >= 1) return 0;
    if (this.config.refillRate <= 0) return SWEEP_INTERVAL_MS / 1000;
    return Math.ceil((1 - bucket.tokens) / this.config.refillRate);
  }

  getTokens(key: string): number {
    return this.buckets.get(key)?.tokens ?? this.capacity;
  }

  /** Drops buckets idle for more than a sweep interval that would be full by now. */
  sweep(): void {
    const now = this.now();
    for (const [key, bucket] of this.buckets) {
      const idleMs = now - bucket.lastSeen;
      const refilled = bucket.tokens + (idleMs / 1000) * this.config.refillRate;
      if (idleMs > SWEEP_INTERVAL_MS && refilled >= this.capacity) {
        this.buckets.delete(key);
      }
    }
  }

  get size(): number {
    return this.buckets.size;
  }

  destroy(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
  }
}

/**
 * Client IP for rate limiting. Prefers X-Real-IP as set by the reverse proxy;
 * unidentified clients share one bucket.
 */
export function extractClientIp(request: NextRequest): string {
  const realIp = request.headers.get("x-real-ip");
  if (realIp) return realIp.trim();

  const forwardedFor = request.headers.get("x-forwarded-for");
  if (forwardedFor) {
    const firstIp = forwardedFor.split(",")[0]?.trim();
    if (firstIp) return firstIp;
  }

  return "unknown";
}

/**
 * Limiter for login, signup, password reset and guest messages.
 * 10 requests per minute + burst 5.
 */
export const authApiLimiter = new TokenBucketRateLimiter({
  maxTokens: 10,
  refillRate: 10 / 60,
  burstSize: 5,
});
