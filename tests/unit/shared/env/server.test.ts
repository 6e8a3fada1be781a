// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/unit/shared/env/server`
 * Purpose: Unit tests for server env parsing, defaults and validation errors.
 * Scope: serverEnv() against controlled process.env copies. Does NOT test adapter wiring.
 * Invariants: Module cache reset between tests so the memoized env is rebuilt.
 * Side-effects: process.env
 * Links: src/shared/env/server.ts
 * @public
 */

import { BASE_VALID_ENV } from "@tests/_fixtures/env/base-env";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

const ORIGINAL_ENV = process.env;

const DB_KEYS = [
  "DATABASE_URL",
  "POSTGRES_USER",
  "POSTGRES_PASSWORD",
  "POSTGRES_DB",
  "DB_HOST",
  "DB_PORT",
] as const;

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error("expected a throw");
}

async function loadEnv() {
  return import("@/shared/env/server");
}

describe("serverEnv", () => {
  beforeEach(() => {
    vi.resetModules();
    process.env = { ...ORIGINAL_ENV };
    for (const key of DB_KEYS) delete process.env[key];
    delete process.env.SMTP_SECURE;
    delete process.env.SMTP_PORT;
    delete process.env.METRICS_TOKEN;
  });

  afterEach(() => {
    process.env = ORIGINAL_ENV;
  });

  it("applies defaults and derives runtime flags", async () => {
    Object.assign(process.env, BASE_VALID_ENV);
    const { serverEnv } = await loadEnv();

    const env = serverEnv();

    expect(env.ACCESS_TOKEN_TTL_SECONDS).toBe(18_000);
    expect(env.REFRESH_TOKEN_TTL_SECONDS).toBe(86_400);
    expect(env.EMAIL_TOKEN_TTL_SECONDS).toBe(7_200);
    expect(env.SMTP_PORT).toBe(587);
    expect(env.SMTP_SECURE).toBe(false);
    expect(env.UPLOAD_MAX_BYTES).toBe(10_485_760);
    expect(env.UPLOAD_PUBLIC_PATH).toBe("/uploads");
    expect(env.isTest).toBe(true);
    expect(env.isProd).toBe(false);
    expect(env.isTestMode).toBe(true);
  });

  it("memoizes the parsed env", async () => {
    Object.assign(process.env, BASE_VALID_ENV);
    const { serverEnv } = await loadEnv();

    expect(serverEnv()).toBe(serverEnv());
  });

  it("builds DATABASE_URL from component vars", async () => {
    Object.assign(process.env, {
      ...BASE_VALID_ENV,
      POSTGRES_USER: "dev",
      POSTGRES_PASSWORD: "p@ss word",
      POSTGRES_DB: "devsearch",
      DB_HOST: "db",
      DB_PORT: "5433",
    });
    delete process.env.DATABASE_URL;
    const { serverEnv } = await loadEnv();

    expect(serverEnv().DATABASE_URL).toBe(
      "postgresql://dev:p%40ss%20word@db:5433/devsearch"
    );
  });

  it("reports DATABASE_URL missing when neither form is given", async () => {
    Object.assign(process.env, BASE_VALID_ENV);
    delete process.env.DATABASE_URL;
    const { serverEnv, EnvValidationError } = await loadEnv();

    const error = captureError(serverEnv);

    expect(error).toBeInstanceOf(EnvValidationError);
    expect(error).toMatchObject({
      meta: { code: "INVALID_ENV", missing: ["DATABASE_URL"], invalid: [] },
    });
  });

  it("separates missing vars from invalid ones", async () => {
    Object.assign(process.env, {
      ...BASE_VALID_ENV,
      AUTH_SECRET: "short",
      APP_BASE_URL: "not a url",
    });
    delete process.env.APP_ENV;
    const { serverEnv } = await loadEnv();

    expect(captureError(serverEnv)).toMatchObject({
      meta: {
        code: "INVALID_ENV",
        missing: ["APP_ENV"],
        invalid: ["APP_BASE_URL", "AUTH_SECRET"],
      },
    });
  });

  it("accepts 1 and true for boolean flags", async () => {
    Object.assign(process.env, { ...BASE_VALID_ENV, SMTP_SECURE: "1" });
    const { serverEnv } = await loadEnv();

    expect(serverEnv().SMTP_SECURE).toBe(true);
  });
});
