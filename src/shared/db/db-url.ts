// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/db/db-url`
 * Purpose: Builds the PostgreSQL connection string from component env vars.
 * Scope: Pure helper shared by `serverEnv()` and drizzle.config.ts. Does not read process.env itself.
 * Invariants: Credentials are percent-encoded; DB_HOST is required; port defaults to 5432.
 * Side-effects: none
 * Links: src/shared/env/server.ts, drizzle.config.ts
 * @public
 */

export interface DbEnvInput {
  POSTGRES_USER?: string | undefined;
  POSTGRES_PASSWORD?: string | undefined;
  POSTGRES_DB?: string | undefined;
  DB_HOST?: string | undefined;
  DB_PORT?: string | number | undefined;
}

export function buildDatabaseUrl(env: DbEnvInput): string {
  const { POSTGRES_USER: user, POSTGRES_PASSWORD: password } = env;
  const db = env.POSTGRES_DB;
  const host = env.DB_HOST;
  const port =
    typeof env.DB_PORT === "number"
      ? env.DB_PORT
      : Number(env.DB_PORT ?? "5432");

  if (!user || !password || !db) {
    throw new TypeError(
      "Missing required DB env vars: POSTGRES_USER, POSTGRES_PASSWORD, POSTGRES_DB"
    );
  }
  if (!host) {
    throw new TypeError("Missing required DB env var: DB_HOST");
  }
  if (!Number.isInteger(port) || port <= 0) {
    throw new TypeError(`Invalid DB_PORT value: ${String(env.DB_PORT)}`);
  }

  return `postgresql://${encodeURIComponent(user)}:${encodeURIComponent(password)}@${host}:${port}/${db}`;
}
