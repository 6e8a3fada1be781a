// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/db/drizzle.client`
 * Purpose: Drizzle database client configuration and connection management.
 * Scope: Database connection setup and Drizzle ORM instance. Does not handle business logic or migrations.
 * Invariants: Single database connection instance; properly configured with schema; lazy initialization
 * Side-effects: IO (database connections) - only on first access
 * Notes: postgres-js driver; connection string from serverEnv(); lazy loading prevents build-time env access
 * Links: Used by database adapters for queries
 * @internal
 */

import type { PostgresJsDatabase } from "drizzle-orm/postgres-js";
import { drizzle } from "drizzle-orm/postgres-js";
import postgres from "postgres";

import * as schema from "@/shared/db/schema";
import { serverEnv } from "@/shared/env";

export type Database = PostgresJsDatabase<typeof schema>;

/** Handle passed to `db.transaction` callbacks. */
export type Transaction = Parameters<Parameters<Database["transaction"]>[0]>[0];

let _db: Database | null = null;

function createDb(): Database {
  if (!_db) {
    const env = serverEnv();
    const client = postgres(env.DATABASE_URL, {
      max: 10,
      idle_timeout: 20,
      connect_timeout: 10,
      connection: {
        application_name: "devsearch_app",
      },
    });

    _db = drizzle(client, { schema });
  }
  return _db;
}

export const getDb = createDb;

const UNIQUE_VIOLATION = "23505";

/**
 * Name of the violated unique constraint, or null for any other error.
 */
export function uniqueViolationConstraint(error: unknown): string | null {
  if (error instanceof postgres.PostgresError && error.code === UNIQUE_VIOLATION) {
    return error.constraint_name ?? "";
  }
  return null;
}
