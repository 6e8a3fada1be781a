// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@devsearch/db-schema/accounts`
 * Purpose: Verifies the uniqueness indexes on the users table.
 * Scope: Inspects table config and renders index expressions with PgDialect; no database connection.
 * Invariants: Usernames differing only in case collide on users_username_unique.
 * Side-effects: none
 * Links: packages/db-schema/src/accounts.ts, src/adapters/server/accounts/drizzle-user.adapter.ts
 * @public
 */

import { users } from "@devsearch/db-schema";
import { is, SQL } from "drizzle-orm";
import { getTableConfig, PgDialect } from "drizzle-orm/pg-core";
import { describe, expect, it } from "vitest";

const dialect = new PgDialect();

function uniqueIndex(name: string) {
  const index = getTableConfig(users).indexes.find((i) => i.config.name === name);
  if (!index) throw new Error(`missing index ${name}`);
  return index.config;
}

describe("db-schema users", () => {
  it("indexes usernames by their lower-cased form", () => {
    const config = uniqueIndex("users_username_unique");
    const [column] = config.columns;

    expect(config.unique).toBe(true);
    expect(config.columns).toHaveLength(1);
    if (!is(column, SQL)) throw new Error("expected an expression index");
    const rendered = dialect.sqlToQuery(column).sql;
    expect(rendered.startsWith("lower(")).toBe(true);
    expect(rendered).toContain('"username"');
  });

  it("keeps email uniqueness on the stored column", () => {
    const config = uniqueIndex("users_email_unique");

    expect(config.unique).toBe(true);
    expect(config.columns.map((c) => ("name" in c ? c.name : "expr"))).toEqual([
      "email",
    ]);
  });
});
