// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/search/search-filters`
 * Purpose: Verifies the WHERE clauses built for project and developer search.
 * Scope: Renders SQL with PgDialect; no database connection.
 * Invariants: Blank project criteria produce no filter; free text is bound as an escaped LIKE pattern.
 * Side-effects: none
 * Links: src/adapters/server/search/search-filters.ts
 * @public
 */

import type { SQL } from "drizzle-orm";
import { PgDialect } from "drizzle-orm/pg-core";
import { describe, expect, it } from "vitest";

import {
  buildDeveloperSearchFilter,
  buildProjectSearchFilter,
} from "@/adapters/server/search/search-filters";

const dialect = new PgDialect();

function render(filter: SQL | undefined) {
  if (!filter) throw new Error("expected a filter");
  return dialect.sqlToQuery(filter);
}

describe("search filters", () => {
  describe("buildProjectSearchFilter", () => {
    it("returns no filter for blank criteria", () => {
      expect(buildProjectSearchFilter({ q: null, tags: [] })).toBeUndefined();
    });

    it("binds the escaped pattern for title, description and tag names", () => {
      const query = render(buildProjectSearchFilter({ q: "50%", tags: [] }));

      expect(query.params).toEqual(["%50\\%%", "%50\\%%", "%50\\%%"]);
      expect(query.sql).toContain("ilike");
    });

    it("adds one exists clause per tag", () => {
      const query = render(buildProjectSearchFilter({ q: null, tags: ["react", "node"] }));

      expect(query.params).toEqual(["react", "node"]);
      expect(query.sql.match(/exists \(/g)).toHaveLength(2);
    });
  });

  describe("buildDeveloperSearchFilter", () => {
    it("always restricts to active users", () => {
      const query = render(buildDeveloperSearchFilter({ q: null, skills: [] }));
      expect(query.params).toEqual([true]);
    });

    it("matches skills by lower-cased name", () => {
      const query = render(
        buildDeveloperSearchFilter({ q: null, skills: ["python"] })
      );

      expect(query.params).toEqual([true, "python"]);
      expect(query.sql).toContain("lower(");
    });

    it("searches names, intro and skills with one pattern", () => {
      const query = render(buildDeveloperSearchFilter({ q: "ada", skills: [] }));
      expect(query.params).toEqual([true, "%ada%", "%ada%", "%ada%", "%ada%", "%ada%"]);
    });
  });
});
