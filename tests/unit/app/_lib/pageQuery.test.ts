// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/unit/app/_lib/pageQuery`
 * Purpose: Unit tests for page searchParams normalization and pagination links.
 * Scope: Pure helpers only.
 * Side-effects: none
 * Links: src/app/_lib/pageQuery.ts
 * @public
 */

import { describe, expect, it } from "vitest";

import {
  normalizeSearchParams,
  toQueryWithoutPage,
} from "@/app/_lib/pageQuery";

describe("normalizeSearchParams", () => {
  it("keeps the first value of single keys and arrays for repeated keys", () => {
    const record = normalizeSearchParams(
      { q: ["react", "vue"], skill: "python", page: "2", size: undefined },
      ["skill"]
    );

    expect(record).toEqual({ q: "react", skill: ["python"], page: "2" });
  });
});

describe("toQueryWithoutPage", () => {
  it("drops page and empty values", () => {
    const query = toQueryWithoutPage({
      q: "",
      skill: ["python", "sql"],
      page: "3",
      size: "6",
    });

    expect(query.toString()).toBe("skill=python&skill=sql&size=6");
  });
});
