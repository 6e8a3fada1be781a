// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/search/rules`
 * Purpose: Unit tests for query normalization, paging math and the windowed page range.
 * Scope: Pure business logic testing.
 * Invariants: Ranges with more than 9 pages are windowed with gap markers; empty results have 0 pages.
 * Side-effects: none
 * Links: core/search/rules
 * @public
 */

import { describe, expect, it } from "vitest";

import {
  buildPageRange,
  DEFAULT_PAGE_SIZE,
  escapeLikePattern,
  MAX_PAGE_SIZE,
  normalizePageRequest,
  normalizeProjectCriteria,
  normalizeQuery,
  pageCount,
  pageOffset,
  toPage,
} from "@/core";

describe("core/search/rules", () => {
  describe("normalizeQuery", () => {
    it("collapses whitespace and maps blank to null", () => {
      expect(normalizeQuery("  rust   lang ")).toBe("rust lang");
      expect(normalizeQuery("   ")).toBeNull();
      expect(normalizeQuery(undefined)).toBeNull();
    });

    it("truncates to 100 characters", () => {
      expect(normalizeQuery("x".repeat(150))).toHaveLength(100);
    });
  });

  it("normalizes and deduplicates tag filters", () => {
    expect(
      normalizeProjectCriteria({ q: " ", tags: [" Web  Dev ", "web dev", ""] })
    ).toEqual({ q: null, tags: ["web dev"] });
  });

  describe("paging", () => {
    it("falls back to defaults and clamps the size", () => {
      expect(normalizePageRequest({})).toEqual({
        page: 1,
        size: DEFAULT_PAGE_SIZE,
      });
      expect(normalizePageRequest({ page: 0, size: 500 })).toEqual({
        page: 1,
        size: MAX_PAGE_SIZE,
      });
      expect(normalizePageRequest({ page: 2.5, size: 3 })).toEqual({
        page: 1,
        size: 3,
      });
    });

    it("computes offsets and page counts", () => {
      expect(pageOffset({ page: 3, size: 9 })).toBe(18);
      expect(pageCount(0, 9)).toBe(0);
      expect(pageCount(9, 9)).toBe(1);
      expect(pageCount(10, 9)).toBe(2);
    });

    it("wraps a slice as a page", () => {
      expect(toPage(["a"], 10, { page: 2, size: 9 })).toEqual({
        items: ["a"],
        page: 2,
        size: 9,
        total: 10,
        pages: 2,
      });
    });
  });

  describe("buildPageRange", () => {
    it("lists every page up to nine", () => {
      expect(buildPageRange(5, 9)).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9]);
      expect(buildPageRange(1, 0)).toEqual([]);
    });

    it("windows around the current page with both gaps", () => {
      expect(buildPageRange(10, 20)).toEqual([
        1, 2, "…", 8, 9, 10, 11, 12, "…", 19, 20,
      ]);
    });

    it("omits the leading gap near the start", () => {
      expect(buildPageRange(1, 20)).toEqual([1, 2, 3, "…", 19, 20]);
      expect(buildPageRange(4, 20)).toEqual([1, 2, 3, 4, 5, 6, "…", 19, 20]);
    });

    it("omits the trailing gap near the end", () => {
      expect(buildPageRange(20, 20)).toEqual([1, 2, "…", 18, 19, 20]);
    });
  });

  it("escapes LIKE wildcards", () => {
    expect(escapeLikePattern("50%_off\\")).toBe("50\\%\\_off\\\\");
  });
});
