// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/search/rules`
 * Purpose: Pure search helpers: criteria normalization, pagination math, page-strip builder, LIKE escaping.
 * Scope: Computation only. Does not build SQL.
 * Invariants:
 * - Blank free text normalizes to null so empty searches equal unfiltered listings.
 * - page >= 1, 1 <= size <= MAX_PAGE_SIZE.
 * Side-effects: none
 * Links: features/search/services, adapters/server/search
 * @public
 */

import type {
  DeveloperSearchCriteria,
  Page,
  PageRangeItem,
  PageRequest,
  ProjectSearchCriteria,
} from "./model";

export const DEFAULT_PAGE_SIZE = 9;
export const MAX_PAGE_SIZE = 50;
export const MAX_QUERY_LENGTH = 100;
export const PAGE_GAP = "…" as const;

export function normalizeQuery(q: string | null | undefined): string | null {
  const trimmed = (q ?? "").trim().replace(/\s+/g, " ");
  if (trimmed.length === 0) return null;
  return trimmed.slice(0, MAX_QUERY_LENGTH);
}

function normalizeFilterList(values: readonly string[] | undefined): string[] {
  const cleaned = (values ?? [])
    .map((v) => v.trim().replace(/\s+/g, " ").toLowerCase())
    .filter((v) => v.length > 0);
  return [...new Set(cleaned)];
}

export function normalizeProjectCriteria(input: {
  q?: string | null | undefined;
  tags?: readonly string[] | undefined;
}): ProjectSearchCriteria {
  return { q: normalizeQuery(input.q), tags: normalizeFilterList(input.tags) };
}

export function normalizeDeveloperCriteria(input: {
  q?: string | null | undefined;
  skills?: readonly string[] | undefined;
}): DeveloperSearchCriteria {
  return {
    q: normalizeQuery(input.q),
    skills: normalizeFilterList(input.skills),
  };
}

export function normalizePageRequest(input: {
  page?: number | undefined;
  size?: number | undefined;
}): PageRequest {
  const page =
    input.page !== undefined && Number.isInteger(input.page) && input.page >= 1
      ? input.page
      : 1;
  const size =
    input.size !== undefined && Number.isInteger(input.size) && input.size >= 1
      ? Math.min(input.size, MAX_PAGE_SIZE)
      : DEFAULT_PAGE_SIZE;
  return { page, size };
}

export function pageOffset(req: PageRequest): number {
  return (req.page - 1) * req.size;
}

export function pageCount(total: number, size: number): number {
  return total === 0 ? 0 : Math.ceil(total / size);
}

export function toPage<T>(items: T[], total: number, req: PageRequest): Page<T> {
  return {
    items,
    page: req.page,
    size: req.size,
    total,
    pages: pageCount(total, req.size),
  };
}

/**
 * Page-number strip with gaps, e.g. page 10 of 20:
 * 1 2 … 8 9 10 11 12 … 19 20
 */
export function buildPageRange(
  current: number,
  pages: number,
  onEachSide = 2,
  onEnds = 2
): PageRangeItem[] {
  const range = (from: number, to: number): number[] =>
    to < from ? [] : Array.from({ length: to - from + 1 }, (_, i) => from + i);

  const maxDisplay = onEachSide * 2 + onEnds * 2 + 1;
  if (pages <= maxDisplay) {
    return range(1, pages);
  }

  const start = Math.max(1, current - onEachSide);
  const end = Math.min(pages, current + onEachSide);

  const beginning: PageRangeItem[] =
    start > onEnds + 1 ? [...range(1, onEnds), PAGE_GAP] : range(1, start - 1);
  const ending: PageRangeItem[] =
    end < pages - onEnds
      ? [PAGE_GAP, ...range(pages - onEnds + 1, pages)]
      : range(end + 1, pages);

  return [...beginning, ...range(start, end), ...ending];
}

/** Escapes LIKE/ILIKE wildcards so user text matches literally. */
export function escapeLikePattern(text: string): string {
  return text.replace(/[\\%_]/g, (c) => `\\${c}`);
}
