// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@components/kit/navigation/Pagination`
 * Purpose: Page-number strip with gaps for paged search results.
 * Scope: Presentational server component. Builds links by setting `page` on the given query; does not fetch.
 * Invariants: Renders nothing for a single page; the current page is not a link.
 * Side-effects: none
 * Links: core/search/rules (buildPageRange)
 * @public
 */

import Link from "next/link";
import type { ReactElement } from "react";

import { buildPageRange } from "@/core";

export interface PaginationProps {
  basePath: string;
  /** Current query, without `page` */
  query: URLSearchParams;
  page: number;
  pages: number;
}

function hrefFor(basePath: string, query: URLSearchParams, page: number) {
  const params = new URLSearchParams(query);
  params.set("page", String(page));
  return `${basePath}?${params.toString()}`;
}

export function Pagination({
  basePath,
  query,
  page,
  pages,
}: PaginationProps): ReactElement | null {
  if (pages <= 1) return null;

  return (
    <nav aria-label="Pagination" className="pagination">
      {page > 1 && (
        <Link href={hrefFor(basePath, query, page - 1)}>&laquo; Prev</Link>
      )}
      {buildPageRange(page, pages).map((item, index) =>
        item === page ? (
          <span key={item} aria-current="page">
            {item}
          </span>
        ) : typeof item === "number" ? (
          <Link key={item} href={hrefFor(basePath, query, item)}>
            {item}
          </Link>
        ) : (
          <span key={`gap-${index}`}>{item}</span>
        )
      )}
      {page < pages && (
        <Link href={hrefFor(basePath, query, page + 1)}>Next &raquo;</Link>
      )}
    </nav>
  );
}
