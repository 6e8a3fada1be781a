// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@app/_lib/pageQuery`
 * Purpose: Normalizes App Router `searchParams` into the record shape the v1 contracts parse, and back into a query string.
 * Scope: Pure. Does not validate; contracts do.
 * Invariants: Keys listed as repeated always come back as arrays; other keys keep their first value.
 * Side-effects: none
 * Links: app/_lib/http/request (searchParamsRecord)
 * @internal
 */

export type PageSearchParams = Record<string, string | string[] | undefined>;

export function normalizeSearchParams(
  params: PageSearchParams,
  repeated: readonly string[] = []
): Record<string, string | string[]> {
  const record: Record<string, string | string[]> = {};
  for (const [key, value] of Object.entries(params)) {
    if (value === undefined) continue;
    const values = Array.isArray(value) ? value : [value];
    if (repeated.includes(key)) {
      record[key] = values;
    } else if (values[0] !== undefined) {
      record[key] = values[0];
    }
  }
  return record;
}

/** Query string for links, with `page` dropped so pagination can set it. */
export function toQueryWithoutPage(
  record: Record<string, string | string[]>
): URLSearchParams {
  const query = new URLSearchParams();
  for (const [key, value] of Object.entries(record)) {
    if (key === "page") continue;
    for (const item of Array.isArray(value) ? value : [value]) {
      if (item !== "") query.append(key, item);
    }
  }
  return query;
}
