// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@contracts/common.v1.contract`
 * Purpose: Wire schemas shared by several v1 operations (paging, identifiers).
 * Scope: Zod building blocks only. Does not define operations.
 * Invariants: Query-string numbers are coerced; unparseable or out-of-range paging falls back to defaults in the service, never a 400.
 * Side-effects: none
 * Links: contracts/*.v1.contract
 * @internal
 */

import { z } from "zod";

export const IdSchema = z.string().uuid();

export const PageQuerySchema = z.object({
  page: z.coerce.number().int().optional().catch(undefined),
  size: z.coerce.number().int().optional().catch(undefined),
});

/** Optional free text on input; empty string clears the field. */
export const OptionalTextInput = z.string().nullable().optional();

/** Page envelope around any item schema. */
export function pageOf<T extends z.ZodTypeAny>(item: T) {
  return z.object({
    items: z.array(item),
    page: z.number().int().min(1),
    size: z.number().int().min(1),
    total: z.number().int().min(0),
    pages: z.number().int().min(0),
  });
}
