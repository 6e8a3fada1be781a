// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/db/schema`
 * Purpose: App-facing view of the Drizzle schema.
 * Scope: Re-exports every table from @devsearch/db-schema. Does not handle connections or migrations.
 * Invariants: Namespace matches the package barrel so `drizzle(client, { schema })` sees all tables.
 * Side-effects: none (schema definitions only)
 * Links: packages/db-schema/src/index.ts
 * @public
 */

export * from "@devsearch/db-schema";
