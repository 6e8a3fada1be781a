// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@devsearch/db-schema`
 * Purpose: Root barrel re-exporting all schema slices for consumers that need the full schema.
 * Scope: Re-exports only. Does not define any tables.
 * Invariants: Must re-export every slice so the resulting namespace matches src/shared/db/schema.ts.
 * Side-effects: none
 * Links: drizzle.config.ts
 * @public
 */

export * from "./accounts";
export * from "./messaging";
export * from "./profiles";
export * from "./projects";
