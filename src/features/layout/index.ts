// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/layout`
 * Purpose: App-shell layout feature barrel export.
 * Scope: Public API for layout feature components. Does not contain implementation logic.
 * Invariants: Only exports public components.
 * Side-effects: none
 * Links: src/features/layout/components/SiteHeader.tsx
 * @public
 */

export { SiteHeader, type SiteHeaderProps } from "./components/SiteHeader";
