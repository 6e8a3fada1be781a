// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/common/public`
 * Purpose: Public API for cross-domain errors.
 * Scope: Barrel export. Does not expose internal implementation details.
 * Invariants: Only exports stable public interfaces and functions.
 * Side-effects: none (re-exports only)
 * Links: Imported via @/core
 * @public
 */

export type { EntityKind, FieldErrors } from "./errors";
export {
  FieldValidationError,
  ForbiddenError,
  isFieldValidationError,
  isForbiddenError,
  isNotFoundError,
  isUnauthorizedError,
  NotFoundError,
  UnauthorizedError,
} from "./errors";
