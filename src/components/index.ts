// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@components`
 * Purpose: Public surface for shared UI components via re-exports.
 * Scope: Re-exports components only. Does not export internal utilities or development helpers.
 * Invariants: Only re-exports from component files; no circular dependencies; maintains type exports.
 * Side-effects: none
 * Notes: Changes here affect the components public API contract; follows barrel export pattern.
 * @public
 */

export { FormError } from "./kit/forms/FormError";
export { FormField, type FormFieldProps } from "./kit/forms/FormField";
export {
  type ApiFormState,
  useApiForm,
  type UseApiFormOptions,
} from "./kit/forms/useApiForm";
export { Pagination, type PaginationProps } from "./kit/navigation/Pagination";
