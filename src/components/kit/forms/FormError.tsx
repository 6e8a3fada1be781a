// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@components/kit/forms/FormError`
 * Purpose: Form-level error banner.
 * Scope: Presentational. Renders nothing without a message.
 * Invariants: Uses role="alert" so screen readers announce it.
 * Side-effects: none
 * @public
 */

import type { ReactElement } from "react";

export function FormError({
  message,
}: {
  message: string | null;
}): ReactElement | null {
  if (!message) return null;
  return (
    <p role="alert" className="form-error">
      {message}
    </p>
  );
}
