// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@app/_facades/uploads/trackImageUpload.server`
 * Purpose: Counts image uploads by target and outcome around any upload operation.
 * Scope: Metrics only. Does not alter the result or the error.
 * Invariants: Exactly one counter increment per call; errors are rethrown unchanged.
 * Side-effects: metrics
 * Links: shared/observability/server/metrics
 * @internal
 */

import { isInvalidImageError } from "@/core";
import { imageUploadsTotal } from "@/shared/observability";

export async function trackImageUpload<T>(
  target: "profile" | "project",
  upload: () => Promise<T>
): Promise<T> {
  try {
    const result = await upload();
    imageUploadsTotal.inc({ target, outcome: "stored" });
    return result;
  } catch (error) {
    imageUploadsTotal.inc({
      target,
      outcome: isInvalidImageError(error) ? `rejected_${error.reason}` : "error",
    });
    throw error;
  }
}
