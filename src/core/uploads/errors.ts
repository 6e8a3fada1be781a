// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/uploads/errors`
 * Purpose: Domain error for rejected image uploads.
 * Scope: Pure error type. Does not handle HTTP status codes.
 * Invariants: Raised before anything is written to storage.
 * Side-effects: none (error definitions only)
 * Links: features/uploads/services/imagePipeline.ts
 * @public
 */

import type { InvalidImageReason } from "./model";

const MESSAGES: Record<InvalidImageReason, string> = {
  type: "Only PNG, JPEG and GIF images are allowed.",
  size: "Image is larger than the allowed maximum.",
  empty: "Image file is empty.",
  decode: "File is not a readable image.",
};

export class InvalidImageError extends Error {
  public readonly code = "INVALID_IMAGE" as const;

  constructor(public readonly reason: InvalidImageReason) {
    super(MESSAGES[reason]);
    this.name = "InvalidImageError";
  }
}

export function isInvalidImageError(
  error: unknown
): error is InvalidImageError {
  return error instanceof InvalidImageError;
}
