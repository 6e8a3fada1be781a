// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/uploads/model`
 * Purpose: Uploaded image value types.
 * Scope: Pure types. Does not decode or store images.
 * Invariants: bytes is the complete upload body.
 * Side-effects: none
 * Links: features/uploads/services/imagePipeline.ts
 * @public
 */

export interface ImageUpload {
  filename: string;
  mimeType: string;
  bytes: Uint8Array;
}

export type InvalidImageReason = "type" | "size" | "empty" | "decode";

/** Public path of a stored image, e.g. `/uploads/2026/10/19/<uuid>.jpg`. */
export type StoredImagePath = string;
