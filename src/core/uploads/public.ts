// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/uploads/public`
 * Purpose: Public API for the uploads domain.
 * Scope: Barrel export. Does not expose internal implementation details.
 * Invariants: Only exports stable public interfaces and functions.
 * Side-effects: none (re-exports only)
 * Links: Imported via @/core
 * @public
 */

export { InvalidImageError, isInvalidImageError } from "./errors";
export type {
  ImageUpload,
  InvalidImageReason,
  StoredImagePath,
} from "./model";
export {
  ALLOWED_IMAGE_TYPES,
  checkImageUpload,
  COMPRESSED_JPEG_QUALITY,
  COMPRESSED_MAX_DIMENSION,
  fileExtension,
  isAllowedImageType,
} from "./rules";
