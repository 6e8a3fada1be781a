// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/uploads/rules`
 * Purpose: Upload allow-list and pre-decode validation.
 * Scope: Pure checks on metadata and byte length. Does not decode the image.
 * Invariants: Type is checked before size; both before any decoding or storage.
 * Side-effects: none
 * Links: features/uploads/services/imagePipeline.ts
 * @public
 */

import type { ImageUpload, InvalidImageReason } from "./model";

export const ALLOWED_IMAGE_TYPES: Readonly<Record<string, readonly string[]>> =
  {
    "image/png": ["png"],
    "image/jpeg": ["jpg", "jpeg"],
    "image/gif": ["gif"],
  };

export const COMPRESSED_MAX_DIMENSION = 1024;
export const COMPRESSED_JPEG_QUALITY = 85;

export function fileExtension(filename: string): string | null {
  const dot = filename.lastIndexOf(".");
  if (dot <= 0 || dot === filename.length - 1) return null;
  return filename.slice(dot + 1).toLowerCase();
}

export function isAllowedImageType(
  upload: Pick<ImageUpload, "filename" | "mimeType">
): boolean {
  const allowedExtensions = Object.values(ALLOWED_IMAGE_TYPES).flat();
  const ext = fileExtension(upload.filename);
  const mime = upload.mimeType.toLowerCase();
  return (
    Object.hasOwn(ALLOWED_IMAGE_TYPES, mime) &&
    ext !== null &&
    allowedExtensions.includes(ext)
  );
}

/**
 * Returns the first failing reason, or null when the upload may be decoded.
 */
export function checkImageUpload(
  upload: ImageUpload,
  maxBytes: number
): InvalidImageReason | null {
  if (!isAllowedImageType(upload)) return "type";
  if (upload.bytes.byteLength === 0) return "empty";
  if (upload.bytes.byteLength > maxBytes) return "size";
  return null;
}
