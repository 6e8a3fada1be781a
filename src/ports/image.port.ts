// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports/image.port`
 * Purpose: Image compression and storage ports used by the upload pipeline.
 * Scope: Decode/compress bytes and persist them. Does not validate upload metadata.
 * Invariants:
 * - compress() preserves aspect ratio and throws ImageDecodePortError for undecodable input.
 * - remove() on a missing file is not an error.
 * Side-effects: none (interface only)
 * Links: adapters/server/images/sharp-image-processor.adapter.ts, adapters/server/images/local-image-store.adapter.ts
 * @public
 */

import type { StoredImagePath } from "@/core";

export class ImageDecodePortError extends Error {
  constructor(cause: unknown) {
    super("Image could not be decoded", { cause });
    this.name = "ImageDecodePortError";
  }
}

export function isImageDecodePortError(
  error: unknown
): error is ImageDecodePortError {
  return error instanceof Error && error.name === "ImageDecodePortError";
}

export interface CompressedImage {
  bytes: Uint8Array;
  width: number;
  height: number;
  format: "jpeg";
}

export interface ImageProcessor {
  compress(bytes: Uint8Array): Promise<CompressedImage>;
}

export interface ImageStore {
  save(bytes: Uint8Array, extension: "jpg"): Promise<StoredImagePath>;
  remove(path: StoredImagePath): Promise<void>;
}
