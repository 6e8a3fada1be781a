// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/uploads/services/imagePipeline`
 * Purpose: Validate, compress and store an uploaded image; swap it in for a previous one.
 * Scope: Orchestrates ImageProcessor + ImageStore. Does not know which entity owns the image.
 * Invariants:
 * - Any validation or decode failure raises InvalidImageError and ImageStore.save is never called.
 * - Default images are never removed.
 * Side-effects: IO (via ports)
 * Links: core/uploads/rules.ts, ports/image.port.ts
 * @public
 */

import type { ImageUpload, StoredImagePath } from "@/core";
import { checkImageUpload, InvalidImageError, isRemovableImage } from "@/core";
import type { ImageProcessor, ImageStore } from "@/ports";
import { isImageDecodePortError } from "@/ports";

export interface ImagePipelineDeps {
  imageProcessor: ImageProcessor;
  imageStore: ImageStore;
  maxUploadBytes: number;
}

export async function processImageUpload(
  deps: ImagePipelineDeps,
  upload: ImageUpload
): Promise<StoredImagePath> {
  const reason = checkImageUpload(upload, deps.maxUploadBytes);
  if (reason) {
    throw new InvalidImageError(reason);
  }

  let compressed: Uint8Array;
  try {
    ({ bytes: compressed } = await deps.imageProcessor.compress(upload.bytes));
  } catch (error) {
    if (isImageDecodePortError(error)) {
      throw new InvalidImageError("decode");
    }
    throw error;
  }

  return deps.imageStore.save(compressed, "jpg");
}

/**
 * Process `upload`, hand the stored path to `assign`, then drop the image it replaced.
 * `assign` returns the previous path.
 */
export async function replaceImage(
  deps: ImagePipelineDeps,
  upload: ImageUpload,
  assign: (storedPath: StoredImagePath) => Promise<string>
): Promise<StoredImagePath> {
  const storedPath = await processImageUpload(deps, upload);
  const previous = await assign(storedPath);
  if (isRemovableImage(previous) && previous !== storedPath) {
    await deps.imageStore.remove(previous);
  }
  return storedPath;
}
