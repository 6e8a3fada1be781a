// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/images/sharp-image-processor`
 * Purpose: ImageProcessor that normalizes uploads to a bounded JPEG with sharp.
 * Scope: Decode, auto-orient, downscale, flatten transparency, JPEG encode.
 * Invariants:
 * - Output fits inside COMPRESSED_MAX_DIMENSION on both axes; smaller images are not enlarged.
 * - Undecodable input surfaces as ImageDecodePortError.
 * Side-effects: none (CPU only)
 * Links: ports/image.port.ts, core/uploads/rules.ts
 * @public
 */

import sharp from "sharp";

import { COMPRESSED_JPEG_QUALITY, COMPRESSED_MAX_DIMENSION } from "@/core";
import type { CompressedImage, ImageProcessor } from "@/ports";
import { ImageDecodePortError } from "@/ports";

export class SharpImageProcessor implements ImageProcessor {
  async compress(bytes: Uint8Array): Promise<CompressedImage> {
    try {
      const { data, info } = await sharp(bytes)
        .rotate()
        .resize({
          width: COMPRESSED_MAX_DIMENSION,
          height: COMPRESSED_MAX_DIMENSION,
          fit: "inside",
          withoutEnlargement: true,
        })
        .flatten({ background: "#ffffff" })
        .jpeg({ quality: COMPRESSED_JPEG_QUALITY })
        .toBuffer({ resolveWithObject: true });

      return {
        bytes: data,
        width: info.width,
        height: info.height,
        format: "jpeg",
      };
    } catch (error) {
      throw new ImageDecodePortError(error);
    }
  }
}
