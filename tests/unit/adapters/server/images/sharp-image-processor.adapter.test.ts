// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/images/sharp-image-processor`
 * Purpose: Verifies downscaling, JPEG output and decode failures with real sharp.
 * Scope: Images are generated in memory.
 * Side-effects: none
 * Links: src/adapters/server/images/sharp-image-processor.adapter.ts
 * @public
 */

import sharp from "sharp";
import { describe, expect, it } from "vitest";

import { SharpImageProcessor } from "@/adapters/server";
import { isImageDecodePortError } from "@/ports";

async function png(width: number, height: number): Promise<Uint8Array> {
  return sharp({
    create: { width, height, channels: 4, background: { r: 40, g: 90, b: 160, alpha: 0.5 } },
  })
    .png()
    .toBuffer();
}

describe("SharpImageProcessor", () => {
  const processor = new SharpImageProcessor();

  it("fits large images inside 1024px, keeping the aspect ratio", async () => {
    const result = await processor.compress(await png(2000, 1000));

    expect(result).toMatchObject({ width: 1024, height: 512, format: "jpeg" });
    expect([result.bytes[0], result.bytes[1]]).toEqual([0xff, 0xd8]);
  });

  it("does not enlarge small images", async () => {
    const result = await processor.compress(await png(100, 50));
    expect(result).toMatchObject({ width: 100, height: 50 });
  });

  it("reports undecodable bytes as a decode error", async () => {
    const attempt = processor.compress(new TextEncoder().encode("not an image"));
    await expect(attempt).rejects.toSatisfy(isImageDecodePortError);
  });
});
