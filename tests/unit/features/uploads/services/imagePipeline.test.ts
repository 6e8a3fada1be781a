// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/uploads/services/imagePipeline`
 * Purpose: Unit tests for image validation, compression hand-off and replacement cleanup.
 * Scope: Uses FakeImageProcessor and InMemoryImageStore.
 * Invariants: Rejected uploads never reach the store; default images are never removed.
 * Side-effects: none
 * Links: src/features/uploads/services/imagePipeline.ts
 * @public
 */

import { FakeImageProcessor } from "@tests/_fakes";
import { describe, expect, it, vi } from "vitest";

import { InMemoryImageStore } from "@/adapters/test";
import { InvalidImageError } from "@/core";
import { processImageUpload, replaceImage } from "@/features/uploads/public";

function setup(maxUploadBytes = 16) {
  return {
    imageProcessor: new FakeImageProcessor(),
    imageStore: new InMemoryImageStore(),
    maxUploadBytes,
  };
}

const upload = (size: number, filename = "photo.gif", mimeType = "image/gif") => ({
  filename,
  mimeType,
  bytes: new Uint8Array(size).fill(7),
});

describe("features/uploads/services/imagePipeline", () => {
  it("stores the compressed image as jpg", async () => {
    const deps = setup();

    const path = await processImageUpload(deps, upload(4));

    expect(path).toBe("/uploads/test/image-1.jpg");
    expect(deps.imageStore.files.get(path)).toEqual(new Uint8Array(4).fill(7));
    expect(deps.imageProcessor.calls).toBe(1);
  });

  it.each([
    ["type", upload(4, "photo.bmp", "image/bmp")],
    ["empty", upload(0)],
    ["size", upload(17)],
  ] as const)("rejects %s problems before decoding", async (reason, file) => {
    const deps = setup();

    await expect(processImageUpload(deps, file)).rejects.toMatchObject({ reason });
    expect(deps.imageProcessor.calls).toBe(0);
    expect(deps.imageStore.files.size).toBe(0);
  });

  it("maps undecodable bytes to InvalidImageError", async () => {
    const deps = setup();
    deps.imageProcessor.rejectAll();

    const attempt = processImageUpload(deps, upload(4));
    await expect(attempt).rejects.toBeInstanceOf(InvalidImageError);
    await expect(attempt).rejects.toMatchObject({ reason: "decode" });
    expect(deps.imageStore.files.size).toBe(0);
  });

  describe("replaceImage", () => {
    it("removes the previous upload after assigning the new one", async () => {
      const deps = setup();
      const assign = vi.fn(async () => "/uploads/2025/01/old.jpg");

      const path = await replaceImage(deps, upload(4), assign);

      expect(assign).toHaveBeenCalledWith(path);
      expect(deps.imageStore.removed).toEqual(["/uploads/2025/01/old.jpg"]);
    });

    it("keeps the shared default image", async () => {
      const deps = setup();

      await replaceImage(deps, upload(4), async () => "/images/default.jpg");

      expect(deps.imageStore.removed).toEqual([]);
    });

    it("does not call assign when validation fails", async () => {
      const deps = setup();
      const assign = vi.fn(async () => "/uploads/2025/01/old.jpg");

      await expect(replaceImage(deps, upload(0), assign)).rejects.toBeInstanceOf(
        InvalidImageError
      );
      expect(assign).not.toHaveBeenCalled();
    });
  });
});
