// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/uploads/rules`
 * Purpose: Unit tests for image upload validation order (type, empty, size).
 * Scope: Pure business logic testing. Does NOT decode images.
 * Side-effects: none
 * Links: core/uploads/rules
 * @public
 */

import { describe, expect, it } from "vitest";

import { checkImageUpload, InvalidImageError } from "@/core";

const png = (size: number) => ({
  filename: "avatar.png",
  mimeType: "image/png",
  bytes: new Uint8Array(size),
});

describe("core/uploads/rules", () => {
  it("accepts allowed types within the limit", () => {
    expect(checkImageUpload(png(100), 100)).toBeNull();
    expect(
      checkImageUpload(
        { filename: "PHOTO.JPEG", mimeType: "IMAGE/JPEG", bytes: new Uint8Array(1) },
        100
      )
    ).toBeNull();
  });

  it("rejects unknown mime types and extensions", () => {
    expect(checkImageUpload({ ...png(1), mimeType: "text/plain" }, 100)).toBe(
      "type"
    );
    expect(checkImageUpload({ ...png(1), filename: "avatar.svg" }, 100)).toBe(
      "type"
    );
    expect(checkImageUpload({ ...png(1), filename: "avatar" }, 100)).toBe(
      "type"
    );
  });

  it("checks type before emptiness and emptiness before size", () => {
    expect(checkImageUpload({ ...png(0), filename: "a.txt" }, 100)).toBe("type");
    expect(checkImageUpload(png(0), 100)).toBe("empty");
    expect(checkImageUpload(png(101), 100)).toBe("size");
  });

  it("carries the reason on InvalidImageError", () => {
    const error = new InvalidImageError("size");
    expect(error.reason).toBe("size");
    expect(error.message).toBe("Image is larger than the allowed maximum.");
  });
});
