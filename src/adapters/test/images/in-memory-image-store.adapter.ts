// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/test/images/in-memory-image-store`
 * Purpose: ImageStore keeping saved images in a Map.
 * Scope: Test adapter. Paths mimic LocalImageStore's shape under /uploads/test.
 * Side-effects: none (in-memory only)
 * Links: Implements ImageStore port
 * @public
 */

import type { StoredImagePath } from "@/core";
import type { ImageStore } from "@/ports";

export class InMemoryImageStore implements ImageStore {
  public readonly files = new Map<StoredImagePath, Uint8Array>();
  public readonly removed: StoredImagePath[] = [];
  private seq = 0;

  async save(bytes: Uint8Array, extension: "jpg"): Promise<StoredImagePath> {
    this.seq += 1;
    const path = `/uploads/test/image-${this.seq}.${extension}`;
    this.files.set(path, bytes);
    return path;
  }

  async remove(path: StoredImagePath): Promise<void> {
    this.removed.push(path);
    this.files.delete(path);
  }
}
