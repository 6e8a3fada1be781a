// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/images/local-image-store`
 * Purpose: ImageStore writing files below UPLOAD_DIR and serving them from UPLOAD_PUBLIC_PATH.
 * Scope: Save under a dated folder with a random name; best-effort removal.
 * Invariants:
 * - Saved paths look like `${publicPath}/yyyy/mm/dd/<uuid>.jpg`.
 * - remove() only touches paths under publicPath; missing files are not an error.
 * Side-effects: IO (filesystem)
 * Links: ports/image.port.ts
 * @public
 */

import { mkdir, unlink, writeFile } from "node:fs/promises";
import path from "node:path";

import { v4 as uuidv4 } from "uuid";

import type { StoredImagePath } from "@/core";
import type { Clock, ImageStore } from "@/ports";
import { EVENT_NAMES, makeLogger } from "@/shared/observability";

const logger = makeLogger({ component: "LocalImageStore" });

export interface LocalImageStoreConfig {
  /** Filesystem root */
  uploadDir: string;
  /** URL prefix the uploadDir is served under */
  publicPath: string;
}

export class LocalImageStore implements ImageStore {
  private readonly publicPrefix: string;

  constructor(
    private readonly config: LocalImageStoreConfig,
    private readonly clock: Clock
  ) {
    this.publicPrefix = `${config.publicPath.replace(/\/+$/, "")}/`;
  }

  async save(bytes: Uint8Array, extension: "jpg"): Promise<StoredImagePath> {
    const [yyyy = "0000", mm = "00", dd = "00"] = this.clock
      .now()
      .slice(0, 10)
      .split("-");
    const relative = [yyyy, mm, dd, `${uuidv4()}.${extension}`];

    const dir = path.join(this.config.uploadDir, yyyy, mm, dd);
    await mkdir(dir, { recursive: true });
    await writeFile(path.join(this.config.uploadDir, ...relative), bytes);

    return `${this.publicPrefix}${relative.join("/")}`;
  }

  async remove(storedPath: StoredImagePath): Promise<void> {
    if (!storedPath.startsWith(this.publicPrefix)) return;

    const segments = storedPath.slice(this.publicPrefix.length).split("/");
    if (segments.some((s) => s === "" || s === "." || s === "..")) return;

    try {
      await unlink(path.join(this.config.uploadDir, ...segments));
    } catch (error) {
      if (isMissingFile(error)) return;
      logger.warn(
        {
          event: EVENT_NAMES.ADAPTER_IMAGE_STORE_REMOVE_FAILED,
          path: storedPath,
          errMessage: error instanceof Error ? error.message : String(error),
        },
        EVENT_NAMES.ADAPTER_IMAGE_STORE_REMOVE_FAILED
      );
    }
  }
}

function isMissingFile(error: unknown): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    error.code === "ENOENT"
  );
}
