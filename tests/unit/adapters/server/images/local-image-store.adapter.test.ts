// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/images/local-image-store`
 * Purpose: Verifies dated upload paths and guarded removal on the local filesystem.
 * Scope: Writes under a temporary directory removed after each test.
 * Side-effects: IO (temp directory)
 * Links: src/adapters/server/images/local-image-store.adapter.ts
 * @public
 */

import { access, mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";

import { FakeClock } from "@tests/_fakes";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { LocalImageStore } from "@/adapters/server";

describe("LocalImageStore", () => {
  let uploadDir: string;
  let store: LocalImageStore;

  beforeEach(async () => {
    uploadDir = await mkdtemp(path.join(tmpdir(), "devsearch-uploads-"));
    store = new LocalImageStore(
      { uploadDir, publicPath: "/uploads/" },
      new FakeClock("2025-03-01T12:00:00.000Z")
    );
  });

  afterEach(async () => {
    await rm(uploadDir, { recursive: true, force: true });
  });

  it("saves under a dated directory and returns the public path", async () => {
    const stored = await store.save(new Uint8Array([1, 2, 3]), "jpg");

    expect(stored).toMatch(/^\/uploads\/2025\/03\/01\/[0-9a-f-]{36}\.jpg$/);
    const onDisk = path.join(uploadDir, ...stored.slice("/uploads/".length).split("/"));
    expect([...(await readFile(onDisk))]).toEqual([1, 2, 3]);
  });

  it("removes a stored file", async () => {
    const stored = await store.save(new Uint8Array([1]), "jpg");
    const onDisk = path.join(uploadDir, ...stored.slice("/uploads/".length).split("/"));

    await store.remove(stored);

    await expect(access(onDisk)).rejects.toThrow();
  });

  it("ignores paths outside the upload prefix or escaping it", async () => {
    const outside = path.join(uploadDir, "keep.jpg");
    await writeFile(outside, new Uint8Array([1]));

    await store.remove("/images/default.jpg");
    await store.remove("/uploads/../keep.jpg");

    await expect(access(outside)).resolves.toBeUndefined();
  });

  it("treats an already missing file as removed", async () => {
    await expect(store.remove("/uploads/2025/03/01/missing.jpg")).resolves.toBeUndefined();
  });
});
