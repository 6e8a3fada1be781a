// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/unit/app/_lib/http/request`
 * Purpose: Unit tests for route body and parameter readers.
 * Scope: JSON bodies, multipart image fields, id parsing and query records. Does NOT test route handlers.
 * Side-effects: none
 * Links: src/app/_lib/http/request.ts
 * @public
 */

import { TEST_PROJECT_ID } from "@tests/_fakes/ids";
import { NextRequest } from "next/server";
import { describe, expect, it } from "vitest";

import {
  InvalidRequestBodyError,
  parseEntityId,
  readImageUpload,
  readJsonBody,
  searchParamsRecord,
} from "@/app/_lib/http";
import { FieldValidationError, NotFoundError } from "@/core";

const URL = "http://localhost:3000/api/v1/test";

describe("readJsonBody", () => {
  it("returns the parsed body", async () => {
    const request = new NextRequest(URL, {
      method: "POST",
      body: JSON.stringify({ title: "x" }),
    });

    expect(await readJsonBody(request)).toEqual({ title: "x" });
  });

  it("raises InvalidRequestBodyError for malformed JSON", async () => {
    const request = new NextRequest(URL, { method: "POST", body: "{" });

    await expect(readJsonBody(request)).rejects.toBeInstanceOf(
      InvalidRequestBodyError
    );
  });
});

describe("parseEntityId", () => {
  it("passes UUIDs through", () => {
    expect(parseEntityId("project", TEST_PROJECT_ID)).toBe(TEST_PROJECT_ID);
  });

  it("raises NotFoundError for anything else", () => {
    expect(() => parseEntityId("review", "17")).toThrow(NotFoundError);
  });
});

describe("readImageUpload", () => {
  it("reads the named file field", async () => {
    const form = new FormData();
    form.set(
      "image",
      new File([new Uint8Array([1, 2, 3])], "me.png", { type: "image/png" })
    );
    const request = new NextRequest(URL, { method: "PUT", body: form });

    const upload = await readImageUpload(request);

    expect(upload.filename).toBe("me.png");
    expect(upload.mimeType).toBe("image/png");
    expect(Array.from(upload.bytes)).toEqual([1, 2, 3]);
  });

  it("reports a missing file against the field", async () => {
    const form = new FormData();
    form.set("image", "not a file");
    const request = new NextRequest(URL, { method: "PUT", body: form });

    await expect(readImageUpload(request)).rejects.toMatchObject({
      fieldErrors: { image: ["An image file is required."] },
    });
    await expect(
      readImageUpload(new NextRequest(URL, { method: "PUT", body: form }))
    ).rejects.toBeInstanceOf(FieldValidationError);
  });
});

describe("searchParamsRecord", () => {
  it("collects repeated keys as arrays", () => {
    const request = new NextRequest(`${URL}?q=go&skill=a&skill=b&q=rust`);

    expect(searchParamsRecord(request, ["skill"])).toEqual({
      q: "go",
      skill: ["a", "b"],
    });
  });
});
