// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/unit/components/kit/forms/useApiForm.test`
 * Purpose: Unit tests for the useApiForm submit hook.
 * Scope: Request encoding and error-shape parsing against a stubbed fetch. Does not hit any route.
 * Invariants: FormData bodies go out as multipart without a content-type header; everything else as JSON.
 * Side-effects: none (global fetch stubbed)
 * Links: src/components/kit/forms/useApiForm.ts
 * @vitest-environment jsdom
 * @public
 */

import { act, renderHook } from "@testing-library/react";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { useApiForm } from "@/components";

const fetchMock = vi.fn<typeof fetch>();

function jsonResponse(body: unknown, status: number): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json" },
  });
}

describe("useApiForm", () => {
  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal("fetch", fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("sends plain values as JSON and hands the response to onSuccess", async () => {
    fetchMock.mockResolvedValue(jsonResponse({ bio: "Hi" }, 200));
    const onSuccess = vi.fn();
    const { result } = renderHook(() =>
      useApiForm({ url: "/api/v1/me/profile", method: "PATCH", onSuccess })
    );

    let ok = false;
    await act(async () => {
      ok = await result.current.submit({ bio: "Hi" });
    });

    expect(ok).toBe(true);
    expect(fetchMock).toHaveBeenCalledWith("/api/v1/me/profile", {
      method: "PATCH",
      headers: { "content-type": "application/json" },
      body: '{"bio":"Hi"}',
    });
    expect(onSuccess).toHaveBeenCalledWith({ bio: "Hi" });
    expect(result.current.state).toEqual({
      pending: false,
      error: null,
      fieldErrors: {},
    });
  });

  it("sends FormData as multipart and surfaces the image field error", async () => {
    fetchMock.mockResolvedValue(
      jsonResponse(
        {
          error: "Unsupported image type",
          fieldErrors: { image: ["Unsupported image type"] },
        },
        400
      )
    );
    const { result } = renderHook(() =>
      useApiForm({ url: "/api/v1/me/profile/image", method: "PUT" })
    );
    const body = new FormData();
    body.append("image", new Blob(["not an image"], { type: "text/plain" }), "a.txt");

    let ok = true;
    await act(async () => {
      ok = await result.current.submit(body);
    });

    expect(ok).toBe(false);
    expect(fetchMock).toHaveBeenCalledWith("/api/v1/me/profile/image", {
      method: "PUT",
      body,
    });
    expect(result.current.state).toEqual({
      pending: false,
      error: "Unsupported image type",
      fieldErrors: { image: ["Unsupported image type"] },
    });
  });

  it("reports a network failure as a form-level error", async () => {
    fetchMock.mockRejectedValue(new TypeError("fetch failed"));
    const { result } = renderHook(() => useApiForm({ url: "/api/v1/me/skills" }));

    await act(async () => {
      await result.current.submit({ name: "Rust" });
    });

    expect(result.current.state).toEqual({
      pending: false,
      error: "Network error, please try again.",
      fieldErrors: {},
    });
  });

  it("treats 204 as success with no body", async () => {
    fetchMock.mockResolvedValue(new Response(null, { status: 204 }));
    const onSuccess = vi.fn();
    const { result } = renderHook(() =>
      useApiForm({ url: "/api/v1/me/skills/s1", method: "DELETE", onSuccess })
    );

    await act(async () => {
      await result.current.submit({});
    });

    expect(onSuccess).toHaveBeenCalledWith(null);
  });
});
