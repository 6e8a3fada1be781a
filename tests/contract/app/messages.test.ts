// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/contract/app/messages`
 * Purpose: Contract tests for the authenticated message endpoints.
 * Scope: Session gating, unread count shape, 404 for malformed ids. Does NOT test message visibility rules.
 * Invariants: No session means 401 and the facade is never called.
 * Side-effects: none (facades, session and container mocked)
 * Links: src/app/api/v1/messages/**, contracts/messages.v1.contract
 * @public
 */

import { TEST_SESSION_USER_1 } from "@tests/_fakes/ids";
import { NextRequest } from "next/server";
import { beforeEach, describe, expect, it, vi } from "vitest";

vi.mock("@/bootstrap/container", () => ({
  getContainer: vi.fn(() => ({
    log: {
      child: vi.fn().mockReturnThis(),
      info: vi.fn(),
      debug: vi.fn(),
      error: vi.fn(),
      warn: vi.fn(),
    },
    clock: { now: () => new Date("2025-03-01T12:00:00.000Z") },
    config: { unhandledErrorPolicy: "rethrow" },
  })),
}));

vi.mock("@/app/_lib/auth/session", () => ({
  getSessionUser: vi.fn(),
}));

vi.mock("@/app/_facades/messaging/messages.server", () => ({
  unreadCountFacade: vi.fn(),
  openMessageFacade: vi.fn(),
  deleteMessageFacade: vi.fn(),
}));

import {
  openMessageFacade,
  unreadCountFacade,
} from "@/app/_facades/messaging/messages.server";
import { getSessionUser } from "@/app/_lib/auth/session";
import { GET as openMessage } from "@/app/api/v1/messages/[messageId]/route";
import { GET as unreadCount } from "@/app/api/v1/messages/unread-count/route";

const BASE = "http://localhost:3000/api/v1/messages";

describe("/api/v1/messages", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it("returns the unread count for the caller", async () => {
    vi.mocked(getSessionUser).mockResolvedValue(TEST_SESSION_USER_1);
    vi.mocked(unreadCountFacade).mockResolvedValue(3);

    const response = await unreadCount(
      new NextRequest(`${BASE}/unread-count`)
    );

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({ unreadCount: 3 });
    expect(unreadCountFacade).toHaveBeenCalledWith({
      sessionUser: TEST_SESSION_USER_1,
    });
  });

  it("answers 401 without a session", async () => {
    vi.mocked(getSessionUser).mockResolvedValue(null);

    const response = await unreadCount(
      new NextRequest(`${BASE}/unread-count`)
    );

    expect(response.status).toBe(401);
    expect(unreadCountFacade).not.toHaveBeenCalled();
  });

  it("answers 404 for a malformed message id", async () => {
    vi.mocked(getSessionUser).mockResolvedValue(TEST_SESSION_USER_1);

    const response = await openMessage(new NextRequest(`${BASE}/42`), {
      params: Promise.resolve({ messageId: "42" }),
    });

    expect(response.status).toBe(404);
    expect(await response.json()).toEqual({
      error: "Not found",
      entity: "message",
    });
    expect(openMessageFacade).not.toHaveBeenCalled();
  });
});
