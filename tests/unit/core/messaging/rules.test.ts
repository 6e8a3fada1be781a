// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/messaging/rules`
 * Purpose: Unit tests for message participation, purge eligibility, inbox order and unread counting.
 * Scope: Pure business logic testing. Does NOT touch storage.
 * Side-effects: none
 * Links: core/messaging/rules
 * @public
 */

import { describe, expect, it } from "vitest";

import type { Message } from "@/core";
import {
  compareInbox,
  countUnread,
  isParticipant,
  isPurgeable,
  participation,
} from "@/core";

function message(overrides: Partial<Message> = {}): Message {
  return {
    id: "m1",
    senderId: "alice",
    senderName: "alice",
    senderEmail: "alice@example.com",
    recipientId: "bob",
    subject: "Hello",
    body: "Hi Bob",
    isRead: false,
    deletedBySender: false,
    deletedByRecipient: false,
    createdAt: new Date("2025-03-01T12:00:00.000Z"),
    ...overrides,
  };
}

describe("core/messaging/rules", () => {
  describe("participation", () => {
    it("identifies both sides of a message", () => {
      expect(participation(message(), "alice")).toEqual({
        asSender: true,
        asRecipient: false,
      });
      expect(participation(message(), "bob")).toEqual({
        asSender: false,
        asRecipient: true,
      });
    });

    it("drops a side once that party deleted it", () => {
      const side = participation(message({ deletedByRecipient: true }), "bob");
      expect(isParticipant(side)).toBe(false);
    });

    it("keeps both sides for a note to self", () => {
      const self = message({ senderId: "bob" });
      expect(participation(self, "bob")).toEqual({
        asSender: true,
        asRecipient: true,
      });
    });

    it("excludes outsiders", () => {
      expect(isParticipant(participation(message(), "carol"))).toBe(false);
    });
  });

  describe("isPurgeable", () => {
    it("requires both sides gone", () => {
      expect(isPurgeable(message({ deletedByRecipient: true }))).toBe(false);
      expect(
        isPurgeable(message({ deletedByRecipient: true, deletedBySender: true }))
      ).toBe(true);
    });

    it("treats a guest sender as already gone", () => {
      expect(
        isPurgeable(message({ senderId: null, deletedByRecipient: true }))
      ).toBe(true);
    });
  });

  describe("compareInbox", () => {
    it("puts unread first, then newest first", () => {
      const oldUnread = message({
        id: "a",
        createdAt: new Date("2025-01-01T00:00:00.000Z"),
      });
      const newRead = message({
        id: "b",
        isRead: true,
        createdAt: new Date("2025-02-01T00:00:00.000Z"),
      });
      const newUnread = message({
        id: "c",
        createdAt: new Date("2025-02-01T00:00:00.000Z"),
      });

      const ids = [newRead, oldUnread, newUnread]
        .sort(compareInbox)
        .map((m) => m.id);
      expect(ids).toEqual(["c", "a", "b"]);
    });
  });

  describe("countUnread", () => {
    it("counts unread, undeleted messages addressed to the user", () => {
      const messages = [
        message({ id: "1" }),
        message({ id: "2", isRead: true }),
        message({ id: "3", deletedByRecipient: true }),
        message({ id: "4", recipientId: "carol" }),
      ];
      expect(countUnread(messages, "bob")).toBe(1);
      expect(countUnread([], "bob")).toBe(0);
    });
  });
});
