// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/messaging/services/messaging`
 * Purpose: Unit tests for sending, reading, listing and deleting direct messages.
 * Scope: Service rules over InMemoryMessageRepository.
 * Invariants: Unread count equals unread, undeleted messages addressed to the user after every operation.
 * Side-effects: none
 * Links: src/features/messaging/services/messaging.ts
 * @public
 */

import { createInMemoryDeps, type InMemoryDeps, seedUser } from "@tests/_fakes";
import { beforeEach, describe, expect, it } from "vitest";

import type { User } from "@/core";
import { FieldValidationError, ForbiddenError, NotFoundError } from "@/core";
import {
  deleteMessage,
  inbox,
  markRead,
  openMessage,
  send,
  sendAsGuest,
  sent,
  unreadCount,
} from "@/features/messaging/public";

describe("features/messaging/services/messaging", () => {
  let deps: InMemoryDeps;
  let alice: User;
  let bob: User;

  const note = (subject: string) => ({ subject, body: `${subject} body` });

  beforeEach(async () => {
    deps = createInMemoryDeps();
    alice = await seedUser(deps, "alice");
    bob = await seedUser(deps, "bob");
  });

  describe("send", () => {
    it("records the member sender's name and address", async () => {
      const message = await send(deps, alice.id, {
        recipientId: bob.id,
        subject: "  Hello ",
        body: " Want to pair? ",
      });

      expect(message).toMatchObject({
        senderId: alice.id,
        senderName: "alice",
        senderEmail: "alice@example.com",
        recipientId: bob.id,
        subject: "Hello",
        body: "Want to pair?",
        isRead: false,
      });
    });

    it("validates subject and body lengths together", async () => {
      await expect(
        send(deps, alice.id, {
          recipientId: bob.id,
          subject: "   ",
          body: "x".repeat(10_001),
        })
      ).rejects.toMatchObject({
        fieldErrors: {
          subject: ["Subject must be between 1 and 200 characters."],
          body: ["Message must be between 1 and 10000 characters."],
        },
      });
    });

    it("refuses deactivated or unknown recipients", async () => {
      await deps.users.deactivate(bob.id);
      await expect(
        send(deps, alice.id, { recipientId: bob.id, ...note("Hi") })
      ).rejects.toBeInstanceOf(NotFoundError);
    });

    it("allows a note to self", async () => {
      const message = await send(deps, alice.id, {
        recipientId: alice.id,
        ...note("Reminder"),
      });
      expect(await unreadCount(deps, alice.id)).toBe(1);

      const opened = await openMessage(deps, message.id, alice.id);
      expect(opened.isRead).toBe(true);
    });
  });

  describe("sendAsGuest", () => {
    it("stores the guest's name and normalized address without a sender id", async () => {
      const message = await sendAsGuest(deps, bob.id, {
        name: " Visitor ",
        email: "Visitor@Example.com",
        ...note("Job offer"),
      });

      expect(message).toMatchObject({
        senderId: null,
        senderName: "Visitor",
        senderEmail: "visitor@example.com",
      });
    });

    it("validates the guest's name and address", async () => {
      const attempt = sendAsGuest(deps, bob.id, {
        name: "",
        email: "not-an-address",
        ...note("Hi"),
      });
      await expect(attempt).rejects.toBeInstanceOf(FieldValidationError);
      await expect(attempt).rejects.toMatchObject({
        fieldErrors: {
          name: ["Name must be between 1 and 200 characters."],
          email: ["Enter a valid email address."],
        },
      });
    });

    it("rejects a guest address too long to store", async () => {
      const attempt = sendAsGuest(deps, bob.id, {
        name: "Visitor",
        email: `${"v".repeat(240)}@example.com`,
        ...note("Hi"),
      });
      await expect(attempt).rejects.toMatchObject({
        fieldErrors: { email: ["Enter a valid email address."] },
      });
      expect(await unreadCount(deps, bob.id)).toBe(0);
    });
  });

  describe("reading", () => {
    it("keeps the unread count in step with every operation", async () => {
      const first = await send(deps, alice.id, { recipientId: bob.id, ...note("One") });
      const second = await send(deps, alice.id, { recipientId: bob.id, ...note("Two") });
      await sendAsGuest(deps, bob.id, {
        name: "Visitor",
        email: "visitor@example.com",
        ...note("Three"),
      });
      expect(await unreadCount(deps, bob.id)).toBe(3);

      await openMessage(deps, first.id, bob.id);
      expect(await unreadCount(deps, bob.id)).toBe(2);

      await markRead(deps, first.id, bob.id);
      expect(await unreadCount(deps, bob.id)).toBe(2);

      await deleteMessage(deps, second.id, bob.id);
      expect(await unreadCount(deps, bob.id)).toBe(1);

      expect(await unreadCount(deps, alice.id)).toBe(0);
    });

    it("does not mark read when the sender opens the message", async () => {
      const message = await send(deps, alice.id, { recipientId: bob.id, ...note("Hi") });

      const opened = await openMessage(deps, message.id, alice.id);
      expect(opened.isRead).toBe(false);
      expect(await unreadCount(deps, bob.id)).toBe(1);
    });

    it("forbids the sender from marking read and hides the message from outsiders", async () => {
      const carol = await seedUser(deps, "carol");
      const message = await send(deps, alice.id, { recipientId: bob.id, ...note("Hi") });

      await expect(markRead(deps, message.id, alice.id)).rejects.toBeInstanceOf(
        ForbiddenError
      );
      await expect(markRead(deps, message.id, carol.id)).rejects.toBeInstanceOf(
        NotFoundError
      );
      await expect(openMessage(deps, message.id, carol.id)).rejects.toBeInstanceOf(
        NotFoundError
      );
    });

    it("lists unread first, then newest first", async () => {
      const older = await send(deps, alice.id, { recipientId: bob.id, ...note("Older") });
      deps.clock.advanceSeconds(60);
      const newer = await send(deps, alice.id, { recipientId: bob.id, ...note("Newer") });
      deps.clock.advanceSeconds(60);
      const newest = await send(deps, alice.id, { recipientId: bob.id, ...note("Newest") });
      await markRead(deps, newest.id, bob.id);

      const box = await inbox(deps, bob.id);
      expect(box.messages.map((m) => m.id)).toEqual([newer.id, older.id, newest.id]);
      expect(box.unreadCount).toBe(2);
    });
  });

  describe("deleteMessage", () => {
    it("hides the message per side and purges once both sides are gone", async () => {
      const message = await send(deps, alice.id, { recipientId: bob.id, ...note("Hi") });

      expect(await deleteMessage(deps, message.id, bob.id)).toBe("updated");
      expect((await inbox(deps, bob.id)).messages).toEqual([]);
      expect((await sent(deps, alice.id)).map((m) => m.id)).toEqual([message.id]);
      await expect(openMessage(deps, message.id, bob.id)).rejects.toBeInstanceOf(
        NotFoundError
      );

      expect(await deleteMessage(deps, message.id, alice.id)).toBe("purged");
      expect(deps.store.messages.size).toBe(0);
    });

    it("purges a guest message as soon as the recipient deletes it", async () => {
      const message = await sendAsGuest(deps, bob.id, {
        name: "Visitor",
        email: "visitor@example.com",
        ...note("Hi"),
      });

      expect(await deleteMessage(deps, message.id, bob.id)).toBe("purged");
    });

    it("reports outsiders as not found", async () => {
      const carol = await seedUser(deps, "carol");
      const message = await send(deps, alice.id, { recipientId: bob.id, ...note("Hi") });

      await expect(deleteMessage(deps, message.id, carol.id)).rejects.toBeInstanceOf(
        NotFoundError
      );
    });
  });
});
