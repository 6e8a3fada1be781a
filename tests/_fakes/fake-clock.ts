// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/_fakes/fake-clock`
 * Purpose: Deterministic Clock for token expiry, message ordering and upload paths.
 * Scope: Implements the Clock port. Does NOT replace the global Date.
 * Invariants: Time moves only through advance/advanceSeconds/setTime.
 * Side-effects: none
 * Links: ports/clock.port.ts
 * @public
 */

import type { Clock } from "@/ports";

export const FAKE_CLOCK_START = "2025-03-01T12:00:00.000Z";

export class FakeClock implements Clock {
  private currentTime: Date;

  constructor(initialTime: string | Date = FAKE_CLOCK_START) {
    this.currentTime = new Date(initialTime);
  }

  now(): string {
    return this.currentTime.toISOString();
  }

  advance(milliseconds: number): void {
    this.currentTime = new Date(this.currentTime.getTime() + milliseconds);
  }

  advanceSeconds(seconds: number): void {
    this.advance(seconds * 1000);
  }

  setTime(time: string | Date): void {
    this.currentTime = new Date(time);
  }
}
