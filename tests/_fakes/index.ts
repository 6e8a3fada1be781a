// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/_fakes`
 * Purpose: Barrel for test doubles.
 * Scope: Re-exports fakes and in-memory repositories. Does NOT export real implementations.
 * Invariants: No circular dependencies between fakes.
 * Side-effects: none
 * Notes: Import fakes from here to replace I/O and time in unit tests.
 * Links: tests/setup.ts
 * @public
 */

export { FAKE_CLOCK_START, FakeClock } from "./fake-clock";
export { FakeImageProcessor } from "./fake-image-processor";
export { FakePasswordHasher } from "./fake-password-hasher";
export { FakeTokenService } from "./fake-token-service";
export * from "./ids";
export {
  createInMemoryDeps,
  DEFAULT_PROFILE_IMAGE,
  DEFAULT_PROJECT_IMAGE,
  type InMemoryDeps,
  InMemoryStore,
  SEEDED_PASSWORD,
  seedUser,
  TEST_APP_BASE_URL,
  TEST_MAX_UPLOAD_BYTES,
} from "./repositories";
export { makeTestCtx, type TestCtxOptions } from "./test-context";
